import { beforeEach, describe, expect, it, vi } from 'vitest';

import { escapeHtml, formatFailureMessage, initTelegram, sendPipelineFailureNotification } from '../src/telegram.js';
import type { PipelineReport, Stage1Success } from '../src/types.js';

const telegram = vi.hoisted(() => {
  const tokens: string[] = [];
  return {
    tokens,
    sendMessage: vi.fn<(chatId: string, text: string, options: { parse_mode: string }) => Promise<unknown>>()
  };
});

vi.mock('node-telegram-bot-api', () => ({
  default: class {
    sendMessage = telegram.sendMessage;

    constructor(token: string) {
      telegram.tokens.push(token);
    }
  }
}));

const video: Stage1Success = {
  success: true,
  index: 0,
  inputRef: '/in/a.png',
  outputArtifactPath: '/out/video_01.mp4',
  remoteUrl: 'https://cdn.test/a.mp4'
};

const failedReport: PipelineReport = {
  outputDir: '/out',
  soundSkipped: false,
  videoResults: [
    video,
    {
      success: false,
      index: 1,
      inputRef: '/in/b<1>.png',
      errorCode: 'TIMEOUT',
      errorMessage: 'Timed out after 300s & gave up'
    }
  ],
  soundResults: [
    {
      success: false,
      index: 0,
      inputRef: '/out/video_01.mp4',
      errorCode: 'GENERATION_FAILED',
      errorMessage: 'No output URLs generated'
    }
  ],
  summary: { imagesProcessed: 2, videosSucceeded: 1, videosFailed: 1, soundsSucceeded: 0, soundsFailed: 1 }
};

const cleanReport: PipelineReport = {
  outputDir: '/out',
  soundSkipped: true,
  videoResults: [video],
  soundResults: [],
  summary: { imagesProcessed: 1, videosSucceeded: 1, videosFailed: 0, soundsSucceeded: 0, soundsFailed: 0 }
};

describe('formatFailureMessage', () => {
  it('lists every failed item with escaped HTML', () => {
    expect(formatFailureMessage(failedReport)).toBe(
      [
        '🚨 <b>Clip generation finished with failures</b>',
        '',
        'Images: 2',
        'Videos: 1 ok, 1 failed',
        'Sounds: 0 ok, 1 failed',
        '',
        '<b>Video failures</b>',
        '#2 <code>/in/b&lt;1&gt;.png</code>: Timed out after 300s &amp; gave up',
        '',
        '<b>Sound failures</b>',
        '#1 <code>/out/video_01.mp4</code>: No output URLs generated'
      ].join('\n')
    );
  });

  it('returns null when nothing failed', () => {
    expect(formatFailureMessage(cleanReport)).toBeNull();
  });
});

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML reserves', () => {
    expect(escapeHtml('<b>&</b>')).toBe('&lt;b&gt;&amp;&lt;/b&gt;');
  });
});

describe('failure notifications', () => {
  beforeEach(() => {
    telegram.sendMessage.mockReset();
    telegram.tokens.length = 0;
  });

  it('stays disabled without a token and chat id', async () => {
    expect(initTelegram({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '' })).toBe(false);

    await sendPipelineFailureNotification(failedReport);

    expect(telegram.tokens).toEqual([]);
    expect(telegram.sendMessage).not.toHaveBeenCalled();
  });

  it('sends one HTML message for a run with failures', async () => {
    telegram.sendMessage.mockResolvedValue({});
    expect(initTelegram({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '12345' })).toBe(true);

    await sendPipelineFailureNotification(failedReport);

    expect(telegram.tokens).toEqual(['test-token']);
    expect(telegram.sendMessage).toHaveBeenCalledTimes(1);
    expect(telegram.sendMessage).toHaveBeenCalledWith('12345', formatFailureMessage(failedReport), {
      parse_mode: 'HTML'
    });
  });

  it('sends nothing for a clean run', async () => {
    initTelegram({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '12345' });

    await sendPipelineFailureNotification(cleanReport);

    expect(telegram.sendMessage).not.toHaveBeenCalled();
  });

  it('does not throw when Telegram rejects the message', async () => {
    telegram.sendMessage.mockRejectedValue(new Error('Bad Request: chat not found'));
    initTelegram({ TELEGRAM_BOT_TOKEN: 'test-token', TELEGRAM_CHAT_ID: '12345' });

    await expect(sendPipelineFailureNotification(failedReport)).resolves.toBeUndefined();
    expect(telegram.sendMessage).toHaveBeenCalledTimes(1);
  });
});

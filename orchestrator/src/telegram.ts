import TelegramBot from 'node-telegram-bot-api';
import type { RuntimeConfig } from './config.js';
import { errorMessage } from './errors.js';
import { logger } from './logger.js';
import type { PipelineReport, StageFailure } from './types.js';

let bot: TelegramBot | null = null;
let chatId: string | null = null;

export function initTelegram(config: Pick<RuntimeConfig, 'TELEGRAM_BOT_TOKEN' | 'TELEGRAM_CHAT_ID'>): boolean {
  if (!config.TELEGRAM_BOT_TOKEN || !config.TELEGRAM_CHAT_ID) {
    logger.debug('Telegram bot token or chat ID not configured, skipping Telegram notifications');
    bot = null;
    chatId = null;
    return false;
  }

  bot = new TelegramBot(config.TELEGRAM_BOT_TOKEN);
  chatId = config.TELEGRAM_CHAT_ID;
  logger.info('Telegram bot initialized');
  return true;
}

export async function sendTelegramMessage(message: string): Promise<void> {
  if (!bot || !chatId) {
    return;
  }

  try {
    await bot.sendMessage(chatId, message, {
      parse_mode: 'HTML'
    });
  } catch (error) {
    logger.error({ error: errorMessage(error) }, 'Failed to send Telegram message');
  }
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

const failureLine = (failure: StageFailure) =>
  `#${failure.index + 1} <code>${escapeHtml(failure.inputRef)}</code>: ${escapeHtml(failure.errorMessage)}`;

/**
 * Build the HTML failure digest for a run, or null when nothing failed.
 */
export function formatFailureMessage(report: PipelineReport): string | null {
  const videoFailures = report.videoResults.filter((result): result is StageFailure => !result.success);
  const soundFailures = report.soundResults.filter((result): result is StageFailure => !result.success);
  if (videoFailures.length === 0 && soundFailures.length === 0) {
    return null;
  }

  const { summary } = report;
  const lines = [
    '🚨 <b>Clip generation finished with failures</b>',
    '',
    `Images: ${summary.imagesProcessed}`,
    `Videos: ${summary.videosSucceeded} ok, ${summary.videosFailed} failed`
  ];
  if (!report.soundSkipped) {
    lines.push(`Sounds: ${summary.soundsSucceeded} ok, ${summary.soundsFailed} failed`);
  }
  if (videoFailures.length > 0) {
    lines.push('', '<b>Video failures</b>', ...videoFailures.map(failureLine));
  }
  if (soundFailures.length > 0) {
    lines.push('', '<b>Sound failures</b>', ...soundFailures.map(failureLine));
  }

  return lines.join('\n');
}

export async function sendPipelineFailureNotification(report: PipelineReport): Promise<void> {
  const message = formatFailureMessage(report);
  if (!message) {
    return;
  }
  await sendTelegramMessage(message);
}

import { once } from 'node:events';
import { mkdir, mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import type { Server } from 'node:http';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import type { PipelineInput, PipelineReport } from '@clipforge/orchestrator';
import { buildServer, type GatewayDependencies } from '../src/server.js';

const report: PipelineReport = {
  outputDir: '/srv/output',
  soundSkipped: false,
  videoResults: [
    {
      success: true,
      index: 0,
      inputRef: 'a.png',
      outputArtifactPath: '/srv/output/video_01.mp4',
      remoteUrl: 'https://cdn.test/a.mp4'
    }
  ],
  soundResults: [],
  summary: { imagesProcessed: 1, videosSucceeded: 1, videosFailed: 0, soundsSucceeded: 0, soundsFailed: 0 }
};

const MAX_FILE_BYTES = 1024 * 1024;

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

// First input succeeds, the rest fail, all inside the run directory
function reportFor(inputs: PipelineInput[], runDir: string): PipelineReport {
  return {
    outputDir: runDir,
    soundSkipped: true,
    videoResults: inputs.map((input, index) =>
      index === 0
        ? {
            success: true,
            index,
            inputRef: input.imagePath,
            outputArtifactPath: join(runDir, 'video_01.mp4'),
            remoteUrl: 'https://cdn.test/a.mp4'
          }
        : {
            success: false,
            index,
            inputRef: input.imagePath,
            errorCode: 'GENERATION_FAILED',
            errorMessage: 'Content rejected'
          }
    ),
    soundResults: [],
    summary: {
      imagesProcessed: inputs.length,
      videosSucceeded: 1,
      videosFailed: inputs.length - 1,
      soundsSucceeded: 0,
      soundsFailed: 0
    }
  };
}

const responseSchema = z.object({ runId: z.string() }).passthrough();

describe('upload gateway', () => {
  let root: string;
  let uploadDir: string;
  let outputDir: string;
  let server: Server;
  let baseUrl: string;
  const runPipeline = vi.fn<GatewayDependencies['runPipeline']>();

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'clipforge-gateway-'));
    uploadDir = join(root, 'uploads');
    outputDir = join(root, 'output');
    await mkdir(outputDir);
    runPipeline.mockReset().mockResolvedValue(report);

    const app = buildServer({ uploadDir, outputDir, maxFileBytes: MAX_FILE_BYTES, maxWorkers: 3, runPipeline });
    server = app.listen(0, '127.0.0.1');
    await once(server, 'listening');
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('test server has no TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await rm(root, { recursive: true, force: true });
  });

  const image = (content = 'png-bytes', type = 'image/png') => new Blob([content], { type });

  it('answers the health check', async () => {
    const response = await fetch(`${baseUrl}/healthz`);

    expect(response.status).toBe(200);
    await expect(response.json()).resolves.toEqual({ status: 'ok' });
  });

  it('serves the upload form', async () => {
    const response = await fetch(`${baseUrl}/`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toBe('text/html; charset=UTF-8');
    expect(await response.text()).toContain('<form id="upload-form">');
  });

  it('runs the pipeline on the uploaded images and removes them afterwards', async () => {
    const seenUploads: string[][] = [];
    runPipeline.mockImplementation(async (inputs, options) => {
      seenUploads.push((await readdir(uploadDir)).sort());
      return reportFor(inputs, options.outputDir);
    });

    const body = new FormData();
    body.append('files', image(), 'a photo.png');
    body.append('files', image('jpeg-bytes', 'image/jpeg'), 'b.jpg');
    body.append('prompts', 'wave');
    body.append('prompts', '');
    body.append('add_sound', 'false');

    const response = await fetch(`${baseUrl}/api/generate-videos`, { method: 'POST', body });

    expect(response.status).toBe(200);
    await expect(readdir(uploadDir)).resolves.toEqual([]);
    const result = responseSchema.parse(await response.json());
    expect(result.runId).toMatch(UUID);
    const runDir = join(outputDir, result.runId);
    expect(runPipeline).toHaveBeenCalledTimes(1);
    expect(runPipeline).toHaveBeenCalledWith(
      [
        { imagePath: expect.stringMatching(/uploads[\\/][0-9a-f-]{36}_a_photo\.png$/), customPrompt: 'wave' },
        { imagePath: expect.stringMatching(/uploads[\\/][0-9a-f-]{36}_b\.jpg$/) }
      ],
      { outputDir: runDir, maxWorkers: 2, addSound: false }
    );
    expect(seenUploads[0]).toHaveLength(2);
    expect(result).toEqual({
      runId: result.runId,
      outputDir: runDir,
      soundSkipped: true,
      videoResults: [
        {
          success: true,
          index: 0,
          inputRef: 'a photo.png',
          outputArtifactPath: join(runDir, 'video_01.mp4'),
          remoteUrl: 'https://cdn.test/a.mp4'
        },
        {
          success: false,
          index: 1,
          inputRef: 'b.jpg',
          errorCode: 'GENERATION_FAILED',
          errorMessage: 'Content rejected'
        }
      ],
      soundResults: [],
      summary: { imagesProcessed: 2, videosSucceeded: 1, videosFailed: 1, soundsSucceeded: 0, soundsFailed: 0 }
    });
  });

  it('adds sound unless told otherwise', async () => {
    const body = new FormData();
    body.append('files', image(), 'a.png');

    await fetch(`${baseUrl}/api/generate-videos`, { method: 'POST', body });

    expect(runPipeline).toHaveBeenCalledWith([{ imagePath: expect.any(String) }], {
      outputDir: expect.stringContaining(outputDir),
      maxWorkers: 1,
      addSound: true
    });
  });

  it('gives overlapping requests separate run directories', async () => {
    let releaseRuns: () => void = () => undefined;
    const bothStarted = new Promise<void>((resolve) => {
      releaseRuns = resolve;
    });
    const runDirs: string[] = [];
    runPipeline.mockImplementation(async (inputs, options) => {
      runDirs.push(options.outputDir);
      if (runDirs.length === 2) releaseRuns();
      await bothStarted;
      await mkdir(options.outputDir, { recursive: true });
      await writeFile(join(options.outputDir, 'video_01.mp4'), `clip ${inputs[0]?.customPrompt ?? ''}`);
      return reportFor(inputs, options.outputDir);
    });

    const generate = async (prompt: string) => {
      const body = new FormData();
      body.append('files', image(), 'same-name.png');
      body.append('prompts', prompt);
      const response = await fetch(`${baseUrl}/api/generate-videos`, { method: 'POST', body });
      return responseSchema.parse(await response.json()).runId;
    };

    const [firstRun, secondRun] = await Promise.all([generate('first'), generate('second')]);

    expect(firstRun).not.toBe(secondRun);
    expect(new Set(runDirs)).toEqual(new Set([join(outputDir, firstRun), join(outputDir, secondRun)]));
    const first = await fetch(`${baseUrl}/api/download/${firstRun}/video_01.mp4`);
    const second = await fetch(`${baseUrl}/api/download/${secondRun}/video_01.mp4`);
    expect(await first.text()).toBe('clip first');
    expect(await second.text()).toBe('clip second');
  });

  it('rejects a request without files', async () => {
    const body = new FormData();
    body.append('add_sound', 'true');

    const response = await fetch(`${baseUrl}/api/generate-videos`, { method: 'POST', body });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({ error: 'No files uploaded' });
    expect(runPipeline).not.toHaveBeenCalled();
  });

  it('rejects unsupported file types', async () => {
    const body = new FormData();
    body.append('files', new Blob(['hello'], { type: 'text/plain' }), 'notes.txt');

    const response = await fetch(`${baseUrl}/api/generate-videos`, { method: 'POST', body });

    expect(response.status).toBe(400);
    await expect(response.json()).resolves.toEqual({ error: 'Unsupported file type: notes.txt' });
    expect(runPipeline).not.toHaveBeenCalled();
  });

  it('rejects files over the size limit', async () => {
    const body = new FormData();
    body.append('files', new Blob([new Uint8Array(MAX_FILE_BYTES + 1)], { type: 'image/png' }), 'huge.png');

    const response = await fetch(`${baseUrl}/api/generate-videos`, { method: 'POST', body });

    expect(response.status).toBe(413);
    await expect(response.json()).resolves.toEqual({ error: 'File too large (max 1 MB)' });
    expect(runPipeline).not.toHaveBeenCalled();
  });

  it('returns 500 and still cleans up when the pipeline throws', async () => {
    runPipeline.mockRejectedValue(new Error('disk full'));
    const body = new FormData();
    body.append('files', image(), 'a.png');

    const response = await fetch(`${baseUrl}/api/generate-videos`, { method: 'POST', body });

    expect(response.status).toBe(500);
    await expect(response.json()).resolves.toEqual({ error: 'Internal server error', message: 'disk full' });
    await expect(readdir(uploadDir)).resolves.toEqual([]);
  });

  it('downloads a generated file as an attachment', async () => {
    const runId = '5b0c4e62-8f1d-4f0a-9a57-0d5e3c2b1a90';
    await mkdir(join(outputDir, runId));
    await writeFile(join(outputDir, runId, 'video_01.mp4'), 'clip-bytes');

    const response = await fetch(`${baseUrl}/api/download/${runId}/video_01.mp4`);

    expect(response.status).toBe(200);
    expect(response.headers.get('content-disposition')).toBe('attachment; filename="video_01.mp4"');
    expect(await response.text()).toBe('clip-bytes');
  });

  it('answers 404 for unknown files and paths outside the run directory', async () => {
    const runId = '5b0c4e62-8f1d-4f0a-9a57-0d5e3c2b1a90';
    await mkdir(join(outputDir, runId));
    await writeFile(join(outputDir, 'secret.txt'), 'secret');
    await writeFile(join(root, 'secret.txt'), 'secret');

    const missing = await fetch(`${baseUrl}/api/download/${runId}/video_09.mp4`);
    const escapedFile = await fetch(`${baseUrl}/api/download/${runId}/..%2Fsecret.txt`);
    const escapedRun = await fetch(`${baseUrl}/api/download/..%2F/secret.txt`);
    const hiddenRun = await fetch(`${baseUrl}/api/download/.${runId}/video_01.mp4`);

    expect(missing.status).toBe(404);
    await expect(missing.json()).resolves.toEqual({ error: 'File not found' });
    expect(escapedFile.status).toBe(404);
    await expect(escapedFile.json()).resolves.toEqual({ error: 'File not found' });
    expect(escapedRun.status).toBe(404);
    await expect(escapedRun.json()).resolves.toEqual({ error: 'File not found' });
    expect(hiddenRun.status).toBe(404);
  });
});

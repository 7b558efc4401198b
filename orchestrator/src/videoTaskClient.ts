import { randomUUID } from 'node:crypto';
import { readFile } from 'node:fs/promises';
import { extname } from 'node:path';
import { z } from 'zod';
import {
  errorMessage,
  GenerationError,
  isAbortTimeout,
  SubmissionError,
  TimeoutError,
  ValidationError
} from './errors.js';
import { logger } from './logger.js';
import type { GenerationJob, JobClient } from './types.js';
import { systemClock, type Clock } from './utils/clock.js';

const MIME_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.webp': 'image/webp'
};

// Returned while the task is still queued on the remote side
const TASK_NOT_FOUND = 'taskNotFound';

export interface VideoGenerationParameters {
  model: string;
  durationSeconds: number;
  width: number;
  height: number;
  fps: number;
  outputFormat: 'mp4' | 'webm';
  outputQuality: number;
  framePosition: 'first' | 'last';
}

export interface VideoTaskClientConfig {
  apiKey: string;
  baseUrl: string;
  pollIntervalMs: number;
  /** Wait applied after a poll that did not get an HTTP 200 back. */
  pollErrorBackoffMs: number;
  defaults: VideoGenerationParameters;
  clock?: Clock;
}

export interface VideoTaskInput {
  imagePath: string;
  positivePrompt?: string;
  overrides?: Partial<VideoGenerationParameters>;
}

export type VideoTaskRequest = VideoGenerationParameters & { positivePrompt?: string };

export interface VideoTaskResult {
  taskUUID: string;
  videoURL: string;
  videoUUID?: string;
  cost?: number;
  seed?: number;
}

const taskErrorSchema = z.object({
  code: z.string().optional(),
  message: z.string().optional()
});

const taskDataSchema = z.object({
  taskUUID: z.string().optional(),
  status: z.string().optional(),
  message: z.string().optional(),
  videoUUID: z.string().optional(),
  videoURL: z.string().optional(),
  cost: z.number().optional(),
  seed: z.number().optional()
});

const taskResponseSchema = z.object({
  data: z.array(taskDataSchema).optional(),
  errors: z.array(taskErrorSchema).optional()
});

type TaskResponse = z.infer<typeof taskResponseSchema>;

type PollOutcome =
  | { kind: 'success'; result: VideoTaskResult }
  | { kind: 'failed'; error: GenerationError }
  | { kind: 'pending' }
  | { kind: 'unreachable'; reason: string }
  | { kind: 'expired' };

/**
 * Encode an image as a data URI. Unknown extensions are sent as JPEG.
 */
export async function encodeImageToDataUri(imagePath: string): Promise<string> {
  let content: Buffer;
  try {
    content = await readFile(imagePath);
  } catch (error) {
    throw new ValidationError(`Image file not found: ${imagePath}`, { cause: error });
  }

  const mimeType = MIME_TYPES[extname(imagePath).toLowerCase()] ?? 'image/jpeg';
  return `data:${mimeType};base64,${content.toString('base64')}`;
}

function firstErrorMessage(response: TaskResponse): string | undefined {
  const [first] = response.errors ?? [];
  if (!first) return undefined;
  return first.message ?? first.code ?? 'Unknown error';
}

/**
 * Client for the image-to-video task API.
 *
 * `submit` posts one videoInference task and returns right away; the result is
 * collected with `awaitCompletion`, which polls getResponse on a fixed interval.
 */
export class VideoTaskClient implements JobClient<VideoTaskInput, VideoTaskRequest, VideoTaskResult> {
  private readonly endpoint: string;
  private readonly headers: Record<string, string>;
  private readonly clock: Clock;

  constructor(private readonly config: VideoTaskClientConfig) {
    this.endpoint = `${config.baseUrl.replace(/\/+$/, '')}/`;
    this.headers = {
      Authorization: `Bearer ${config.apiKey}`,
      'Content-Type': 'application/json'
    };
    this.clock = config.clock ?? systemClock;
  }

  async submit(input: VideoTaskInput): Promise<GenerationJob<VideoTaskRequest>> {
    const inputImage = await encodeImageToDataUri(input.imagePath);
    const params: VideoGenerationParameters = { ...this.config.defaults, ...input.overrides };
    const positivePrompt = input.positivePrompt?.trim();
    const taskUUID = randomUUID();

    const task = {
      taskType: 'videoInference',
      taskUUID,
      deliveryMethod: 'async',
      model: params.model,
      duration: params.durationSeconds,
      width: params.width,
      height: params.height,
      fps: params.fps,
      outputType: 'URL',
      outputFormat: params.outputFormat,
      outputQuality: params.outputQuality,
      numberResults: 1,
      includeCost: true,
      frameImages: [{ inputImage, frame: params.framePosition }],
      ...(positivePrompt ? { positivePrompt } : {})
    };

    let response: Response;
    try {
      response = await fetch(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify([task])
      });
    } catch (error) {
      throw new SubmissionError(`Failed to start video generation: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status !== 200) {
      const text = await response.text();
      throw new SubmissionError(`Failed to start video generation: ${text}`, {
        details: { status: response.status }
      });
    }

    const parsed = taskResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new SubmissionError('Failed to start video generation: unexpected response from video API');
    }

    const rejection = firstErrorMessage(parsed.data);
    if (rejection) {
      throw new SubmissionError(`Video generation error: ${rejection}`);
    }

    logger.info(
      {
        taskUUID,
        imagePath: input.imagePath,
        model: params.model,
        durationSeconds: params.durationSeconds,
        resolution: `${params.width}x${params.height}`,
        fps: params.fps
      },
      'Video task submitted'
    );

    return {
      id: taskUUID,
      inputRef: input.imagePath,
      state: 'submitted',
      request: positivePrompt ? { ...params, positivePrompt } : params
    };
  }

  async awaitCompletion(job: GenerationJob<VideoTaskRequest>, timeoutSeconds: number): Promise<VideoTaskResult> {
    const deadline = this.clock.now() + timeoutSeconds * 1000;
    let pollCount = 0;

    job.state = 'polling';

    // Each poll is cut off at the deadline and no wait runs past it
    for (;;) {
      pollCount += 1;
      const outcome = await this.poll(job.id, Math.max(0, deadline - this.clock.now()));

      let delayMs = this.config.pollIntervalMs;
      switch (outcome.kind) {
        case 'success':
          job.state = 'succeeded';
          job.resultRef = outcome.result.videoURL;
          logger.info({ taskUUID: job.id, pollCount, videoURL: outcome.result.videoURL }, 'Video task completed');
          return outcome.result;
        case 'failed':
          job.state = 'failed';
          throw outcome.error;
        case 'expired':
          throw this.timedOut(job, timeoutSeconds, pollCount);
        case 'pending':
          logger.debug({ taskUUID: job.id, pollCount }, 'Video task still processing');
          break;
        case 'unreachable':
          logger.warn({ taskUUID: job.id, pollCount, reason: outcome.reason }, 'Video task poll failed');
          delayMs = this.config.pollErrorBackoffMs;
          break;
      }

      const remainingMs = deadline - this.clock.now();
      if (remainingMs <= 0) {
        throw this.timedOut(job, timeoutSeconds, pollCount);
      }
      await this.clock.sleep(Math.min(delayMs, remainingMs));
    }
  }

  private timedOut(job: GenerationJob<VideoTaskRequest>, timeoutSeconds: number, pollCount: number): TimeoutError {
    job.state = 'timed_out';
    return new TimeoutError(`Timed out after ${timeoutSeconds}s waiting for video task ${job.id}`, {
      details: { taskUUID: job.id, pollCount }
    });
  }

  private async poll(taskUUID: string, budgetMs: number): Promise<PollOutcome> {
    let payload: unknown;
    try {
      const response = await fetch(this.endpoint, {
        method: 'POST',
        headers: this.headers,
        body: JSON.stringify([{ taskType: 'getResponse', taskUUID }]),
        signal: AbortSignal.timeout(budgetMs)
      });

      if (response.status !== 200) {
        return { kind: 'unreachable', reason: `HTTP ${response.status}: ${await response.text()}` };
      }

      payload = await response.json().catch((error: unknown) => {
        if (isAbortTimeout(error)) throw error;
        return null;
      });
    } catch (error) {
      if (isAbortTimeout(error)) return { kind: 'expired' };
      return { kind: 'unreachable', reason: errorMessage(error) };
    }

    const parsed = taskResponseSchema.safeParse(payload);
    if (!parsed.success) {
      return {
        kind: 'failed',
        error: new GenerationError(`Polling error: unexpected response for task ${taskUUID}`)
      };
    }

    const data = parsed.data.data ?? [];
    const item = data.find((entry) => entry.taskUUID === taskUUID) ?? data[0];
    if (item?.status === 'success') {
      if (!item.videoURL) {
        return { kind: 'failed', error: new GenerationError(`Task ${taskUUID} succeeded without a video URL`) };
      }
      return {
        kind: 'success',
        result: {
          taskUUID,
          videoURL: item.videoURL,
          videoUUID: item.videoUUID,
          cost: item.cost,
          seed: item.seed
        }
      };
    }
    if (item?.status === 'error') {
      return { kind: 'failed', error: new GenerationError(`Generation failed: ${item.message ?? 'Unknown error'}`) };
    }

    const [remoteError] = parsed.data.errors ?? [];
    if (remoteError && remoteError.code !== TASK_NOT_FOUND) {
      return {
        kind: 'failed',
        error: new GenerationError(`Polling error: ${remoteError.message ?? remoteError.code ?? 'Unknown error'}`, {
          details: { code: remoteError.code }
        })
      };
    }

    return { kind: 'pending' };
  }
}

import { readFile } from 'node:fs/promises';
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

export interface SoundGenerationParameters {
  durationSeconds: number;
  numSamples: number;
  modelVersion: string;
  creativity: number;
  textPrompt: string;
  negativePrompt: string;
  steps: number;
}

export interface SoundTaskClientConfig {
  apiKey: string;
  baseUrl: string;
  defaults: SoundGenerationParameters;
}

export interface SoundTaskInput {
  videoPath: string;
  overrides?: Partial<SoundGenerationParameters>;
}

export interface SoundTaskResult {
  customerAssetId: string;
  outputUrls: string[];
}

const createAssetSchema = z.object({
  customer_asset_id: z.string().min(1),
  upload_url: z.string().url()
});

const sfxResponseSchema = z.object({
  output_paths: z.array(z.string()).default([])
});

/**
 * Client for the video-to-sound-effect API.
 *
 * Submission uploads the video (create asset, then PUT the bytes). The
 * generation call itself answers synchronously with the output URLs, so
 * `awaitCompletion` is a single request bounded by the timeout.
 */
export class SoundTaskClient implements JobClient<SoundTaskInput, SoundGenerationParameters, SoundTaskResult> {
  private readonly baseUrl: string;

  constructor(private readonly config: SoundTaskClientConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  async submit(input: SoundTaskInput): Promise<GenerationJob<SoundGenerationParameters>> {
    let content: Buffer;
    try {
      content = await readFile(input.videoPath);
    } catch (error) {
      throw new ValidationError(`Video file not found: ${input.videoPath}`, { cause: error });
    }

    const asset = await this.createAsset();

    let upload: Response;
    try {
      upload = await fetch(asset.upload_url, {
        method: 'PUT',
        headers: { 'Content-Type': 'video/mp4' },
        body: content
      });
    } catch (error) {
      throw new SubmissionError(`Failed to upload video: ${errorMessage(error)}`, { cause: error });
    }

    if (upload.status !== 200 && upload.status !== 204) {
      throw new SubmissionError(`Failed to upload video: ${upload.status}`, {
        details: { status: upload.status }
      });
    }

    logger.info(
      { customerAssetId: asset.customer_asset_id, videoPath: input.videoPath, bytes: content.length },
      'Video uploaded for sound generation'
    );

    return {
      id: asset.customer_asset_id,
      inputRef: input.videoPath,
      state: 'submitted',
      request: { ...this.config.defaults, ...input.overrides }
    };
  }

  async awaitCompletion(
    job: GenerationJob<SoundGenerationParameters>,
    timeoutSeconds: number
  ): Promise<SoundTaskResult> {
    const params = job.request;
    const payload = {
      customer_asset_id: job.id,
      duration: params.durationSeconds,
      num_samples: params.numSamples,
      model_version: params.modelVersion,
      creativity_coef: params.creativity,
      return_audio_only: false,
      text_prompt: params.textPrompt,
      negative_prompt: params.negativePrompt,
      steps: params.steps
    };

    job.state = 'polling';
    logger.info(
      { customerAssetId: job.id, durationSeconds: params.durationSeconds, creativity: params.creativity },
      'Requesting sound effects'
    );

    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/video-to-sfx`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify(payload),
        signal: AbortSignal.timeout(timeoutSeconds * 1000)
      });
    } catch (error) {
      if (isAbortTimeout(error)) throw this.timedOut(job, timeoutSeconds, error);
      job.state = 'failed';
      throw new GenerationError(`Sound generation request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status !== 201) {
      job.state = 'failed';
      const text = await response.text();
      throw new GenerationError(`Sound generation failed with status ${response.status}: ${text}`, {
        details: { status: response.status }
      });
    }

    // The timeout also covers reading the body
    let body: unknown = null;
    try {
      body = await response.json();
    } catch (error) {
      if (isAbortTimeout(error)) throw this.timedOut(job, timeoutSeconds, error);
      logger.warn({ customerAssetId: job.id, reason: errorMessage(error) }, 'Sound response body is not JSON');
    }

    const parsed = sfxResponseSchema.safeParse(body);
    const outputUrls = parsed.success ? parsed.data.output_paths : [];
    if (outputUrls.length === 0) {
      job.state = 'failed';
      throw new GenerationError('No output URLs generated');
    }

    job.state = 'succeeded';
    job.resultRef = outputUrls[0];
    logger.info({ customerAssetId: job.id, outputs: outputUrls.length }, 'Sound effects generated');

    return { customerAssetId: job.id, outputUrls };
  }

  private timedOut(
    job: GenerationJob<SoundGenerationParameters>,
    timeoutSeconds: number,
    cause: unknown
  ): TimeoutError {
    job.state = 'timed_out';
    return new TimeoutError(`Timed out after ${timeoutSeconds}s waiting for sound effects for asset ${job.id}`, {
      cause
    });
  }

  private headers(): Record<string, string> {
    return {
      'x-api-key': this.config.apiKey,
      'Content-Type': 'application/json'
    };
  }

  private async createAsset(): Promise<z.infer<typeof createAssetSchema>> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}/create-customer-asset`, {
        method: 'POST',
        headers: this.headers(),
        body: JSON.stringify({ contentType: 'video/mp4' })
      });
    } catch (error) {
      throw new SubmissionError(`Failed to create asset: ${errorMessage(error)}`, { cause: error });
    }

    if (response.status !== 200) {
      const text = await response.text();
      throw new SubmissionError(`Failed to create asset: ${text}`, { details: { status: response.status } });
    }

    const parsed = createAssetSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success) {
      throw new SubmissionError('Failed to create asset: response is missing customer_asset_id or upload_url');
    }

    return parsed.data;
  }
}

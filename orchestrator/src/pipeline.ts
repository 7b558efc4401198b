import { access, mkdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { ArtifactFetcher } from './artifactFetcher.js';
import type { RuntimeConfig } from './config.js';
import { logger } from './logger.js';
import { SoundTaskClient, type SoundGenerationParameters, type SoundTaskInput, type SoundTaskResult } from './soundTaskClient.js';
import { runBatch, type StageOutcome } from './stageRunner.js';
import type {
  ArtifactSource,
  BatchItem,
  JobClient,
  PipelineReport,
  Stage1Result,
  Stage1Success,
  Stage2Result,
  Stage2Success,
  StageFailure
} from './types.js';
import {
  VideoTaskClient,
  type VideoTaskInput,
  type VideoTaskRequest,
  type VideoTaskResult
} from './videoTaskClient.js';

export interface PipelineInput {
  imagePath: string;
  customPrompt?: string;
}

export type VideoJobClient = JobClient<VideoTaskInput, VideoTaskRequest, VideoTaskResult>;
export type SoundJobClient = JobClient<SoundTaskInput, SoundGenerationParameters, SoundTaskResult>;

export interface PipelineDependencies {
  videoClient: VideoJobClient;
  soundClient: SoundJobClient;
  fetcher: ArtifactSource;
}

export interface PipelineOptions {
  outputDir: string;
  maxWorkers: number;
  addSound: boolean;
  systemPrompt: string;
  videoFormat: 'mp4' | 'webm';
  videoTimeoutSeconds: number;
  soundTimeoutSeconds: number;
}

const pad = (index: number) => String(index + 1).padStart(2, '0');

export const videoFileName = (index: number, format: string) => `video_${pad(index)}.${format}`;
export const soundFileName = (index: number, sample: number) => `sound_video_${pad(index)}_${sample}.mp4`;

export function composePrompt(systemPrompt: string, customPrompt?: string): string {
  const custom = customPrompt?.trim();
  return custom ? `${systemPrompt}, ${custom}` : systemPrompt;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

type FailedOutcome<TInput> = Extract<StageOutcome<TInput, unknown>, { success: false }>;

function toFailure<TInput>(outcome: FailedOutcome<TInput>, inputRef: string): StageFailure {
  return {
    success: false,
    index: outcome.index,
    inputRef,
    errorCode: outcome.error.code,
    errorMessage: outcome.error.message
  };
}

/**
 * Two sequential stages: image to video for every input, then video to sound
 * for the items whose video succeeded. Stage two starts only after stage one
 * has fully settled.
 */
export class PipelineCoordinator {
  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions
  ) {}

  async run(inputs: readonly PipelineInput[]): Promise<PipelineReport> {
    const { outputDir, maxWorkers, addSound } = this.options;
    await mkdir(outputDir, { recursive: true });

    const items: BatchItem[] = inputs.map((input, index) => ({
      index,
      inputPath: input.imagePath,
      customPrompt: input.customPrompt
    }));

    logger.info({ images: items.length, maxWorkers, addSound, outputDir }, 'Pipeline started');

    const videoOutcomes = await runBatch(items, (item) => this.generateVideo(item), maxWorkers, { stage: 'video' });
    const videoResults: Stage1Result[] = videoOutcomes.map((outcome) =>
      outcome.success ? outcome.value : toFailure(outcome, outcome.input.inputPath)
    );
    const videos = videoResults.filter((result): result is Stage1Success => result.success);

    let soundResults: Stage2Result[] = [];
    if (!addSound) {
      logger.info('Sound generation disabled, skipping stage two');
    } else if (videos.length === 0) {
      logger.warn('No videos were generated, skipping stage two');
    } else {
      const soundOutcomes = await runBatch(videos, (video) => this.generateSound(video), maxWorkers, {
        stage: 'sound'
      });
      // Keep the original image index so both stages correlate
      soundResults = soundOutcomes.map((outcome) =>
        outcome.success
          ? outcome.value
          : { ...toFailure(outcome, outcome.input.outputArtifactPath), index: outcome.input.index }
      );
    }

    const report: PipelineReport = {
      outputDir: resolve(outputDir),
      soundSkipped: !addSound,
      videoResults,
      soundResults,
      summary: {
        imagesProcessed: items.length,
        videosSucceeded: videos.length,
        videosFailed: videoResults.length - videos.length,
        soundsSucceeded: soundResults.filter((result) => result.success).length,
        soundsFailed: soundResults.filter((result) => !result.success).length
      }
    };

    logger.info(report.summary, 'Pipeline completed');
    return report;
  }

  private async generateVideo(item: BatchItem): Promise<Stage1Success> {
    const { videoClient, fetcher } = this.deps;
    const log = logger.child({ stage: 'video', index: item.index });

    log.info({ imagePath: item.inputPath, customPrompt: item.customPrompt }, 'Generating video');

    const job = await videoClient.submit({
      imagePath: item.inputPath,
      positivePrompt: composePrompt(this.options.systemPrompt, item.customPrompt)
    });
    const result = await videoClient.awaitCompletion(job, this.options.videoTimeoutSeconds);

    const outputArtifactPath = join(this.options.outputDir, videoFileName(item.index, this.options.videoFormat));
    await fetcher.fetch(result.videoURL, outputArtifactPath);

    log.info({ outputArtifactPath }, 'Video saved');
    return {
      success: true,
      index: item.index,
      inputRef: item.inputPath,
      outputArtifactPath,
      remoteUrl: result.videoURL,
      videoUUID: result.videoUUID,
      cost: result.cost,
      seed: result.seed
    };
  }

  private async generateSound(video: Stage1Success): Promise<Stage2Success> {
    const { soundClient, fetcher } = this.deps;
    const log = logger.child({ stage: 'sound', index: video.index });

    // The stage-one download is the input; only fetch again if it has gone missing
    if (!(await pathExists(video.outputArtifactPath))) {
      log.warn({ remoteUrl: video.remoteUrl }, 'Local video missing, downloading it again');
      await fetcher.fetch(video.remoteUrl, video.outputArtifactPath);
    }

    const job = await soundClient.submit({ videoPath: video.outputArtifactPath });
    const result = await soundClient.awaitCompletion(job, this.options.soundTimeoutSeconds);

    const outputArtifactPaths: string[] = [];
    for (const [offset, url] of result.outputUrls.entries()) {
      const destination = join(this.options.outputDir, soundFileName(video.index, offset + 1));
      outputArtifactPaths.push(await fetcher.fetch(url, destination));
    }

    log.info({ outputs: outputArtifactPaths }, 'Sound video saved');
    return {
      success: true,
      index: video.index,
      inputRef: video.outputArtifactPath,
      outputArtifactPath: outputArtifactPaths[0] ?? '',
      outputArtifactPaths,
      remoteUrl: result.outputUrls[0] ?? '',
      remoteUrls: result.outputUrls
    };
  }
}

export interface CreatePipelineOptions {
  outputDir?: string;
  maxWorkers?: number;
  addSound?: boolean;
}

/**
 * Wire the real API clients from a validated runtime config.
 */
export function createPipeline(config: RuntimeConfig, options: CreatePipelineOptions = {}): PipelineCoordinator {
  const videoClient = new VideoTaskClient({
    apiKey: config.RUNWARE_API_KEY,
    baseUrl: config.RUNWARE_BASE_URL,
    pollIntervalMs: config.POLL_INTERVAL_SECONDS * 1000,
    pollErrorBackoffMs: config.POLL_ERROR_BACKOFF_SECONDS * 1000,
    defaults: {
      model: config.VIDEO_MODEL,
      durationSeconds: config.VIDEO_DURATION_SECONDS,
      width: config.VIDEO_WIDTH,
      height: config.VIDEO_HEIGHT,
      fps: config.VIDEO_FPS,
      outputFormat: config.VIDEO_OUTPUT_FORMAT,
      outputQuality: config.VIDEO_OUTPUT_QUALITY,
      framePosition: config.VIDEO_FRAME_POSITION
    }
  });

  const soundClient = new SoundTaskClient({
    apiKey: config.MIRELO_API_KEY,
    baseUrl: config.MIRELO_BASE_URL,
    defaults: {
      durationSeconds: config.SOUND_DURATION_SECONDS,
      numSamples: config.SOUND_SAMPLES,
      modelVersion: config.SOUND_MODEL_VERSION,
      creativity: config.SOUND_CREATIVITY,
      textPrompt: config.SOUND_TEXT_PROMPT,
      negativePrompt: config.SOUND_NEGATIVE_PROMPT,
      steps: config.SOUND_STEPS
    }
  });

  return new PipelineCoordinator(
    { videoClient, soundClient, fetcher: new ArtifactFetcher() },
    {
      outputDir: options.outputDir ?? config.OUTPUT_DIR,
      maxWorkers: options.maxWorkers ?? config.MAX_CONCURRENT_WORKERS,
      addSound: options.addSound ?? true,
      systemPrompt: config.VIDEO_SYSTEM_PROMPT,
      videoFormat: config.VIDEO_OUTPUT_FORMAT,
      videoTimeoutSeconds: config.VIDEO_TIMEOUT_SECONDS,
      soundTimeoutSeconds: config.SOUND_TIMEOUT_SECONDS
    }
  );
}

export { ArtifactFetcher, DOWNLOAD_CHUNK_SIZE, type ArtifactFetcherOptions, type DownloadProgress } from './artifactFetcher.js';
export { runCli, parseCliArgs, usage, type CliDependencies, type CliOptions, type PipelineRunner } from './cli.js';
export {
  DEFAULT_SOUND_NEGATIVE_PROMPT,
  DEFAULT_SOUND_PROMPT,
  DEFAULT_VIDEO_PROMPT,
  loadEnvFiles,
  loadRuntimeConfig,
  type RuntimeConfig
} from './config.js';
export * from './errors.js';
export {
  ALLOWED_IMAGE_EXTENSIONS,
  buildPipelineInputs,
  collectValidImages,
  isAllowedImage,
  sanitizeFileName,
  type RejectedInput
} from './inputs.js';
export { childLogger, logger } from './logger.js';
export {
  composePrompt,
  createPipeline,
  PipelineCoordinator,
  soundFileName,
  videoFileName,
  type CreatePipelineOptions,
  type PipelineDependencies,
  type PipelineInput,
  type PipelineOptions,
  type SoundJobClient,
  type VideoJobClient
} from './pipeline.js';
export {
  SoundTaskClient,
  type SoundGenerationParameters,
  type SoundTaskClientConfig,
  type SoundTaskInput,
  type SoundTaskResult
} from './soundTaskClient.js';
export { runBatch, type RunBatchOptions, type StageOutcome } from './stageRunner.js';
export {
  escapeHtml,
  formatFailureMessage,
  initTelegram,
  sendPipelineFailureNotification,
  sendTelegramMessage
} from './telegram.js';
export type * from './types.js';
export { systemClock, type Clock } from './utils/clock.js';
export { limitConcurrency, type Limiter } from './utils/concurrency.js';
export {
  encodeImageToDataUri,
  VideoTaskClient,
  type VideoGenerationParameters,
  type VideoTaskClientConfig,
  type VideoTaskInput,
  type VideoTaskRequest,
  type VideoTaskResult
} from './videoTaskClient.js';

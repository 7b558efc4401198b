import type { PipelineErrorCode } from './errors.js';

export type JobState = 'submitted' | 'polling' | 'succeeded' | 'failed' | 'timed_out';

/**
 * One outstanding unit of work against a generation API. Lives only as long
 * as the worker that submitted it.
 */
export interface GenerationJob<TRequest> {
  /** Task UUID for video jobs, customer asset id for sound jobs. */
  id: string;
  inputRef: string;
  state: JobState;
  /** Remote URL of the produced artifact, set once the job succeeded. */
  resultRef?: string;
  request: TRequest;
}

export interface JobClient<TInput, TRequest, TResult> {
  submit(input: TInput): Promise<GenerationJob<TRequest>>;
  awaitCompletion(job: GenerationJob<TRequest>, timeoutSeconds: number): Promise<TResult>;
}

export interface ArtifactSource {
  fetch(url: string, destinationPath: string): Promise<string>;
}

export interface BatchItem {
  index: number;
  inputPath: string;
  customPrompt?: string;
}

export interface StageFailure {
  success: false;
  index: number;
  inputRef: string;
  errorCode: PipelineErrorCode;
  errorMessage: string;
}

export interface Stage1Success {
  success: true;
  index: number;
  inputRef: string;
  outputArtifactPath: string;
  remoteUrl: string;
  videoUUID?: string;
  cost?: number;
  seed?: number;
}

export interface Stage2Success {
  success: true;
  index: number;
  inputRef: string;
  /** First generated sample; same as outputArtifactPaths[0]. */
  outputArtifactPath: string;
  outputArtifactPaths: string[];
  remoteUrl: string;
  remoteUrls: string[];
}

export type Stage1Result = Stage1Success | StageFailure;
export type Stage2Result = Stage2Success | StageFailure;

export interface PipelineSummary {
  imagesProcessed: number;
  videosSucceeded: number;
  videosFailed: number;
  soundsSucceeded: number;
  soundsFailed: number;
}

export interface PipelineReport {
  outputDir: string;
  soundSkipped: boolean;
  videoResults: Stage1Result[];
  soundResults: Stage2Result[];
  summary: PipelineSummary;
}

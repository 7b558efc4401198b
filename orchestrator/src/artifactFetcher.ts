import { createWriteStream } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import { pipeline } from 'node:stream/promises';
import { errorMessage, TransferError } from './errors.js';
import { logger } from './logger.js';
import type { ArtifactSource } from './types.js';

export const DOWNLOAD_CHUNK_SIZE = 8 * 1024;

export interface DownloadProgress {
  downloadedBytes: number;
  totalBytes: number;
  fraction: number;
}

export interface ArtifactFetcherOptions {
  chunkSize?: number;
  onProgress?: (progress: DownloadProgress) => void;
}

type ResponseBody = NonNullable<Response['body']>;

async function* readInChunks(body: ResponseBody, chunkSize: number): AsyncGenerator<Buffer> {
  const reader = body.getReader();
  let pending = Buffer.alloc(0);

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      pending = pending.length > 0 ? Buffer.concat([pending, Buffer.from(value)]) : Buffer.from(value);

      while (pending.length >= chunkSize) {
        yield pending.subarray(0, chunkSize);
        pending = pending.subarray(chunkSize);
      }
    }

    if (pending.length > 0) {
      yield pending;
    }
  } finally {
    reader.releaseLock();
  }
}

/**
 * Downloads generated artifacts to local files.
 *
 * Bodies with a known content-length are streamed to disk in fixed-size
 * chunks; anything else is written in one go. Never retries.
 */
export class ArtifactFetcher implements ArtifactSource {
  private readonly chunkSize: number;
  private readonly onProgress?: (progress: DownloadProgress) => void;

  constructor(options: ArtifactFetcherOptions = {}) {
    this.chunkSize = options.chunkSize ?? DOWNLOAD_CHUNK_SIZE;
    this.onProgress = options.onProgress;
  }

  async fetch(url: string, destinationPath: string): Promise<string> {
    let response: Response;
    try {
      response = await fetch(url);
    } catch (error) {
      throw new TransferError(`Failed to download ${url}: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new TransferError(`Failed to download ${url}: HTTP ${response.status}`, {
        details: { status: response.status }
      });
    }

    const totalBytes = Number(response.headers.get('content-length') ?? 0) || 0;

    try {
      if (totalBytes === 0 || !response.body) {
        const content = Buffer.from(await response.arrayBuffer());
        await writeFile(destinationPath, content);
        this.report({ downloadedBytes: content.length, totalBytes: content.length, fraction: 1 }, destinationPath);
      } else {
        await pipeline(this.track(readInChunks(response.body, this.chunkSize), totalBytes, destinationPath), createWriteStream(destinationPath));
      }
    } catch (error) {
      throw new TransferError(`Failed to save ${url} to ${destinationPath}: ${errorMessage(error)}`, {
        cause: error
      });
    }

    logger.info({ url, destinationPath }, 'Artifact downloaded');
    return destinationPath;
  }

  private async *track(chunks: AsyncGenerator<Buffer>, totalBytes: number, destinationPath: string): AsyncGenerator<Buffer> {
    let downloadedBytes = 0;
    for await (const chunk of chunks) {
      downloadedBytes += chunk.length;
      this.report({ downloadedBytes, totalBytes, fraction: downloadedBytes / totalBytes }, destinationPath);
      yield chunk;
    }
  }

  private report(progress: DownloadProgress, destinationPath: string): void {
    logger.debug({ destinationPath, ...progress }, 'Download progress');
    this.onProgress?.(progress);
  }
}

import { stat } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import type { PipelineInput } from './pipeline.js';

export const ALLOWED_IMAGE_EXTENSIONS: readonly string[] = ['.png', '.jpg', '.jpeg', '.webp'];

export interface RejectedInput {
  path: string;
  reason: 'not_found' | 'unsupported_type';
}

export function isAllowedImage(fileName: string): boolean {
  return ALLOWED_IMAGE_EXTENSIONS.includes(extname(fileName).toLowerCase());
}

/**
 * Replace anything outside [A-Za-z0-9._-] so an uploaded name can be used on disk.
 */
export function sanitizeFileName(fileName: string): string {
  const cleaned = basename(fileName.replace(/\\/g, '/'))
    .replace(/[^A-Za-z0-9._-]+/g, '_')
    .replace(/^[._]+/, '');
  return cleaned.length > 0 ? cleaned : 'upload';
}

export async function collectValidImages(
  paths: readonly string[]
): Promise<{ valid: string[]; rejected: RejectedInput[] }> {
  const valid: string[] = [];
  const rejected: RejectedInput[] = [];

  for (const path of paths) {
    const info = await stat(path).catch(() => null);
    if (!info?.isFile()) {
      rejected.push({ path, reason: 'not_found' });
    } else if (!isAllowedImage(path)) {
      rejected.push({ path, reason: 'unsupported_type' });
    } else {
      valid.push(path);
    }
  }

  return { valid, rejected };
}

/**
 * Pair images with prompts by position. Missing or blank prompts mean no
 * override; surplus prompts are dropped.
 */
export function buildPipelineInputs(
  imagePaths: readonly string[],
  prompts: readonly (string | null | undefined)[] = []
): PipelineInput[] {
  return imagePaths.map((imagePath, index) => {
    const prompt = prompts[index]?.trim();
    return prompt ? { imagePath, customPrompt: prompt } : { imagePath };
  });
}

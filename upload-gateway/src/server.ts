/**
 * Express app for the upload/download service
 */

import { randomUUID } from 'node:crypto';
import { rm, stat } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import {
  buildPipelineInputs,
  ConfigurationError,
  isAllowedImage,
  logger,
  sanitizeFileName,
  ValidationError,
  type PipelineInput,
  type PipelineReport
} from '@clipforge/orchestrator';

export const PUBLIC_DIR = fileURLToPath(new URL('../public', import.meta.url));

export interface RunPipelineOptions {
  outputDir: string;
  maxWorkers: number;
  addSound: boolean;
}

/** Report returned by the generate endpoint; files live under `/api/download/<runId>/`. */
export type GenerationResponse = PipelineReport & { runId: string };

export interface GatewayDependencies {
  uploadDir: string;
  outputDir: string;
  maxFileBytes: number;
  maxWorkers: number;
  corsOrigin?: string;
  runPipeline: (inputs: PipelineInput[], options: RunPipelineOptions) => Promise<PipelineReport>;
}

// Multer leaves repeated text fields as an array and single ones as a string
const formFieldsSchema = z.object({
  prompts: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .transform((value) => (value === undefined ? [] : Array.isArray(value) ? value : [value])),
  add_sound: z.string().optional()
});

function uploadedFiles(req: Request): Express.Multer.File[] {
  return Array.isArray(req.files) ? req.files : [];
}

async function removeUploads(files: Express.Multer.File[]): Promise<void> {
  await Promise.all(
    files.map((file) =>
      rm(file.path, { force: true }).catch((error: unknown) => {
        logger.warn({ path: file.path, error }, 'Failed to remove upload');
      })
    )
  );
}

// A single path segment that cannot climb out of its parent
const isPlainName = (name: string | undefined): name is string =>
  name !== undefined && name !== '' && name === basename(name) && !name.startsWith('.');

/**
 * Report the names the user uploaded instead of the temporary upload paths,
 * which are gone by the time the client reads the report.
 */
function withUploadNames(report: PipelineReport, files: Express.Multer.File[], runId: string): GenerationResponse {
  const names = new Map<string, string>(files.map((file) => [file.path, file.originalname]));
  return {
    ...report,
    runId,
    videoResults: report.videoResults.map((result) => ({
      ...result,
      inputRef: names.get(result.inputRef) ?? result.inputRef
    }))
  };
}

async function isFile(path: string): Promise<boolean> {
  const info = await stat(path).catch(() => null);
  return info?.isFile() ?? false;
}

export function buildServer(deps: GatewayDependencies): express.Application {
  const app = express();
  const outputDir = resolve(deps.outputDir);

  const upload = multer({
    storage: multer.diskStorage({
      destination: deps.uploadDir,
      filename: (_req, file, cb) => {
        cb(null, `${randomUUID()}_${sanitizeFileName(file.originalname)}`);
      }
    }),
    limits: {
      fileSize: deps.maxFileBytes
    },
    fileFilter: (_req, file, cb) => {
      if (isAllowedImage(file.originalname)) {
        cb(null, true);
      } else {
        cb(new ValidationError(`Unsupported file type: ${file.originalname}`));
      }
    }
  });

  app.use(cors({ origin: deps.corsOrigin ?? '*' }));
  app.use(express.static(PUBLIC_DIR));

  app.get('/healthz', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.post(
    '/api/generate-videos',
    upload.array('files'),
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      const files = uploadedFiles(req);
      try {
        if (files.length === 0) {
          res.status(400).json({ error: 'No files uploaded' });
          return;
        }

        const fields = formFieldsSchema.safeParse(req.body);
        if (!fields.success) {
          await removeUploads(files);
          res.status(400).json({ error: 'Invalid form fields' });
          return;
        }

        const addSound = (fields.data.add_sound ?? 'true').toLowerCase() === 'true';
        const inputs = buildPipelineInputs(
          files.map((file) => file.path),
          fields.data.prompts
        );

        // Every request writes into its own directory so concurrent runs never share files
        const runId = randomUUID();
        logger.info({ runId, files: files.length, addSound }, 'Generation request received');
        const report = await deps.runPipeline(inputs, {
          outputDir: join(outputDir, runId),
          maxWorkers: Math.min(deps.maxWorkers, files.length),
          addSound
        });

        await removeUploads(files);
        res.json(withUploadNames(report, files, runId));
      } catch (error) {
        await removeUploads(files);
        next(error);
      }
    }
  );

  app.get(
    '/api/download/:runId/:filename',
    async (req: Request, res: Response, next: NextFunction): Promise<void> => {
      try {
        const { runId, filename } = req.params;
        const filePath = isPlainName(runId) && isPlainName(filename) ? join(outputDir, runId, filename) : null;

        if (!filePath || !(await isFile(filePath))) {
          res.status(404).json({ error: 'File not found' });
          return;
        }

        res.download(filePath, filename, (error) => {
          if (error && !res.headersSent) {
            next(error);
          }
        });
      } catch (error) {
        next(error);
      }
    }
  );

  // Error handling middleware
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction): void => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      const error =
        err.code === 'LIMIT_FILE_SIZE'
          ? `File too large (max ${Math.round(deps.maxFileBytes / (1024 * 1024))} MB)`
          : err.message;
      logger.warn({ code: err.code, field: err.field }, 'Upload rejected');
      res.status(status).json({ error });
      return;
    }

    if (err instanceof ValidationError) {
      logger.warn({ error: err.message }, 'Upload rejected');
      res.status(400).json({ error: err.message });
      return;
    }

    logger.error({ err }, 'Request failed');
    res.status(500).json({
      error: err instanceof ConfigurationError ? 'Service is not configured' : 'Internal server error',
      message: err.message
    });
  });

  return app;
}

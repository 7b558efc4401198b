import { parseArgs } from 'node:util';
import { loadRuntimeConfig, type RuntimeConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import { buildPipelineInputs, collectValidImages } from './inputs.js';
import { logger } from './logger.js';
import { createPipeline, type CreatePipelineOptions, type PipelineInput } from './pipeline.js';
import { initTelegram, sendPipelineFailureNotification } from './telegram.js';
import type { PipelineReport } from './types.js';

export interface CliOptions {
  images: string[];
  outputDir?: string;
  maxWorkers?: number;
  skipSound: boolean;
  prompts: string[];
  json: boolean;
  help: boolean;
}

export interface PipelineRunner {
  run(inputs: readonly PipelineInput[]): Promise<PipelineReport>;
}

export interface CliDependencies {
  env?: NodeJS.ProcessEnv;
  createPipeline?: (config: RuntimeConfig, options: CreatePipelineOptions) => PipelineRunner;
  notify?: (config: RuntimeConfig, report: PipelineReport) => Promise<void>;
  stdout?: { write(chunk: string): unknown };
}

export function usage(): string {
  return [
    'Usage:',
    '  clipforge <image...> [--output-dir <dir>] [--max-workers <n>] [--skip-sound] [--prompt <text>]... [--json]',
    '',
    'Flags:',
    '  -o, --output-dir   Directory for generated files (default OUTPUT_DIR or ./output).',
    '  -w, --max-workers  Parallel jobs per stage (default MAX_CONCURRENT_WORKERS or 3).',
    '      --skip-sound   Only generate videos.',
    '  -p, --prompt       Custom prompt for the image at the same position. Repeatable.',
    '      --json         Print the run report as JSON on stdout.',
    '  -h, --help         Show this help.'
  ].join('\n');
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'output-dir': { type: 'string', short: 'o' },
      'max-workers': { type: 'string', short: 'w' },
      'skip-sound': { type: 'boolean', default: false },
      prompt: { type: 'string', short: 'p', multiple: true },
      json: { type: 'boolean', default: false },
      help: { type: 'boolean', short: 'h', default: false }
    }
  });

  let maxWorkers: number | undefined;
  if (values['max-workers'] !== undefined) {
    maxWorkers = Number(values['max-workers']);
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new Error('Invalid --max-workers. Use an integer >= 1.');
    }
  }

  return {
    images: positionals,
    outputDir: values['output-dir'],
    maxWorkers,
    skipSound: values['skip-sound'] ?? false,
    prompts: values.prompt ?? [],
    json: values.json ?? false,
    help: values.help ?? false
  };
}

async function notifyFailures(config: RuntimeConfig, report: PipelineReport): Promise<void> {
  if (initTelegram(config)) {
    await sendPipelineFailureNotification(report);
  }
}

/**
 * Run one batch from the command line.
 *
 * @returns The process exit code.
 */
export async function runCli(argv: string[], deps: CliDependencies = {}): Promise<number> {
  const stdout = deps.stdout ?? process.stdout;

  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    logger.error({ error }, 'Invalid arguments');
    stdout.write(`${usage()}\n`);
    return 1;
  }

  if (options.help) {
    stdout.write(`${usage()}\n`);
    return 0;
  }

  // Configuration is checked before anything touches the network
  let config: RuntimeConfig;
  try {
    config = loadRuntimeConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      logger.error({ issues: error.issues }, error.message);
      return 1;
    }
    throw error;
  }

  const { valid, rejected } = await collectValidImages(options.images);
  for (const item of rejected) {
    logger.warn({ path: item.path, reason: item.reason }, 'Skipping input');
  }
  if (valid.length === 0) {
    logger.error('No valid image files found');
    return 1;
  }

  // Prompts follow the positional order of the images that were kept
  const keptPrompts = options.images
    .map((path, position) => ({ path, prompt: options.prompts[position] }))
    .filter((entry) => valid.includes(entry.path))
    .map((entry) => entry.prompt);

  const pipeline = (deps.createPipeline ?? createPipeline)(config, {
    outputDir: options.outputDir,
    maxWorkers: options.maxWorkers,
    addSound: !options.skipSound
  });
  const report = await pipeline.run(buildPipelineInputs(valid, keptPrompts));

  logger.info({ outputDir: report.outputDir, ...report.summary }, 'Batch finished');
  if (options.json) {
    stdout.write(`${JSON.stringify(report, null, 2)}\n`);
  }

  await (deps.notify ?? notifyFailures)(config, report);
  return 0;
}

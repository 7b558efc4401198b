import { ConfigurationError } from '@clipforge/orchestrator';
import { z } from 'zod';

const schema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  UPLOAD_DIR: z.string().min(1).default('uploads'),
  OUTPUT_DIR: z.string().min(1).default('output'),
  MAX_FILE_MB: z.coerce.number().positive().default(50),
  MAX_WORKERS: z.coerce.number().int().min(1).default(3),
  CORS_ORIGIN: z.string().min(1).default('*')
});

export type GatewayConfig = z.infer<typeof schema>;

export function loadGatewayConfig(env: NodeJS.ProcessEnv = process.env): GatewayConfig {
  const result = schema.safeParse({
    PORT: env.UPLOAD_GATEWAY_PORT,
    HOST: env.UPLOAD_GATEWAY_HOST,
    UPLOAD_DIR: env.UPLOAD_DIR,
    OUTPUT_DIR: env.OUTPUT_DIR,
    MAX_FILE_MB: env.UPLOAD_MAX_FILE_MB,
    MAX_WORKERS: env.UPLOAD_MAX_WORKERS,
    CORS_ORIGIN: env.UPLOAD_GATEWAY_CORS_ORIGIN
  });
  if (result.success) {
    return result.data;
  }

  const issues = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
  throw new ConfigurationError(`Gateway configuration validation failed: ${issues.join(', ')}`, issues);
}

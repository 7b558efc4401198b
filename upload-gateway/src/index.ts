import {
  createPipeline,
  initTelegram,
  loadEnvFiles,
  loadRuntimeConfig,
  logger,
  sendPipelineFailureNotification
} from '@clipforge/orchestrator';
import { loadGatewayConfig } from './config.js';
import { buildServer } from './server.js';

async function main(): Promise<void> {
  loadEnvFiles();
  const gateway = loadGatewayConfig();
  // Fail at startup rather than on the first upload
  const runtime = loadRuntimeConfig();
  const notify = initTelegram(runtime);

  const app = buildServer({
    uploadDir: gateway.UPLOAD_DIR,
    outputDir: gateway.OUTPUT_DIR,
    maxFileBytes: gateway.MAX_FILE_MB * 1024 * 1024,
    maxWorkers: gateway.MAX_WORKERS,
    corsOrigin: gateway.CORS_ORIGIN,
    runPipeline: async (inputs, options) => {
      const report = await createPipeline(runtime, options).run(inputs);
      if (notify) {
        await sendPipelineFailureNotification(report);
      }
      return report;
    }
  });

  const server = app.listen(gateway.PORT, gateway.HOST, () => {
    logger.info({ host: gateway.HOST, port: gateway.PORT }, 'Upload gateway listening');
  });

  const shutdown = (signal: NodeJS.Signals) => {
    logger.info({ signal }, 'Shutting down upload gateway');
    server.close((error) => {
      if (error) {
        logger.error({ error }, 'Error while closing server');
        process.exit(1);
      }
      process.exit(0);
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((error) => {
  logger.fatal({ error }, 'Upload gateway failed to start');
  process.exit(1);
});

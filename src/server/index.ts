import { createServer } from 'http';
import { validateEnv, type Env } from './config/env.js';
import { logger } from './utils/logger.js';
import { createApp } from './app.js';
import { createPipelineServices } from './config/serviceInitialization.js';
import { runStartupPipeline } from './services/pipeline/StartupPipeline.js';
import { ShutdownCoordinator } from './utils/shutdownCoordinator.js';

// Validate environment variables on startup
let env: Env;
try {
  env = validateEnv();
} catch (error) {
  logger.fatal({ error }, 'Environment validation failed');
  process.exit(1);
}

const shutdownCoordinator = new ShutdownCoordinator();
shutdownCoordinator.installSignalHandlers();

async function startServer(): Promise<void> {
  const services = createPipelineServices(env);
  await services.store.ensureLayout();

  // Fetch and convert once; a failure is reported through /status
  const pipeline = await runStartupPipeline(services);

  const app = createApp({ store: services.store, pipeline });
  const httpServer = createServer(app);

  shutdownCoordinator.register('http-server', () => new Promise<void>((resolve, reject) => {
    httpServer.close((error) => (error ? reject(error) : resolve()));
    httpServer.closeIdleConnections();
  }), 10000);

  httpServer.on('error', (error: NodeJS.ErrnoException) => {
    logger.fatal({ error, port: env.PORT, host: env.HOST }, 'HTTP server error');
    process.exit(1);
  });

  httpServer.listen(env.PORT, env.HOST, () => {
    logger.info({
      port: env.PORT,
      host: env.HOST,
      dataDir: env.DATA_DIR,
      pipeline: pipeline.status,
    }, `Server listening on http://${env.HOST}:${env.PORT}`);
  });
}

startServer().catch((error: unknown) => {
  logger.fatal({ error }, 'Failed to start server');
  shutdownCoordinator.shutdown('STARTUP_FAILURE').then(
    () => process.exit(1),
    () => process.exit(1)
  );
});

process.on('unhandledRejection', (reason: unknown) => {
  logger.error({
    reason: reason instanceof Error ? reason : { reason: String(reason) },
  }, 'Unhandled promise rejection');
});

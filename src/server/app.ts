import express, { type Express } from 'express';
import helmet from 'helmet';
import cors from 'cors';
import { requestIdMiddleware } from './middleware/requestId.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createArtifactRoutes } from './routes/artifactRoutes.js';
import type { ArtifactStore } from './services/artifacts/ArtifactStore.js';
import type { PipelineResult } from './services/pipeline/StartupPipeline.js';

export interface AppDependencies {
  store: ArtifactStore;
  pipeline?: PipelineResult;
}

/**
 * Build the Express application; the startup pipeline outcome is passed in
 */
export function createApp({ store, pipeline = { status: 'pending' } }: AppDependencies): Express {
  const app = express();

  app.disable('x-powered-by');
  app.use(requestIdMiddleware); // Request ID and logging context - must be first
  app.use(helmet()); // Security headers - must be early
  app.use(cors({ methods: ['GET', 'HEAD', 'OPTIONS'] }));

  app.use(createArtifactRoutes({ store, pipeline }));

  app.use(notFoundHandler);
  // Error handler must be last
  app.use(errorHandler);

  return app;
}

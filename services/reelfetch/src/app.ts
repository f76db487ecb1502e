import express, { type Express } from 'express';
import { createMasterApiKeyMiddleware } from './middleware/masterApiKey.js';
import { createHealthRouter } from './routes/health.js';
import { createJobsRouter } from './routes/jobs.js';
import { createPresetsRouter } from './routes/presets.js';
import type { AppContext } from './types/appContext.js';

export interface AppOptions {
  masterApiKey: string;
  /** Serves locally stored artifacts under /artifacts when set. */
  artifactsDir?: string;
}

export function createApp(ctx: AppContext, options: AppOptions): Express {
  const app = express();
  app.use(express.json({ limit: '64kb' }));

  app.use(createHealthRouter(ctx));
  app.use('/v1', createMasterApiKeyMiddleware(options.masterApiKey));
  app.use(createPresetsRouter(ctx));
  app.use(createJobsRouter(ctx));
  if (options.artifactsDir) {
    app.use('/artifacts', express.static(options.artifactsDir));
  }

  app.use((req, res) => {
    res.status(404).json({
      error: {
        code: 'NOT_FOUND',
        message: `Route ${req.method} ${req.path} not found`,
      },
    });
  });

  return app;
}

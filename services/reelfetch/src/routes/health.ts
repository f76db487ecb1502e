import { Router } from 'express';
import type { AppContext } from '../types/appContext.js';

export function createHealthRouter(ctx: AppContext): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    try {
      const toolchain = await ctx.checkToolchain();
      const stats = ctx.pipeline.stats();
      const healthy = toolchain.ffmpeg && toolchain.ffprobe && ctx.pipeline.accepting;

      res.status(healthy ? 200 : 503).json({
        status: healthy ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        accepting_jobs: ctx.pipeline.accepting,
        storage: ctx.storageBackend,
        toolchain,
        queue: {
          depth: stats.queued,
          capacity: stats.capacity,
        },
        pool: {
          size: stats.poolSize,
          in_flight: stats.inFlight,
          peak_in_flight: stats.peakInFlight,
        },
        jobs: {
          done: stats.done,
          failed: stats.failed,
          cancelled: stats.cancelled,
          retried: stats.retried,
        },
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : 'Health check failed';
      res.status(500).json({
        status: 'error',
        error: {
          code: 'HEALTH_CHECK_FAILED',
          message,
        },
      });
    }
  });

  return router;
}

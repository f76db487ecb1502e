import { Router, type Response } from 'express';
import type {
  CancelJobResponse,
  JobSnapshot as JobSnapshotBody,
  SubmitJobResponse,
} from 'reelfetch-client';
import {
  InvalidPresetError,
  PipelineClosedError,
  QueueSaturatedError,
} from '../core/errors.js';
import { parseJobRequest } from '../core/jobRequest.js';
import type { AppContext } from '../types/appContext.js';
import type { JobSnapshot } from '../types/jobs.js';

function toSnapshotBody(snapshot: JobSnapshot): JobSnapshotBody {
  return {
    job_id: snapshot.id,
    status: snapshot.state,
    source_ref: snapshot.sourceRef,
    output_spec: snapshot.outputSpec,
    platform: snapshot.platform,
    attempt_count: snapshot.attemptCount,
    submitted_at: snapshot.submittedAt,
    cancel_requested: snapshot.cancelRequested,
  };
}

function sendJobNotFound(res: Response, jobId: string): void {
  res.status(404).json({
    error: {
      code: 'JOB_NOT_FOUND',
      message: `Job ${jobId} not found`,
    },
  });
}

export function createJobsRouter(ctx: AppContext): Router {
  const router = Router();

  router.post('/v1/jobs', (req, res) => {
    const parsed = parseJobRequest(req.body);
    if (!parsed.ok) {
      res.status(400).json({
        error: {
          code: 'VALIDATION_ERROR',
          message: parsed.message,
        },
      });
      return;
    }

    const payload = parsed.value;
    const outputSpec = payload.outputSpec ?? ctx.defaultPreset;

    try {
      const jobId = ctx.pipeline.submit(payload.sourceRef, outputSpec, {
        callbackUrl: payload.callbackUrl,
        reference: payload.reference,
      });
      const snapshot = ctx.pipeline.get(jobId);

      const body: SubmitJobResponse = {
        job_id: jobId,
        status: snapshot?.state ?? 'queued',
        output_spec: outputSpec,
        platform: snapshot?.platform ?? 'Generic',
        poll_url: `${ctx.publicBaseUrl}/v1/jobs/${jobId}`,
      };
      res.status(202).json(body);
    } catch (error) {
      if (error instanceof QueueSaturatedError) {
        res.setHeader('Retry-After', String(ctx.retryAfterSeconds));
        res.status(503).json({
          error: {
            code: 'QUEUE_SATURATED',
            message: error.message,
            details: {
              capacity: ctx.pipeline.stats().capacity,
              retry_after_seconds: ctx.retryAfterSeconds,
            },
          },
        });
        return;
      }
      if (error instanceof PipelineClosedError) {
        res.status(503).json({
          error: {
            code: 'PIPELINE_CLOSED',
            message: error.message,
          },
        });
        return;
      }
      if (error instanceof InvalidPresetError) {
        res.status(400).json({
          error: {
            code: 'VALIDATION_ERROR',
            message: error.message,
          },
        });
        return;
      }

      const message = error instanceof Error ? error.message : 'Failed to submit job';
      res.status(500).json({
        error: {
          code: 'INTERNAL_ERROR',
          message,
        },
      });
    }
  });

  router.get('/v1/jobs/:jobId', (req, res) => {
    const snapshot = ctx.pipeline.get(req.params.jobId);
    if (!snapshot) {
      sendJobNotFound(res, req.params.jobId);
      return;
    }
    res.json(toSnapshotBody(snapshot));
  });

  router.post('/v1/jobs/:jobId/cancel', (req, res) => {
    const result = ctx.pipeline.cancel(req.params.jobId);
    if (result === 'not_found') {
      sendJobNotFound(res, req.params.jobId);
      return;
    }
    const body: CancelJobResponse = { job_id: req.params.jobId, result };
    res.json(body);
  });

  return router;
}

import { Worker } from 'bullmq';
import { parseJobRequest } from '../core/jobRequest.js';
import type { Pipeline } from '../core/pipeline.js';
import type { WebhookContext } from '../providers/delivery/webhook.js';
import type { Logger, PresetName } from '../types/jobs.js';
import { createRedisConnectionOptions } from './connection.js';

export const INTAKE_QUEUE_NAME = 'reelfetch-intake';

/** Producers enqueue the same body the HTTP API accepts. */
export interface IntakePayload {
  source_ref: string;
  output_spec?: PresetName;
  callback_url: string;
  reference?: string;
}

export interface IntakeResult {
  jobId: string;
}

/**
 * Admits one intake message into the pipeline. Throws on invalid payloads and
 * on a saturated or closed pipeline, which fails the BullMQ job so the
 * producer's attempts and backoff apply.
 */
export function processIntakePayload(
  pipeline: Pipeline<WebhookContext>,
  payload: unknown,
  defaultPreset: PresetName,
): IntakeResult {
  const parsed = parseJobRequest(payload);
  if (!parsed.ok) {
    throw new Error(`Invalid intake payload: ${parsed.message}`);
  }

  const request = parsed.value;
  const jobId = pipeline.submit(request.sourceRef, request.outputSpec ?? defaultPreset, {
    callbackUrl: request.callbackUrl,
    reference: request.reference,
  });
  return { jobId };
}

export interface IntakeWorkerOptions {
  redisUrl: string;
  defaultPreset: PresetName;
  logger?: Logger;
}

export function startIntakeWorker(
  pipeline: Pipeline<WebhookContext>,
  { redisUrl, defaultPreset, logger = console }: IntakeWorkerOptions,
): Worker<IntakePayload, IntakeResult, string> {
  const worker = new Worker<IntakePayload, IntakeResult, string>(
    INTAKE_QUEUE_NAME,
    async (job) => processIntakePayload(pipeline, job.data, defaultPreset),
    {
      connection: createRedisConnectionOptions(redisUrl),
      concurrency: 1,
    },
  );

  worker.on('ready', () => {
    logger.log(`[reelfetch-intake] ready queue=${INTAKE_QUEUE_NAME}`);
  });
  worker.on('completed', (job, result) => {
    logger.log(`[reelfetch-intake] admitted message_id=${job.id ?? 'unknown'} job_id=${result.jobId}`);
  });
  worker.on('failed', (job, error) => {
    logger.error(`[reelfetch-intake] rejected message_id=${job?.id ?? 'unknown'} error=${error.message}`);
  });
  worker.on('error', (error) => {
    logger.error('[reelfetch-intake] worker error', error);
  });

  return worker;
}

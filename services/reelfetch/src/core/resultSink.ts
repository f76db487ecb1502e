import { setTimeout as sleep } from 'timers/promises';
import type {
  Artifact,
  DeliveryJob,
  DeliveryTarget,
  FailureReport,
  Logger,
} from '../types/jobs.js';
import { errorMessage } from './errors.js';
import type { StagingArea } from './staging.js';

export type DeliveryOutcome =
  | { ok: true; artifact: Artifact }
  | { ok: false; failure: FailureReport };

export type DeliveryAck =
  | { state: 'done' }
  | { state: 'failed'; failure: FailureReport };

export interface ResultSinkOptions<TContext> {
  target: DeliveryTarget<TContext>;
  staging: StagingArea;
  retryDelayMs: number;
  logger?: Logger;
}

/**
 * Hands a terminal Job to the delivery target and always clears its staging
 * directory afterwards. Each target call gets one retry.
 */
export class ResultSink<TContext> {
  private readonly logger: Logger;

  constructor(private readonly options: ResultSinkOptions<TContext>) {
    this.logger = options.logger ?? console;
  }

  async deliver(job: DeliveryJob<TContext>, outcome: DeliveryOutcome): Promise<DeliveryAck> {
    try {
      if (!outcome.ok) {
        await this.reportFailure(job, outcome.failure);
        return { state: 'failed', failure: outcome.failure };
      }

      try {
        await this.withRetry('onComplete', job.id, () => this.options.target.onComplete(job, outcome.artifact));
        return { state: 'done' };
      } catch (error) {
        const failure: FailureReport = {
          kind: 'DeliveryError',
          detail: `Delivery of artifact failed: ${errorMessage(error)}`,
        };
        await this.reportFailure(job, failure);
        return { state: 'failed', failure };
      }
    } finally {
      await this.cleanup(job.id);
    }
  }

  /** Drops a cancelled Job's staging without contacting the target. */
  async discard(jobId: string): Promise<void> {
    await this.cleanup(jobId);
  }

  private async reportFailure(job: DeliveryJob<TContext>, failure: FailureReport): Promise<void> {
    try {
      await this.withRetry('onFailure', job.id, () => this.options.target.onFailure(job, failure));
    } catch (error) {
      this.logger.error(
        `[reelfetch-sink] failure report undeliverable job_id=${job.id} kind=${failure.kind} target=${this.options.target.name}`,
        error,
      );
    }
  }

  private async withRetry(operation: string, jobId: string, call: () => Promise<void>): Promise<void> {
    try {
      await call();
    } catch (error) {
      this.logger.warn(
        `[reelfetch-sink] ${operation} failed job_id=${jobId} target=${this.options.target.name} retry_in_ms=${this.options.retryDelayMs} error=${errorMessage(error)}`,
      );
      await sleep(this.options.retryDelayMs);
      await call();
    }
  }

  private async cleanup(jobId: string): Promise<void> {
    try {
      await this.options.staging.cleanup(jobId);
    } catch (error) {
      this.logger.error(`[reelfetch-sink] staging cleanup failed job_id=${jobId}`, error);
    }
  }
}

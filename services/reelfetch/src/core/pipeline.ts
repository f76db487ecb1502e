import { randomUUID } from 'crypto';
import type {
  CancelOutcome,
  DeliveryTarget,
  Job,
  JobSnapshot,
  Logger,
  PipelineStats,
} from '../types/jobs.js';
import { InvalidPresetError, PipelineClosedError } from './errors.js';
import { JobQueue } from './jobQueue.js';
import { detectPlatform, parseSourceUrl } from './platforms.js';
import { isPresetName } from './presets.js';
import { ResultSink } from './resultSink.js';
import type { StagingArea } from './staging.js';
import {
  WorkerPool,
  type JobFetcher,
  type JobTranscoder,
  type StateChangeListener,
} from './workerPool.js';

export interface PipelineOptions<TContext> {
  fetcher: JobFetcher;
  transcoder: JobTranscoder;
  target: DeliveryTarget<TContext>;
  staging: StagingArea;
  poolSize: number;
  queueCapacity: number;
  maxAttempts: number;
  deliveryRetryDelayMs: number;
  logger?: Logger;
  onStateChange?: StateChangeListener<TContext>;
}

type PipelineStatus = 'idle' | 'running' | 'draining' | 'stopped';

function snapshotOf<TContext>(job: Job<TContext>): JobSnapshot {
  return {
    id: job.id,
    sourceRef: job.sourceRef,
    outputSpec: job.outputSpec,
    platform: job.platform,
    state: job.state,
    attemptCount: job.attemptCount,
    submittedAt: job.submittedAt,
    cancelRequested: job.cancelRequested,
  };
}

/**
 * Owns the queue, the worker pool and the registry of live Jobs. A Job stays
 * in the registry from submission until it is delivered, failed or cancelled.
 */
export class Pipeline<TContext> {
  private readonly logger: Logger;
  private readonly queue: JobQueue<Job<TContext>>;
  private readonly pool: WorkerPool<TContext>;
  private readonly jobs = new Map<string, Job<TContext>>();
  private readonly idleWaiters: Array<() => void> = [];
  private status: PipelineStatus = 'idle';
  private removedFromQueue = 0;

  constructor(private readonly options: PipelineOptions<TContext>) {
    this.logger = options.logger ?? console;
    this.queue = new JobQueue<Job<TContext>>(options.queueCapacity);
    this.pool = new WorkerPool<TContext>({
      queue: this.queue,
      fetcher: options.fetcher,
      transcoder: options.transcoder,
      sink: new ResultSink<TContext>({
        target: options.target,
        staging: options.staging,
        retryDelayMs: options.deliveryRetryDelayMs,
        logger: this.logger,
      }),
      staging: options.staging,
      poolSize: options.poolSize,
      maxAttempts: options.maxAttempts,
      logger: this.logger,
      onStateChange: options.onStateChange,
      onSettled: (job) => this.forget(job.id),
    });
  }

  get accepting(): boolean {
    return this.status === 'idle' || this.status === 'running';
  }

  async start(): Promise<void> {
    if (this.status !== 'idle') return;
    await this.options.staging.sweep();
    this.pool.start();
    // drainAndStop may have been called during the sweep.
    if (this.status === 'idle') this.status = 'running';
  }

  submit(sourceRef: string, outputSpec: string, requesterContext: TContext): string {
    if (!this.accepting) {
      throw new PipelineClosedError();
    }
    if (!isPresetName(outputSpec)) {
      throw new InvalidPresetError(outputSpec);
    }

    const url = parseSourceUrl(sourceRef);
    const job: Job<TContext> = {
      id: randomUUID(),
      sourceRef,
      outputSpec,
      requesterContext,
      submittedAt: new Date().toISOString(),
      platform: url ? detectPlatform(url) : 'Generic',
      state: 'queued',
      attemptCount: 0,
      cancelRequested: false,
    };

    this.queue.submit(job);
    this.jobs.set(job.id, job);
    this.logger.log(
      `[reelfetch] queued job_id=${job.id} preset=${job.outputSpec} platform=${job.platform} depth=${this.queue.size}`,
    );
    return job.id;
  }

  get(id: string): JobSnapshot | undefined {
    const job = this.jobs.get(id);
    return job ? snapshotOf(job) : undefined;
  }

  cancel(id: string): CancelOutcome {
    const job = this.jobs.get(id);
    if (!job) return 'not_found';

    if (this.queue.cancel(id)) {
      this.removedFromQueue += 1;
      this.logger.log(`[reelfetch] cancelled queued job_id=${id}`);
      this.forget(id);
      return 'removed';
    }

    if (job.state === 'delivering') {
      this.logger.log(`[reelfetch] cancellation too late job_id=${id} state=${job.state}`);
      return 'too_late';
    }

    job.cancelRequested = true;
    this.logger.log(`[reelfetch] cancellation requested job_id=${id} state=${job.state}`);
    return 'flagged';
  }

  stats(): PipelineStats {
    const pool = this.pool.stats();
    return {
      queued: this.queue.size,
      capacity: this.queue.capacity,
      poolSize: this.pool.size,
      inFlight: pool.inFlight,
      peakInFlight: pool.peakInFlight,
      done: pool.done,
      failed: pool.failed,
      cancelled: pool.cancelled + this.removedFromQueue,
      retried: pool.retried,
    };
  }

  /**
   * Stops intake, waits for every queued and in-flight Job (retries included)
   * to settle, then shuts the workers down.
   */
  async drainAndStop(): Promise<void> {
    if (this.status === 'stopped' || this.status === 'draining') {
      await this.idle();
      await this.pool.stopped();
      return;
    }

    const wasIdle = this.status === 'idle';
    this.status = 'draining';
    this.logger.log(`[reelfetch] draining queued=${this.queue.size} live=${this.jobs.size}`);

    if (wasIdle) {
      this.logger.warn(`[reelfetch] pipeline was never started; starting workers to drain ${this.jobs.size} queued job(s)`);
      await this.options.staging.sweep();
      this.pool.start();
    }
    await this.idle();

    this.queue.close();
    await this.pool.stopped();
    this.status = 'stopped';
    this.logger.log('[reelfetch] stopped');
  }

  private idle(): Promise<void> {
    if (this.jobs.size === 0) return Promise.resolve();
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private forget(id: string): void {
    this.jobs.delete(id);
    if (this.jobs.size > 0) return;
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}

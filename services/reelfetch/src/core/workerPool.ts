import type {
  Artifact,
  FetchResult,
  FailureReport,
  Job,
  JobState,
  Logger,
  TranscodeResult,
} from '../types/jobs.js';
import { artifactFileName } from './artifacts.js';
import { ResolveError, ToolchainError, errorMessage, toPipelineError } from './errors.js';
import type { FetchRequest } from './fetcher.js';
import type { JobQueue } from './jobQueue.js';
import { getPreset } from './presets.js';
import type { DeliveryOutcome, ResultSink } from './resultSink.js';
import type { StagingArea } from './staging.js';
import type { TranscodeRequest } from './transcoder.js';

export interface JobFetcher {
  fetch(sourceRef: string, request: FetchRequest): Promise<FetchResult>;
}

export interface JobTranscoder {
  transcode(request: TranscodeRequest): Promise<TranscodeResult>;
}

export type SettledResult = 'done' | 'failed' | 'cancelled';

export type StateChangeListener<TContext> = (job: Job<TContext>, previous: JobState) => void;

export interface WorkerPoolOptions<TContext> {
  queue: JobQueue<Job<TContext>>;
  fetcher: JobFetcher;
  transcoder: JobTranscoder;
  sink: ResultSink<TContext>;
  staging: StagingArea;
  poolSize: number;
  maxAttempts: number;
  logger?: Logger;
  onStateChange?: StateChangeListener<TContext>;
  /** Called once per Job when it leaves the pool for good. */
  onSettled?: (job: Job<TContext>, result: SettledResult) => void;
}

export interface WorkerPoolCounters {
  inFlight: number;
  peakInFlight: number;
  done: number;
  failed: number;
  cancelled: number;
  retried: number;
}

function toFailureReport(error: { kind: FailureReport['kind']; message: string }): FailureReport {
  return { kind: error.kind, detail: error.message };
}

export class WorkerPool<TContext> {
  private readonly logger: Logger;
  private readonly counters: WorkerPoolCounters = {
    inFlight: 0,
    peakInFlight: 0,
    done: 0,
    failed: 0,
    cancelled: 0,
    retried: 0,
  };
  private workers: Promise<void>[] = [];

  constructor(private readonly options: WorkerPoolOptions<TContext>) {
    if (!Number.isInteger(options.poolSize) || options.poolSize < 1) {
      throw new Error('poolSize must be an integer >= 1');
    }
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new Error('maxAttempts must be an integer >= 1');
    }
    this.logger = options.logger ?? console;
  }

  get size(): number {
    return this.options.poolSize;
  }

  get started(): boolean {
    return this.workers.length > 0;
  }

  stats(): WorkerPoolCounters {
    return { ...this.counters };
  }

  start(): void {
    if (this.started) return;
    for (let slot = 0; slot < this.options.poolSize; slot += 1) {
      this.workers.push(this.runWorker(slot));
    }
    this.logger.log(`[reelfetch-pool] started workers=${this.options.poolSize} max_attempts=${this.options.maxAttempts}`);
  }

  /** Resolves once every worker has seen the queue close and exited. */
  async stopped(): Promise<void> {
    await Promise.all(this.workers);
  }

  private async runWorker(slot: number): Promise<void> {
    for (;;) {
      const job = await this.options.queue.dequeue();
      if (!job) break;

      this.counters.inFlight += 1;
      this.counters.peakInFlight = Math.max(this.counters.peakInFlight, this.counters.inFlight);
      try {
        await this.process(job);
      } catch (error) {
        this.logger.error(`[reelfetch-pool] worker=${slot} unexpected error job_id=${job.id} state=${job.state}`, error);
        const failure = toPipelineError(error, (message, options) => new ToolchainError(message, undefined, undefined, options));
        await this.finish(job, { ok: false, failure: toFailureReport(failure) });
      } finally {
        this.counters.inFlight -= 1;
      }
    }
  }

  private async process(job: Job<TContext>): Promise<void> {
    if (job.cancelRequested) {
      await this.discard(job);
      return;
    }

    this.setState(job, 'fetching');
    let fetched: FetchResult;
    try {
      fetched = await this.options.fetcher.fetch(job.sourceRef, { jobId: job.id, preset: job.outputSpec });
    } catch (error) {
      const failure = toPipelineError(error, (message, options) => new ResolveError(message, options));
      if (job.cancelRequested) {
        await this.discard(job);
        return;
      }
      if (failure.retryable && job.attemptCount + 1 < this.options.maxAttempts) {
        await this.requeue(job, failure.message);
        return;
      }
      await this.finish(job, { ok: false, failure: toFailureReport(failure) });
      return;
    }

    if (job.cancelRequested) {
      await this.discard(job);
      return;
    }

    this.setState(job, 'transcoding');
    let transcoded: TranscodeResult;
    try {
      transcoded = await this.options.transcoder.transcode({
        jobId: job.id,
        inputPath: fetched.path,
        preset: job.outputSpec,
        inputSizeBytes: fetched.sizeBytes,
      });
    } catch (error) {
      if (job.cancelRequested) {
        await this.discard(job);
        return;
      }
      const failure = toPipelineError(error, (message, options) => new ToolchainError(message, undefined, undefined, options));
      await this.finish(job, { ok: false, failure: toFailureReport(failure) });
      return;
    }

    if (job.cancelRequested) {
      await this.discard(job);
      return;
    }

    const preset = getPreset(transcoded.preset);
    const artifact: Artifact = {
      jobId: job.id,
      path: transcoded.path,
      fileName: artifactFileName(fetched.title, job.id, preset.extension),
      preset: transcoded.preset,
      mimeType: preset.mimeType,
      extension: preset.extension,
    };
    this.setState(job, 'delivering');
    await this.finish(job, { ok: true, artifact });
  }

  private async requeue(job: Job<TContext>, reason: string): Promise<void> {
    try {
      await this.options.staging.cleanup(job.id);
    } catch (error) {
      this.logger.error(`[reelfetch-pool] staging cleanup before retry failed job_id=${job.id} error=${errorMessage(error)}`);
    }
    job.attemptCount += 1;
    this.counters.retried += 1;
    this.setState(job, 'queued');
    this.logger.warn(
      `[reelfetch-pool] retrying job_id=${job.id} attempt=${job.attemptCount + 1}/${this.options.maxAttempts} reason=${reason}`,
    );
    this.options.queue.requeue(job);
  }

  private async finish(job: Job<TContext>, outcome: DeliveryOutcome): Promise<void> {
    const ack = await this.options.sink.deliver(
      {
        id: job.id,
        sourceRef: job.sourceRef,
        outputSpec: job.outputSpec,
        requesterContext: job.requesterContext,
      },
      outcome,
    );

    this.setState(job, ack.state);
    if (ack.state === 'failed') {
      this.logger.warn(
        `[reelfetch-pool] failed job_id=${job.id} kind=${ack.failure.kind} attempts=${job.attemptCount + 1} detail=${ack.failure.detail}`,
      );
    } else {
      this.logger.log(`[reelfetch-pool] done job_id=${job.id} preset=${job.outputSpec}`);
    }
    this.settle(job, ack.state);
  }

  private async discard(job: Job<TContext>): Promise<void> {
    await this.options.sink.discard(job.id);
    this.logger.log(`[reelfetch-pool] cancelled job_id=${job.id} state=${job.state}`);
    this.settle(job, 'cancelled');
  }

  private settle(job: Job<TContext>, result: SettledResult): void {
    if (result === 'done') this.counters.done += 1;
    else if (result === 'failed') this.counters.failed += 1;
    else this.counters.cancelled += 1;

    try {
      this.options.onSettled?.(job, result);
    } catch (error) {
      this.logger.error(`[reelfetch-pool] settle listener failed job_id=${job.id} error=${errorMessage(error)}`);
    }
  }

  private setState(job: Job<TContext>, next: JobState): void {
    const previous = job.state;
    job.state = next;
    try {
      this.options.onStateChange?.(job, previous);
    } catch (error) {
      this.logger.error(`[reelfetch-pool] state listener failed job_id=${job.id} error=${errorMessage(error)}`);
    }
  }
}

import type { FailureKind, JobState, PresetName } from 'reelfetch-client';

export type { FailureKind, JobState, PresetName };

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;

export interface Job<TContext> {
  readonly id: string;
  readonly sourceRef: string;
  readonly outputSpec: PresetName;
  readonly requesterContext: TContext;
  readonly submittedAt: string;
  readonly platform: string;
  state: JobState;
  attemptCount: number;
  cancelRequested: boolean;
}

export interface JobSnapshot {
  id: string;
  sourceRef: string;
  outputSpec: PresetName;
  platform: string;
  state: JobState;
  attemptCount: number;
  submittedAt: string;
  cancelRequested: boolean;
}

export interface StreamCandidate {
  uri: string;
  ext: string;
  hasVideo: boolean;
  hasAudio: boolean;
  height?: number;
  bitrateKbps?: number;
  /** Exact size announced by the source; the transfer is verified against it. */
  sizeBytes?: number;
  approxSizeBytes?: number;
  sha256?: string;
  protocol?: string;
  headers?: Record<string, string>;
}

export interface ResolvedSource {
  title?: string;
  candidates: StreamCandidate[];
}

export interface SourceResolver {
  readonly name: string;
  resolve(sourceRef: URL): Promise<ResolvedSource>;
}

export interface FetchResult {
  path: string;
  sizeBytes: number;
  sha256: string;
  title?: string;
  candidate: StreamCandidate;
}

export interface TranscodeResult {
  path: string;
  preset: PresetName;
}

export interface Artifact {
  jobId: string;
  path: string;
  fileName: string;
  preset: PresetName;
  mimeType: string;
  extension: string;
}

export interface FailureReport {
  kind: FailureKind;
  detail: string;
}

export interface DeliveryJob<TContext> {
  id: string;
  sourceRef: string;
  outputSpec: PresetName;
  requesterContext: TContext;
}

export interface DeliveryTarget<TContext> {
  readonly name: string;
  onComplete(job: DeliveryJob<TContext>, artifact: Artifact): Promise<void>;
  onFailure(job: DeliveryJob<TContext>, failure: FailureReport): Promise<void>;
}

/**
 * `removed`: taken off the queue. `flagged`: discarded at the next stage
 * boundary. `too_late`: already delivering and will still complete.
 */
export type CancelOutcome = 'removed' | 'flagged' | 'too_late' | 'not_found';

export interface PipelineStats {
  queued: number;
  capacity: number;
  poolSize: number;
  inFlight: number;
  peakInFlight: number;
  done: number;
  failed: number;
  cancelled: number;
  retried: number;
}

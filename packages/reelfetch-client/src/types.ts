export type PresetName =
  | 'audio-mp3-128k'
  | 'audio-mp3-192k'
  | 'audio-mp3-320k'
  | 'audio-m4a-aac-160k'
  | 'video-h264-480p'
  | 'video-h264-720p'
  | 'video-h264-1080p';

export type JobState = 'queued' | 'fetching' | 'transcoding' | 'delivering' | 'done' | 'failed';

export type FailureKind =
  | 'ResolveError'
  | 'NetworkError'
  | 'UnsupportedFormatError'
  | 'UnsupportedCodecError'
  | 'ToolchainError'
  | 'TimeoutError'
  | 'DeliveryError'
  | 'QueueSaturated';

export type CancelResult = 'removed' | 'flagged' | 'too_late';

export interface ReelfetchConfig {
  baseUrl?: string;
  apiKey?: string;
}

export interface RequestOptions {
  signal?: AbortSignal;
  apiKey?: string;
}

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

export interface SubmitJobRequest {
  source_ref: string;
  output_spec?: PresetName;
  callback_url: string;
  reference?: string;
}

export interface SubmitJobResponse {
  job_id: string;
  status: JobState;
  output_spec: PresetName;
  platform: string;
  poll_url: string;
}

export interface JobSnapshot {
  job_id: string;
  status: JobState;
  source_ref: string;
  output_spec: PresetName;
  platform: string;
  attempt_count: number;
  submitted_at: string;
  cancel_requested: boolean;
}

export interface CancelJobResponse {
  job_id: string;
  result: CancelResult;
}

export interface PresetInfo {
  name: PresetName;
  kind: 'audio' | 'video';
  container: string;
  extension: string;
  mime_type: string;
  video_codec?: string;
  audio_codec: string;
  max_height?: number;
}

export interface PresetListResponse {
  default_preset: PresetName;
  presets: PresetInfo[];
}

export interface DeliveredArtifact {
  download_url: string;
  file_name: string;
  mime_type: string;
  size_bytes: number;
  sha256: string;
}

export interface JobCompletedEvent {
  event_type: 'job.completed';
  event_id: string;
  created_at: string;
  data: {
    job_id: string;
    reference?: string;
    source_ref: string;
    output_spec: PresetName;
    artifact: DeliveredArtifact;
  };
}

export interface JobFailedEvent {
  event_type: 'job.failed';
  event_id: string;
  created_at: string;
  data: {
    job_id: string;
    reference?: string;
    source_ref: string;
    output_spec: PresetName;
    failure: {
      kind: FailureKind;
      detail: string;
    };
  };
}

export type DeliveryEvent = JobCompletedEvent | JobFailedEvent;

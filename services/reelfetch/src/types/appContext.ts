import type { Pipeline } from '../core/pipeline.js';
import type { WebhookContext } from '../providers/delivery/webhook.js';
import type { PresetName } from './jobs.js';

export interface ToolchainStatus {
  ffmpeg: boolean;
  ffprobe: boolean;
}

export interface AppContext {
  pipeline: Pipeline<WebhookContext>;
  defaultPreset: PresetName;
  publicBaseUrl: string;
  storageBackend: string;
  /** Seconds suggested to clients in Retry-After when the queue is full. */
  retryAfterSeconds: number;
  checkToolchain: () => Promise<ToolchainStatus>;
}

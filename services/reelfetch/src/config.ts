import 'dotenv/config';
import { tmpdir } from 'os';
import { join, resolve } from 'path';
import { isPresetName } from './core/presets.js';
import type { PresetName } from './types/jobs.js';

const DEFAULT_PORT = 3030;

const RESOLVER_NAMES = ['auto', 'direct', 'ytdlp'] as const;
const STORAGE_BACKENDS = ['local', 's3'] as const;

export type ResolverName = (typeof RESOLVER_NAMES)[number];
type StorageBackend = (typeof STORAGE_BACKENDS)[number];

function intFromEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function boolFromEnv(name: string, fallback: boolean): boolean {
  const raw = process.env[name];
  if (!raw) return fallback;
  const value = raw.toLowerCase().trim();
  if (value === '1' || value === 'true' || value === 'yes') return true;
  if (value === '0' || value === 'false' || value === 'no') return false;
  return fallback;
}

function listFromEnv(name: string): string[] {
  return (process.env[name] || '')
    .split(',')
    .map((entry) => entry.trim().toLowerCase())
    .filter(Boolean);
}

function choiceFromEnv<T extends string>(name: string, choices: readonly T[], fallback: T): T {
  const raw = (process.env[name] || '').trim().toLowerCase();
  if (!raw) return fallback;
  const match = choices.find((choice) => choice === raw);
  if (!match) {
    throw new Error(`${name} must be one of ${choices.join(', ')} (got "${raw}")`);
  }
  return match;
}

function presetFromEnv(name: string, fallback: PresetName): PresetName {
  const raw = (process.env[name] || '').trim();
  if (!raw) return fallback;
  if (!isPresetName(raw)) {
    throw new Error(`${name} is not a known output preset: ${raw}`);
  }
  return raw;
}

const port = intFromEnv('PORT', DEFAULT_PORT);

export const config = {
  port,
  publicBaseUrl: process.env.PUBLIC_BASE_URL || `http://localhost:${port}`,
  masterApiKey: process.env.MASTER_API_KEY || '',
  redisUrl: process.env.REDIS_URL || '',
  poolSize: intFromEnv('POOL_SIZE', 2),
  queueCapacity: intFromEnv('QUEUE_CAPACITY', 50),
  maxAttempts: intFromEnv('MAX_ATTEMPTS', 3),
  fetchTimeoutMs: intFromEnv('FETCH_TIMEOUT_MS', 10 * 60 * 1000),
  resolveTimeoutMs: intFromEnv('RESOLVE_TIMEOUT_MS', 60 * 1000),
  maxDownloadBytes: intFromEnv('MAX_DOWNLOAD_BYTES', 2 * 1024 * 1024 * 1024),
  transcodeTimeoutBaseMs: intFromEnv('TRANSCODE_TIMEOUT_BASE_MS', 60 * 1000),
  transcodeTimeoutPerMbMs: intFromEnv('TRANSCODE_TIMEOUT_PER_MB_MS', 2000),
  transcodeTimeoutMaxMs: intFromEnv('TRANSCODE_TIMEOUT_MAX_MS', 60 * 60 * 1000),
  deliveryRetryDelayMs: intFromEnv('DELIVERY_RETRY_DELAY_MS', 5000),
  deliveryTimeoutMs: intFromEnv('DELIVERY_TIMEOUT_MS', 15 * 1000),
  stagingRoot: resolve(process.env.STAGING_ROOT || join(tmpdir(), 'reelfetch-staging')),
  sourceResolver: choiceFromEnv<ResolverName>('SOURCE_RESOLVER', RESOLVER_NAMES, 'auto'),
  sourceHostAllowlist: listFromEnv('SOURCE_HOST_ALLOWLIST'),
  defaultPreset: presetFromEnv('DEFAULT_PRESET', 'audio-mp3-192k'),
  ffmpegPath: process.env.FFMPEG_PATH || 'ffmpeg',
  ffprobePath: process.env.FFPROBE_PATH || 'ffprobe',
  ytdlpPath: process.env.YTDLP_PATH || 'yt-dlp',
  webhookSigningSecret: process.env.WEBHOOK_SIGNING_SECRET || '',
  storageBackend: choiceFromEnv<StorageBackend>('STORAGE_BACKEND', STORAGE_BACKENDS, 'local'),
  artifactsDir: resolve(process.env.ARTIFACTS_DIR || resolve(process.cwd(), 'data/artifacts')),
  artifactRetentionHours: intFromEnv('ARTIFACT_RETENTION_HOURS', 72),
  artifactCleanupIntervalMs: intFromEnv('ARTIFACT_CLEANUP_INTERVAL_MS', 30 * 60 * 1000),
  s3Endpoint: process.env.S3_ENDPOINT || '',
  s3Bucket: process.env.S3_BUCKET || '',
  s3Region: process.env.S3_REGION || 'auto',
  s3AccessKeyId: process.env.S3_ACCESS_KEY_ID || '',
  s3SecretAccessKey: process.env.S3_SECRET_ACCESS_KEY || '',
  s3ForcePathStyle: boolFromEnv('S3_FORCE_PATH_STYLE', true),
  s3SignedUrlTtlSeconds: intFromEnv('S3_SIGNED_URL_TTL_SECONDS', 24 * 3600),
  s3KeyPrefix: process.env.S3_KEY_PREFIX || 'artifacts',
} as const;

if (!config.webhookSigningSecret.startsWith('whsec_')) {
  throw new Error('WEBHOOK_SIGNING_SECRET is required and must start with whsec_');
}

if (config.storageBackend === 's3') {
  if (!config.s3Bucket) {
    throw new Error('S3_BUCKET is required when STORAGE_BACKEND=s3');
  }
  if (!config.s3AccessKeyId || !config.s3SecretAccessKey) {
    throw new Error('S3_ACCESS_KEY_ID and S3_SECRET_ACCESS_KEY are required when STORAGE_BACKEND=s3');
  }
}

import { createHash } from 'crypto';
import { createWriteStream } from 'fs';
import { rm } from 'fs/promises';
import { join } from 'path';
import { Readable, Transform } from 'stream';
import { pipeline } from 'stream/promises';
import type {
  FetchResult,
  Logger,
  PresetName,
  ResolvedSource,
  SourceResolver,
  StreamCandidate,
} from '../types/jobs.js';
import {
  NetworkError,
  PipelineError,
  ResolveError,
  UnsupportedFormatError,
  errorMessage,
  toPipelineError,
} from './errors.js';
import { isHostAllowed, parseSourceUrl } from './platforms.js';
import { getPreset } from './presets.js';
import type { StagingArea } from './staging.js';

export const MEDIA_EXTENSIONS: ReadonlySet<string> = new Set([
  '3gp', 'aac', 'avi', 'flac', 'flv', 'm4a', 'm4v', 'mkv', 'mov', 'mp3',
  'mp4', 'mpeg', 'mpg', 'oga', 'ogg', 'opus', 'ts', 'wav', 'weba', 'webm',
]);

export const AUDIO_EXTENSIONS: ReadonlySet<string> = new Set([
  'aac', 'flac', 'm4a', 'mp3', 'oga', 'ogg', 'opus', 'wav', 'weba',
]);

const MANIFEST_PROTOCOLS: ReadonlySet<string> = new Set([
  'm3u8', 'm3u8_native', 'dash', 'http_dash_segments', 'f4m', 'ism', 'rtmp', 'rtsp', 'mms',
]);

// Formats announcing less than this are placeholders, not media.
const MIN_CANDIDATE_BYTES = Math.ceil(0.01 * 1024 * 1024);

export function normalizeExtension(ext: string | undefined): string | undefined {
  if (!ext) return undefined;
  const value = ext.trim().toLowerCase().replace(/^\.+/, '');
  return MEDIA_EXTENSIONS.has(value) ? value : undefined;
}

function knownSize(candidate: StreamCandidate): number | undefined {
  return candidate.sizeBytes ?? candidate.approxSizeBytes;
}

function isTransferable(candidate: StreamCandidate): boolean {
  if (!normalizeExtension(candidate.ext)) return false;
  if (candidate.protocol && MANIFEST_PROTOCOLS.has(candidate.protocol)) return false;
  if (!parseSourceUrl(candidate.uri)) return false;
  const size = knownSize(candidate);
  return size === undefined || size >= MIN_CANDIDATE_BYTES;
}

function bySizeAscending(a: StreamCandidate, b: StreamCandidate): number {
  return (knownSize(a) ?? Number.POSITIVE_INFINITY) - (knownSize(b) ?? Number.POSITIVE_INFINITY);
}

/**
 * Orders the usable candidates for a preset, best first. Audio presets favour
 * audio-only streams by bitrate; video presets favour the tallest stream that
 * does not exceed the preset height, then the shortest one above it.
 */
export function rankCandidates(candidates: readonly StreamCandidate[], presetName: PresetName): StreamCandidate[] {
  const preset = getPreset(presetName);

  if (preset.kind === 'audio') {
    return candidates
      .filter((candidate) => candidate.hasAudio && isTransferable(candidate))
      .sort((a, b) => {
        const audioOnly = Number(!b.hasVideo) - Number(!a.hasVideo);
        if (audioOnly !== 0) return audioOnly;
        const bitrate = (b.bitrateKbps ?? 0) - (a.bitrateKbps ?? 0);
        if (bitrate !== 0) return bitrate;
        return bySizeAscending(a, b);
      });
  }

  const target = preset.maxHeight ?? Number.POSITIVE_INFINITY;
  return candidates
    .filter((candidate) => candidate.hasVideo && candidate.hasAudio && isTransferable(candidate))
    .sort((a, b) => {
      const heightA = a.height ?? 0;
      const heightB = b.height ?? 0;
      const fitsA = heightA <= target;
      const fitsB = heightB <= target;
      if (fitsA !== fitsB) return fitsA ? -1 : 1;
      const height = fitsA ? heightB - heightA : heightA - heightB;
      if (height !== 0) return height;
      return bySizeAscending(a, b);
    });
}

function isMediaContentType(contentType: string): boolean {
  return (
    contentType.startsWith('audio/')
    || contentType.startsWith('video/')
    || contentType === 'application/octet-stream'
    || contentType === 'binary/octet-stream'
    || contentType === 'application/mp4'
    || contentType === 'application/ogg'
  );
}

function declaredLength(headers: Headers): number | undefined {
  const encoding = headers.get('content-encoding');
  if (encoding && encoding !== 'identity') return undefined;
  const raw = headers.get('content-length');
  if (!raw) return undefined;
  const value = Number.parseInt(raw, 10);
  return Number.isFinite(value) && value >= 0 ? value : undefined;
}

export interface FetcherOptions {
  resolver: SourceResolver;
  staging: StagingArea;
  fetchTimeoutMs: number;
  maxBytes: number;
  hostAllowlist?: readonly string[];
  logger?: Logger;
}

export interface FetchRequest {
  jobId: string;
  preset: PresetName;
}

export class Fetcher {
  private readonly logger: Logger;
  private readonly hostAllowlist: readonly string[];

  constructor(private readonly options: FetcherOptions) {
    this.logger = options.logger ?? console;
    this.hostAllowlist = options.hostAllowlist ?? [];
  }

  async fetch(sourceRef: string, request: FetchRequest): Promise<FetchResult> {
    const url = parseSourceUrl(sourceRef);
    if (!url) {
      throw new ResolveError('Source reference is not an absolute http(s) URL');
    }
    if (!isHostAllowed(url, this.hostAllowlist)) {
      throw new ResolveError(`Host ${url.hostname} is not on the source allowlist`);
    }

    let resolved: ResolvedSource;
    try {
      resolved = await this.options.resolver.resolve(url);
    } catch (error) {
      throw toPipelineError(error, (message, options) => new ResolveError(message, options));
    }

    const [candidate] = rankCandidates(resolved.candidates, request.preset);
    if (!candidate) {
      throw new UnsupportedFormatError(
        `No usable stream among ${resolved.candidates.length} candidate(s) for preset ${request.preset}`,
      );
    }

    const ext = normalizeExtension(candidate.ext) ?? 'bin';
    const dir = await this.options.staging.prepare(request.jobId);
    const target = join(dir, `input.${ext}`);

    this.logger.log(
      `[reelfetch-fetch] job_id=${request.jobId} resolver=${this.options.resolver.name} ext=${ext} height=${candidate.height ?? '-'} candidates=${resolved.candidates.length}`,
    );

    const { sizeBytes, sha256 } = await this.transfer(candidate, target);
    return { path: target, sizeBytes, sha256, title: resolved.title, candidate };
  }

  private async transfer(candidate: StreamCandidate, target: string): Promise<{ sizeBytes: number; sha256: string }> {
    const { fetchTimeoutMs, maxBytes } = this.options;

    let response: Response;
    try {
      response = await fetch(candidate.uri, {
        headers: candidate.headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(fetchTimeoutMs),
      });
    } catch (error) {
      throw new NetworkError(`Request to source failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      const message = `Source responded with HTTP ${response.status}`;
      if (response.status === 429 || response.status >= 500) throw new NetworkError(message);
      throw new ResolveError(message);
    }

    const contentType = response.headers.get('content-type')?.split(';')[0]?.trim().toLowerCase();
    if (contentType && !isMediaContentType(contentType)) {
      throw new UnsupportedFormatError(`Source returned non-media content (${contentType})`);
    }

    const expected = candidate.sizeBytes ?? declaredLength(response.headers);
    if (expected !== undefined && expected > maxBytes) {
      throw new UnsupportedFormatError(`Source size ${expected} bytes exceeds the ${maxBytes} byte limit`);
    }
    if (!response.body) {
      throw new NetworkError('Source returned an empty body');
    }

    const hash = createHash('sha256');
    let received = 0;
    const meter = new Transform({
      transform(chunk: Buffer, _encoding, callback) {
        received += chunk.length;
        if (received > maxBytes) {
          callback(new UnsupportedFormatError(`Transfer exceeded the ${maxBytes} byte limit`));
          return;
        }
        hash.update(chunk);
        callback(null, chunk);
      },
    });

    try {
      await pipeline(Readable.fromWeb(response.body), meter, createWriteStream(target));
    } catch (error) {
      await rm(target, { force: true });
      if (error instanceof PipelineError) throw error;
      throw new NetworkError(`Transfer interrupted: ${errorMessage(error)}`, { cause: error });
    }

    if (expected !== undefined && received !== expected) {
      await rm(target, { force: true });
      throw new NetworkError(`Transfer size mismatch: expected ${expected} bytes, received ${received}`);
    }

    const sha256 = hash.digest('hex');
    if (candidate.sha256 && candidate.sha256.toLowerCase() !== sha256) {
      await rm(target, { force: true });
      throw new NetworkError('Transfer checksum mismatch');
    }

    return { sizeBytes: received, sha256 };
  }
}

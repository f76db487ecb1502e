import { NetworkError, ResolveError } from '../../core/errors.js';
import { AUDIO_EXTENSIONS } from '../../core/fetcher.js';
import { lastLine, runProcess } from '../../core/subprocess.js';
import type { ResolvedSource, SourceResolver, StreamCandidate } from '../../types/jobs.js';

export interface YtDlpResolverOptions {
  binaryPath: string;
  timeoutMs: number;
}

// Extractor messages that will not change on a later attempt.
const PERMANENT_FAILURES = [
  /unsupported url/i,
  /private video/i,
  /copyright/i,
  /video unavailable/i,
  /has been removed/i,
  /not available in your country/i,
  /sign in to confirm your age/i,
  /members-only/i,
  /HTTP Error 404/i,
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) && value > 0 ? value : undefined;
}

function readHeaders(source: Record<string, unknown>): Record<string, string> | undefined {
  const raw = source.http_headers;
  if (!isRecord(raw)) return undefined;
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'string') headers[name] = value;
  }
  return Object.keys(headers).length > 0 ? headers : undefined;
}

function hasStream(codec: string | undefined, inferred: boolean): boolean {
  if (codec === 'none') return false;
  return codec !== undefined || inferred;
}

/** Maps one yt-dlp format entry to a candidate; entries without a URL are skipped. */
export function toCandidate(format: Record<string, unknown>): StreamCandidate | undefined {
  const uri = readString(format, 'url');
  const ext = readString(format, 'ext');
  if (!uri || !ext) return undefined;

  const audioContainer = AUDIO_EXTENSIONS.has(ext.toLowerCase());
  return {
    uri,
    ext,
    hasVideo: hasStream(readString(format, 'vcodec'), !audioContainer),
    hasAudio: hasStream(readString(format, 'acodec'), true),
    height: readNumber(format, 'height'),
    bitrateKbps: readNumber(format, 'abr') ?? readNumber(format, 'tbr'),
    sizeBytes: readNumber(format, 'filesize'),
    approxSizeBytes: readNumber(format, 'filesize_approx'),
    protocol: readString(format, 'protocol'),
    headers: readHeaders(format),
  };
}

export function parseYtDlpInfo(stdout: string): ResolvedSource {
  let info: unknown;
  try {
    info = JSON.parse(stdout);
  } catch (error) {
    throw new ResolveError('yt-dlp returned unreadable metadata', { cause: error });
  }
  if (!isRecord(info)) {
    throw new ResolveError('yt-dlp returned no metadata');
  }

  const formats = Array.isArray(info.formats) ? info.formats.filter(isRecord) : [info];
  const candidates: StreamCandidate[] = [];
  for (const format of formats) {
    const candidate = toCandidate(format);
    if (candidate) candidates.push(candidate);
  }

  return { title: readString(info, 'title'), candidates };
}

/** Resolves page URLs (YouTube, Instagram, TikTok, ...) through the yt-dlp executable. */
export class YtDlpResolver implements SourceResolver {
  readonly name = 'ytdlp';

  constructor(private readonly options: YtDlpResolverOptions) {}

  async resolve(url: URL): Promise<ResolvedSource> {
    const result = await runProcess(
      this.options.binaryPath,
      ['--dump-single-json', '--no-playlist', '--no-warnings', '--skip-download', url.href],
      { timeoutMs: this.options.timeoutMs, captureStdout: true },
    );

    if (result.timedOut) {
      throw new NetworkError(`yt-dlp metadata lookup exceeded ${this.options.timeoutMs}ms`);
    }
    if (result.exitCode !== 0) {
      const detail = lastLine(result.stderrTail) || `yt-dlp exited with code ${result.exitCode ?? 'unknown'}`;
      if (PERMANENT_FAILURES.some((pattern) => pattern.test(result.stderrTail))) {
        throw new ResolveError(detail);
      }
      throw new NetworkError(detail);
    }

    return parseYtDlpInfo(result.stdout);
  }
}

import { rm, stat } from 'fs/promises';
import { basename, dirname, join } from 'path';
import type { Logger, PresetName, TranscodeResult } from '../types/jobs.js';
import { TimeoutError, ToolchainError, UnsupportedCodecError } from './errors.js';
import { buildFfmpegArgs, getPreset } from './presets.js';
import type { StagingArea } from './staging.js';
import { lastLine, runProcess } from './subprocess.js';

const MIB = 1024 * 1024;
const DEFAULT_PROBE_TIMEOUT_MS = 30_000;

export interface TranscodeTimeouts {
  baseMs: number;
  perMiBMs: number;
  maxMs: number;
}

export interface TranscoderOptions {
  ffmpegPath: string;
  ffprobePath: string;
  staging: StagingArea;
  timeouts: TranscodeTimeouts;
  probeTimeoutMs?: number;
  logger?: Logger;
}

export interface TranscodeRequest {
  jobId: string;
  inputPath: string;
  preset: PresetName;
  inputSizeBytes: number;
}

export interface ProbedStreams {
  hasVideo: boolean;
  hasAudio: boolean;
  formatName?: string;
  durationSeconds?: number;
}

/** Wall-clock limit for one encode, proportional to input size and preset cost. */
export function transcodeTimeoutMs(inputSizeBytes: number, costFactor: number, timeouts: TranscodeTimeouts): number {
  const scaled = timeouts.baseMs + timeouts.perMiBMs * (inputSizeBytes / MIB) * costFactor;
  return Math.round(Math.min(timeouts.maxMs, scaled));
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

export function parseProbeOutput(stdout: string): ProbedStreams {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new UnsupportedCodecError('ffprobe returned unreadable output', { cause: error });
  }
  if (!isRecord(parsed) || !Array.isArray(parsed.streams)) {
    throw new UnsupportedCodecError('ffprobe reported no streams');
  }

  const types = parsed.streams
    .filter(isRecord)
    .map((stream) => stream.codec_type);
  const format = isRecord(parsed.format) ? parsed.format : undefined;
  const duration = format ? Number(format.duration) : Number.NaN;

  return {
    hasVideo: types.includes('video'),
    hasAudio: types.includes('audio'),
    formatName: typeof format?.format_name === 'string' ? format.format_name : undefined,
    durationSeconds: Number.isFinite(duration) ? duration : undefined,
  };
}

async function outputSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch {
    return 0;
  }
}

export class Transcoder {
  private readonly logger: Logger;

  constructor(private readonly options: TranscoderOptions) {
    this.logger = options.logger ?? console;
  }

  async transcode(request: TranscodeRequest): Promise<TranscodeResult> {
    const preset = getPreset(request.preset);
    const dir = this.options.staging.dirFor(request.jobId);
    if (dirname(request.inputPath) !== dir) {
      throw new ToolchainError(`Input ${request.inputPath} is outside the staging directory for job ${request.jobId}`);
    }

    const inputFile = basename(request.inputPath);
    const outputFile = `output.${preset.extension}`;
    const outputPath = join(dir, outputFile);

    const streams = await this.probe(dir, inputFile);
    if (!streams.hasAudio) {
      throw new UnsupportedCodecError('Input has no audio stream');
    }
    if (preset.kind === 'video' && !streams.hasVideo) {
      throw new UnsupportedCodecError('Input has no video stream');
    }

    const timeoutMs = transcodeTimeoutMs(request.inputSizeBytes, preset.costFactor, this.options.timeouts);
    this.logger.log(
      `[reelfetch-transcode] job_id=${request.jobId} preset=${request.preset} format=${streams.formatName ?? '-'} timeout_ms=${timeoutMs}`,
    );

    const startedAt = Date.now();
    const result = await runProcess(
      this.options.ffmpegPath,
      buildFfmpegArgs(request.preset, inputFile, outputFile),
      { cwd: dir, timeoutMs, logger: this.logger },
    );

    if (result.timedOut) {
      await rm(outputPath, { force: true });
      throw new TimeoutError(`ffmpeg exceeded ${timeoutMs}ms and was killed`);
    }
    if (result.exitCode !== 0) {
      await rm(outputPath, { force: true });
      const reason = result.exitCode === null ? `signal ${result.signal ?? 'unknown'}` : `code ${result.exitCode}`;
      const detail = lastLine(result.stderrTail);
      throw new ToolchainError(
        `ffmpeg exited with ${reason}${detail ? `: ${detail}` : ''}`,
        result.exitCode,
        result.stderrTail,
      );
    }
    if ((await outputSize(outputPath)) === 0) {
      await rm(outputPath, { force: true });
      throw new ToolchainError('ffmpeg produced no output', result.exitCode, result.stderrTail);
    }

    this.logger.log(
      `[reelfetch-transcode] job_id=${request.jobId} preset=${request.preset} took_ms=${Date.now() - startedAt}`,
    );
    return { path: outputPath, preset: request.preset };
  }

  private async probe(dir: string, inputFile: string): Promise<ProbedStreams> {
    const timeoutMs = this.options.probeTimeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
    const result = await runProcess(
      this.options.ffprobePath,
      ['-v', 'error', '-print_format', 'json', '-show_streams', '-show_format', inputFile],
      { cwd: dir, timeoutMs, captureStdout: true, logger: this.logger },
    );

    if (result.timedOut) {
      throw new TimeoutError(`ffprobe exceeded ${timeoutMs}ms and was killed`);
    }
    if (result.exitCode !== 0) {
      const detail = lastLine(result.stderrTail);
      throw new UnsupportedCodecError(`Input could not be decoded${detail ? `: ${detail}` : ''}`);
    }
    return parseProbeOutput(result.stdout);
  }
}

async function answersVersion(binaryPath: string): Promise<boolean> {
  try {
    const result = await runProcess(binaryPath, ['-version'], { timeoutMs: 5000 });
    return result.exitCode === 0;
  } catch (error) {
    if (error instanceof ToolchainError) return false;
    throw error;
  }
}

/** Whether both executables start and report a version. */
export async function checkToolchain(ffmpegPath: string, ffprobePath: string): Promise<{ ffmpeg: boolean; ffprobe: boolean }> {
  const [ffmpeg, ffprobe] = await Promise.all([answersVersion(ffmpegPath), answersVersion(ffprobePath)]);
  return { ffmpeg, ffprobe };
}

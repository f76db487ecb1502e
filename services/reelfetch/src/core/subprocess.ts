import { spawn } from 'child_process';
import type { Logger } from '../types/jobs.js';
import { ToolchainError, errorMessage } from './errors.js';

const DEFAULT_MAX_STDOUT_BYTES = 16 * 1024 * 1024;
const STDERR_TAIL_BYTES = 8 * 1024;

export interface RunProcessOptions {
  cwd?: string;
  timeoutMs: number;
  /** stdout is only kept when true (ffprobe, yt-dlp); ffmpeg output is discarded. */
  captureStdout?: boolean;
  maxStdoutBytes?: number;
  logger?: Logger;
}

export interface ProcessResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderrTail: string;
  timedOut: boolean;
}

function appendTail(current: string, chunk: Buffer): string {
  const next = current + chunk.toString('utf8');
  return next.length > STDERR_TAIL_BYTES ? next.slice(next.length - STDERR_TAIL_BYTES) : next;
}

function killGroup(pid: number | undefined, logger: Logger): void {
  if (pid === undefined) return;
  try {
    process.kill(-pid, 'SIGKILL');
  } catch (error) {
    // ESRCH: the group already exited between the timer firing and the kill.
    if (error instanceof Error && 'code' in error && error.code === 'ESRCH') return;
    logger.error(`[reelfetch-subprocess] failed to kill process group pid=${pid} error=${errorMessage(error)}`);
  }
}

/**
 * Runs an executable in its own process group with a wall-clock limit. On
 * expiry the whole group is killed so helpers spawned by the tool die too.
 * Resolves for any exit status; rejects only when the process cannot start.
 */
export function runProcess(command: string, args: readonly string[], options: RunProcessOptions): Promise<ProcessResult> {
  const maxStdoutBytes = options.maxStdoutBytes ?? DEFAULT_MAX_STDOUT_BYTES;
  const logger = options.logger ?? console;

  return new Promise<ProcessResult>((resolve, reject) => {
    let settled = false;
    let timedOut = false;
    let stdout = '';
    let stdoutBytes = 0;
    let stderrTail = '';

    const child = spawn(command, [...args], {
      cwd: options.cwd,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    const timer = setTimeout(() => {
      timedOut = true;
      killGroup(child.pid, logger);
    }, options.timeoutMs);

    child.stdout.on('data', (chunk: Buffer) => {
      if (!options.captureStdout) return;
      stdoutBytes += chunk.length;
      if (stdoutBytes > maxStdoutBytes) {
        killGroup(child.pid, logger);
        return;
      }
      stdout += chunk.toString('utf8');
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderrTail = appendTail(stderrTail, chunk);
    });

    child.once('error', (error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      reject(new ToolchainError(`Failed to start ${command}: ${errorMessage(error)}`, null, stderrTail, { cause: error }));
    });

    child.once('close', (exitCode, signal) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      resolve({ exitCode, signal, stdout, stderrTail: stderrTail.trim(), timedOut });
    });
  });
}

/** Last non-empty line of a stderr tail, for short diagnostics. */
export function lastLine(text: string): string {
  const lines = text.split(/\r?\n/).map((line) => line.trim()).filter(Boolean);
  return lines[lines.length - 1] ?? '';
}

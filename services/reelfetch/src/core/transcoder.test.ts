import { mkdir, mkdtemp, readFile, readdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { TimeoutError, ToolchainError, UnsupportedCodecError } from './errors.js';
import { StagingArea } from './staging.js';
import { Transcoder, checkToolchain, parseProbeOutput, transcodeTimeoutMs } from './transcoder.js';

const MIB = 1024 * 1024;
const silent = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

const AV_PROBE = `echo '{"streams":[{"codec_type":"video"},{"codec_type":"audio"}],"format":{"format_name":"mov,mp4","duration":"12.5"}}'`;
const AUDIO_PROBE = `echo '{"streams":[{"codec_type":"audio"}],"format":{"format_name":"mp3"}}'`;
const ENCODE_OK = `printf '%s\\n' "$@" > args.txt
for last; do :; done
printf 'encoded' > "$last"`;

describe('transcodeTimeoutMs', () => {
  it('scales with input size and preset cost up to the maximum', () => {
    const timeouts = { baseMs: 1000, perMiBMs: 100, maxMs: 60_000 };
    expect(transcodeTimeoutMs(10 * MIB, 4, timeouts)).toBe(5000);
    expect(transcodeTimeoutMs(10 * MIB, 4, { ...timeouts, maxMs: 3000 })).toBe(3000);
    expect(transcodeTimeoutMs(0, 4, timeouts)).toBe(1000);
  });
});

describe('parseProbeOutput', () => {
  it('reports which stream types are present', () => {
    expect(parseProbeOutput('{"streams":[{"codec_type":"audio"}],"format":{"format_name":"mp3","duration":"3.0"}}')).toEqual({
      hasVideo: false,
      hasAudio: true,
      formatName: 'mp3',
      durationSeconds: 3,
    });
  });

  it('treats unreadable output as an unsupported codec', () => {
    expect(() => parseProbeOutput('not json')).toThrow(UnsupportedCodecError);
    expect(() => parseProbeOutput('{}')).toThrow('ffprobe reported no streams');
  });
});

describe('Transcoder', () => {
  let root: string;
  let bin: string;
  let staging: StagingArea;
  let inputPath: string;

  async function script(name: string, body: string): Promise<string> {
    const path = join(bin, name);
    await writeFile(path, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return path;
  }

  async function transcoder(ffprobeBody: string, ffmpegBody: string, maxMs = 10_000): Promise<Transcoder> {
    return new Transcoder({
      ffprobePath: await script('ffprobe', ffprobeBody),
      ffmpegPath: await script('ffmpeg', ffmpegBody),
      staging,
      timeouts: { baseMs: 200, perMiBMs: 0, maxMs },
      logger: silent,
    });
  }

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'reelfetch-transcode-'));
    bin = join(root, 'bin');
    await mkdir(bin);
    staging = new StagingArea(join(root, 'staging'), silent);
    const dir = await staging.prepare('job-1');
    inputPath = join(dir, 'input.webm');
    await writeFile(inputPath, 'raw');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('runs ffmpeg in the staging directory with the preset arguments', async () => {
    const subject = await transcoder(AV_PROBE, ENCODE_OK);

    const result = await subject.transcode({ jobId: 'job-1', inputPath, preset: 'audio-mp3-128k', inputSizeBytes: 3 });

    const dir = staging.dirFor('job-1');
    expect(result).toEqual({ path: join(dir, 'output.mp3'), preset: 'audio-mp3-128k' });
    expect(await readFile(result.path, 'utf8')).toBe('encoded');
    expect((await readFile(join(dir, 'args.txt'), 'utf8')).trim().split('\n')).toEqual([
      '-hide_banner', '-nostdin', '-y',
      '-i', 'input.webm',
      '-vn', '-map', '0:a:0', '-c:a', 'libmp3lame', '-b:a', '128k', '-ar', '44100', '-f', 'mp3',
      'output.mp3',
    ]);
  });

  it('rejects a video preset when the input has no video stream', async () => {
    const subject = await transcoder(AUDIO_PROBE, ENCODE_OK);

    await expect(
      subject.transcode({ jobId: 'job-1', inputPath, preset: 'video-h264-720p', inputSizeBytes: 3 }),
    ).rejects.toThrow(new UnsupportedCodecError('Input has no video stream'));
  });

  it('maps a failed probe to UnsupportedCodecError', async () => {
    const subject = await transcoder('echo "input.webm: Invalid data found when processing input" >&2\nexit 1', ENCODE_OK);

    await expect(
      subject.transcode({ jobId: 'job-1', inputPath, preset: 'audio-mp3-128k', inputSizeBytes: 3 }),
    ).rejects.toThrow('Input could not be decoded: input.webm: Invalid data found when processing input');
  });

  it('surfaces a non-zero exit as ToolchainError with the stderr tail', async () => {
    const subject = await transcoder(AV_PROBE, `echo "Unknown encoder 'libx264'" >&2\nexit 1`);

    const error = await subject
      .transcode({ jobId: 'job-1', inputPath, preset: 'video-h264-1080p', inputSizeBytes: 3 })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ToolchainError);
    expect(error).toMatchObject({
      message: "ffmpeg exited with code 1: Unknown encoder 'libx264'",
      exitCode: 1,
      stderrTail: "Unknown encoder 'libx264'",
    });
  });

  it('treats a clean exit without output as ToolchainError', async () => {
    const subject = await transcoder(AV_PROBE, 'exit 0');

    await expect(
      subject.transcode({ jobId: 'job-1', inputPath, preset: 'audio-mp3-128k', inputSizeBytes: 3 }),
    ).rejects.toThrow('ffmpeg produced no output');
  });

  it('kills a run that exceeds its timeout and removes partial output', async () => {
    const subject = await transcoder(AV_PROBE, "printf 'partial' > output.mp3\nsleep 30", 300);

    await expect(
      subject.transcode({ jobId: 'job-1', inputPath, preset: 'audio-mp3-128k', inputSizeBytes: 3 }),
    ).rejects.toBeInstanceOf(TimeoutError);
    expect(await readdir(staging.dirFor('job-1'))).toEqual(['input.webm']);
  });

  it('reports a missing executable as ToolchainError', async () => {
    const subject = new Transcoder({
      ffprobePath: await script('ffprobe', AV_PROBE),
      ffmpegPath: join(bin, 'missing-ffmpeg'),
      staging,
      timeouts: { baseMs: 1000, perMiBMs: 0, maxMs: 1000 },
      logger: silent,
    });

    await expect(
      subject.transcode({ jobId: 'job-1', inputPath, preset: 'audio-mp3-128k', inputSizeBytes: 3 }),
    ).rejects.toBeInstanceOf(ToolchainError);
  });

  it('checks that both executables answer -version', async () => {
    const ffmpeg = await script('ffmpeg', 'echo "ffmpeg version test"');

    expect(await checkToolchain(ffmpeg, join(bin, 'missing-ffprobe'))).toEqual({ ffmpeg: true, ffprobe: false });
  });
});

import type { PresetInfo } from 'reelfetch-client';
import type { PresetName } from '../types/jobs.js';

export interface PresetDefinition {
  kind: 'audio' | 'video';
  container: string;
  extension: string;
  mimeType: string;
  audioCodec: string;
  videoCodec?: string;
  maxHeight?: number;
  /** Expected encode cost relative to stream copy; scales the transcode timeout. */
  costFactor: number;
  /** ffmpeg output options, placed between the input and output file names. */
  args: readonly string[];
}

const scaleTo = (height: number) => `scale=-2:'min(${height},ih)'`;

const videoArgs = (height: number, crf: number, audioBitrate: string): readonly string[] => [
  '-map', '0:v:0',
  '-map', '0:a:0',
  '-vf', scaleTo(height),
  '-c:v', 'libx264',
  '-preset', 'veryfast',
  '-crf', String(crf),
  '-profile:v', 'high',
  '-pix_fmt', 'yuv420p',
  '-c:a', 'aac',
  '-b:a', audioBitrate,
  '-ac', '2',
  '-movflags', '+faststart',
  '-f', 'mp4',
];

const mp3Args = (bitrate: string): readonly string[] => [
  '-vn',
  '-map', '0:a:0',
  '-c:a', 'libmp3lame',
  '-b:a', bitrate,
  '-ar', '44100',
  '-f', 'mp3',
];

export const PRESETS = {
  'audio-mp3-128k': {
    kind: 'audio',
    container: 'mp3',
    extension: 'mp3',
    mimeType: 'audio/mpeg',
    audioCodec: 'libmp3lame',
    costFactor: 1,
    args: mp3Args('128k'),
  },
  'audio-mp3-192k': {
    kind: 'audio',
    container: 'mp3',
    extension: 'mp3',
    mimeType: 'audio/mpeg',
    audioCodec: 'libmp3lame',
    costFactor: 1,
    args: mp3Args('192k'),
  },
  'audio-mp3-320k': {
    kind: 'audio',
    container: 'mp3',
    extension: 'mp3',
    mimeType: 'audio/mpeg',
    audioCodec: 'libmp3lame',
    costFactor: 1,
    args: mp3Args('320k'),
  },
  'audio-m4a-aac-160k': {
    kind: 'audio',
    container: 'm4a',
    extension: 'm4a',
    mimeType: 'audio/mp4',
    audioCodec: 'aac',
    costFactor: 1,
    args: ['-vn', '-map', '0:a:0', '-c:a', 'aac', '-b:a', '160k', '-movflags', '+faststart', '-f', 'ipod'],
  },
  'video-h264-480p': {
    kind: 'video',
    container: 'mp4',
    extension: 'mp4',
    mimeType: 'video/mp4',
    audioCodec: 'aac',
    videoCodec: 'libx264',
    maxHeight: 480,
    costFactor: 2,
    args: videoArgs(480, 26, '128k'),
  },
  'video-h264-720p': {
    kind: 'video',
    container: 'mp4',
    extension: 'mp4',
    mimeType: 'video/mp4',
    audioCodec: 'aac',
    videoCodec: 'libx264',
    maxHeight: 720,
    costFactor: 3,
    args: videoArgs(720, 24, '128k'),
  },
  'video-h264-1080p': {
    kind: 'video',
    container: 'mp4',
    extension: 'mp4',
    mimeType: 'video/mp4',
    audioCodec: 'aac',
    videoCodec: 'libx264',
    maxHeight: 1080,
    costFactor: 4,
    args: videoArgs(1080, 23, '192k'),
  },
} as const satisfies Record<PresetName, PresetDefinition>;

export const PRESET_NAMES = Object.keys(PRESETS).filter(isPresetName);

export function isPresetName(value: unknown): value is PresetName {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(PRESETS, value);
}

export function getPreset(name: PresetName): PresetDefinition {
  return PRESETS[name];
}

export function describePreset(name: PresetName): PresetInfo {
  const preset: PresetDefinition = PRESETS[name];
  return {
    name,
    kind: preset.kind,
    container: preset.container,
    extension: preset.extension,
    mime_type: preset.mimeType,
    video_codec: preset.videoCodec,
    audio_codec: preset.audioCodec,
    max_height: preset.maxHeight,
  };
}

/**
 * Full ffmpeg argument list for a preset. File names are the fixed staging
 * names; the process runs with its working directory set to the job's
 * staging directory.
 */
export function buildFfmpegArgs(name: PresetName, inputFile: string, outputFile: string): string[] {
  return ['-hide_banner', '-nostdin', '-y', '-i', inputFile, ...PRESETS[name].args, outputFile];
}

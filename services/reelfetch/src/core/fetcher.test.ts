import { createHash } from 'crypto';
import { mkdtemp, readFile, readdir, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { ResolvedSource, SourceResolver, StreamCandidate } from '../types/jobs.js';
import { NetworkError, ResolveError, UnsupportedFormatError } from './errors.js';
import { Fetcher, rankCandidates } from './fetcher.js';
import { StagingArea } from './staging.js';

const MB = 1024 * 1024;
const silent = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

const combined = (name: string, height: number, sizeBytes: number): StreamCandidate => ({
  uri: `https://cdn.test/${name}.mp4`,
  ext: 'mp4',
  hasVideo: true,
  hasAudio: true,
  height,
  sizeBytes,
});

const candidates: Record<string, StreamCandidate> = {
  A: combined('a', 360, 5 * MB),
  B: combined('b', 1080, 50 * MB),
  C: combined('c', 1440, 90 * MB),
  D: { uri: 'https://cdn.test/d.mp4', ext: 'mp4', hasVideo: true, hasAudio: false, height: 720 },
  E: { ...combined('e', 720, 20 * MB), protocol: 'm3u8_native' },
  F: { uri: 'https://cdn.test/f.m4a', ext: 'm4a', hasVideo: false, hasAudio: true, bitrateKbps: 128 },
  G: { uri: 'https://cdn.test/g.webm', ext: 'webm', hasVideo: false, hasAudio: true, bitrateKbps: 160 },
  H: { uri: 'https://cdn.test/h.mp4', ext: 'mp4', hasVideo: true, hasAudio: true, height: 480, approxSizeBytes: 1000 },
};

function labels(ranked: StreamCandidate[]): string[] {
  return ranked.map((candidate) => Object.keys(candidates).find((key) => candidates[key] === candidate) ?? '?');
}

describe('rankCandidates', () => {
  const all = Object.values(candidates);

  it('prefers the tallest combined stream within the preset height', () => {
    expect(labels(rankCandidates(all, 'video-h264-1080p'))).toEqual(['B', 'A', 'C']);
  });

  it('falls back to the shortest stream above the preset height', () => {
    expect(labels(rankCandidates(all, 'video-h264-480p'))).toEqual(['A', 'B', 'C']);
  });

  it('puts audio-only streams first for audio presets, highest bitrate first', () => {
    expect(labels(rankCandidates(all, 'audio-mp3-192k'))).toEqual(['G', 'F', 'A', 'B', 'C']);
  });

  it('drops manifests, placeholders and non-http links', () => {
    const ftp: StreamCandidate = { ...combined('ftp', 720, MB), uri: 'ftp://cdn.test/x.mp4' };
    const html: StreamCandidate = { ...combined('page', 720, MB), ext: 'html' };
    expect(rankCandidates([candidates.E, candidates.H, ftp, html], 'video-h264-720p')).toEqual([]);
  });
});

describe('Fetcher', () => {
  let root: string;
  let staging: StagingArea;

  const resolverFor = (resolved: ResolvedSource) => ({
    name: 'stub',
    resolve: vi.fn().mockResolvedValue(resolved),
  });

  const clip: StreamCandidate = {
    uri: 'https://cdn.test/clip.mp4',
    ext: 'mp4',
    hasVideo: true,
    hasAudio: true,
    height: 720,
  };

  const createFetcher = (resolver: SourceResolver, overrides: { maxBytes?: number; hostAllowlist?: string[] } = {}) =>
    new Fetcher({
      resolver,
      staging,
      fetchTimeoutMs: 5000,
      maxBytes: overrides.maxBytes ?? 10 * MB,
      hostAllowlist: overrides.hostAllowlist,
      logger: silent,
    });

  beforeEach(async () => {
    vi.restoreAllMocks();
    root = await mkdtemp(join(tmpdir(), 'reelfetch-fetch-'));
    staging = new StagingArea(root, silent);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('streams the best candidate into input.<ext> and hashes it', async () => {
    const resolver = resolverFor({ title: 'Clip', candidates: [clip] });
    const fetchMock = vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('media-bytes', { status: 200, headers: { 'Content-Type': 'video/mp4' } }),
    );

    const result = await createFetcher(resolver).fetch('https://media.test/watch?v=1', {
      jobId: 'job-1',
      preset: 'video-h264-720p',
    });

    expect(result.path).toBe(join(staging.root, 'job-1', 'input.mp4'));
    expect(result.sizeBytes).toBe(11);
    expect(result.sha256).toBe(createHash('sha256').update('media-bytes').digest('hex'));
    expect(result.title).toBe('Clip');
    expect(await readFile(result.path, 'utf8')).toBe('media-bytes');
    expect(fetchMock).toHaveBeenCalledWith('https://cdn.test/clip.mp4', expect.objectContaining({ redirect: 'follow' }));
  });

  it('reports 5xx responses as retryable network errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('busy', { status: 503 }));

    const error = await createFetcher(resolverFor({ candidates: [clip] }))
      .fetch('https://media.test/v', { jobId: 'job-1', preset: 'video-h264-720p' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ kind: 'NetworkError', retryable: true, message: 'Source responded with HTTP 503' });
  });

  it('reports 4xx responses as resolve errors', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(new Response('gone', { status: 404 }));

    await expect(
      createFetcher(resolverFor({ candidates: [clip] })).fetch('https://media.test/v', { jobId: 'job-1', preset: 'video-h264-720p' }),
    ).rejects.toBeInstanceOf(ResolveError);
  });

  it('rejects non-media responses', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('<html></html>', { status: 200, headers: { 'Content-Type': 'text/html; charset=utf-8' } }),
    );

    await expect(
      createFetcher(resolverFor({ candidates: [clip] })).fetch('https://media.test/v', { jobId: 'job-1', preset: 'video-h264-720p' }),
    ).rejects.toThrow('Source returned non-media content (text/html)');
  });

  it('removes a truncated transfer and marks it retryable', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('media-bytes', { status: 200, headers: { 'Content-Type': 'video/mp4' } }),
    );

    const error = await createFetcher(resolverFor({ candidates: [{ ...clip, sizeBytes: 20 }] }))
      .fetch('https://media.test/v', { jobId: 'job-1', preset: 'video-h264-720p' })
      .catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NetworkError);
    expect(error).toMatchObject({ message: 'Transfer size mismatch: expected 20 bytes, received 11' });
    expect(await readdir(join(staging.root, 'job-1'))).toEqual([]);
  });

  it('stops a transfer that grows past the byte limit', async () => {
    vi.spyOn(globalThis, 'fetch').mockResolvedValue(
      new Response('media-bytes', { status: 200, headers: { 'Content-Type': 'video/mp4' } }),
    );

    await expect(
      createFetcher(resolverFor({ candidates: [clip] }), { maxBytes: 5 })
        .fetch('https://media.test/v', { jobId: 'job-1', preset: 'video-h264-720p' }),
    ).rejects.toBeInstanceOf(UnsupportedFormatError);
    expect(await readdir(join(staging.root, 'job-1'))).toEqual([]);
  });

  it('refuses hosts outside the allowlist before resolving', async () => {
    const resolver = resolverFor({ candidates: [clip] });

    await expect(
      createFetcher(resolver, { hostAllowlist: ['youtube.com'] })
        .fetch('https://media.test/v', { jobId: 'job-1', preset: 'video-h264-720p' }),
    ).rejects.toThrow('Host media.test is not on the source allowlist');
    expect(resolver.resolve).not.toHaveBeenCalled();
  });

  it('keeps typed resolver errors and wraps unknown ones as resolve errors', async () => {
    const flaky: SourceResolver = { name: 'flaky', resolve: vi.fn().mockRejectedValue(new NetworkError('reset')) };
    const broken: SourceResolver = { name: 'broken', resolve: vi.fn().mockRejectedValue(new Error('boom')) };

    await expect(
      createFetcher(flaky).fetch('https://media.test/v', { jobId: 'job-1', preset: 'audio-mp3-128k' }),
    ).rejects.toBeInstanceOf(NetworkError);
    await expect(
      createFetcher(broken).fetch('https://media.test/v', { jobId: 'job-1', preset: 'audio-mp3-128k' }),
    ).rejects.toMatchObject({ kind: 'ResolveError', message: 'boom' });
  });

  it('fails with UnsupportedFormatError when no candidate fits the preset', async () => {
    const videoOnly: StreamCandidate = { ...clip, hasAudio: false };

    await expect(
      createFetcher(resolverFor({ candidates: [videoOnly] })).fetch('https://media.test/v', { jobId: 'job-1', preset: 'video-h264-720p' }),
    ).rejects.toThrow('No usable stream among 1 candidate(s) for preset video-h264-720p');
  });
});

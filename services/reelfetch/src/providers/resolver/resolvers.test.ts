import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { NetworkError, ResolveError, UnsupportedFormatError } from '../../core/errors.js';
import { AutoResolver } from './auto.js';
import { DirectResolver } from './direct.js';
import { YtDlpResolver, parseYtDlpInfo } from './ytdlp.js';

describe('DirectResolver', () => {
  it('offers the URL itself as the only candidate', async () => {
    const resolved = await new DirectResolver().resolve(new URL('https://cdn.test/music/My%20Song.MP3?sig=1'));

    expect(resolved).toEqual({
      title: 'My Song',
      candidates: [
        { uri: 'https://cdn.test/music/My%20Song.MP3?sig=1', ext: 'mp3', hasVideo: false, hasAudio: true },
      ],
    });
  });

  it('refuses URLs that do not name a media file', async () => {
    await expect(new DirectResolver().resolve(new URL('https://cdn.test/page.html'))).rejects.toBeInstanceOf(
      UnsupportedFormatError,
    );
  });
});

describe('AutoResolver', () => {
  it('routes media links directly and everything else to the extractor', async () => {
    const direct = { name: 'direct', resolve: vi.fn().mockResolvedValue({ candidates: [] }) };
    const extractor = { name: 'ytdlp', resolve: vi.fn().mockResolvedValue({ candidates: [] }) };
    const auto = new AutoResolver(direct, extractor);

    await auto.resolve(new URL('https://cdn.test/clip.mp4'));
    await auto.resolve(new URL('https://www.youtube.com/watch?v=abc'));

    expect(direct.resolve).toHaveBeenCalledTimes(1);
    expect(extractor.resolve).toHaveBeenCalledTimes(1);
    expect(extractor.resolve).toHaveBeenCalledWith(new URL('https://www.youtube.com/watch?v=abc'));
  });
});

describe('parseYtDlpInfo', () => {
  it('maps formats to candidates and skips entries without a URL', () => {
    const resolved = parseYtDlpInfo(JSON.stringify({
      title: 'Clip',
      formats: [
        {
          format_id: '18',
          url: 'https://cdn.test/18.mp4',
          ext: 'mp4',
          vcodec: 'avc1.42001E',
          acodec: 'mp4a.40.2',
          height: 360,
          filesize: 1234567,
          protocol: 'https',
          http_headers: { 'User-Agent': 'test-agent', 'X-Count': 1 },
        },
        {
          format_id: '140',
          url: 'https://cdn.test/140.m4a',
          ext: 'm4a',
          vcodec: 'none',
          acodec: 'mp4a.40.2',
          abr: 129.5,
          filesize_approx: 3000000,
        },
        { format_id: 'sb0', ext: 'mhtml', vcodec: 'none', acodec: 'none' },
      ],
    }));

    expect(resolved).toEqual({
      title: 'Clip',
      candidates: [
        {
          uri: 'https://cdn.test/18.mp4',
          ext: 'mp4',
          hasVideo: true,
          hasAudio: true,
          height: 360,
          sizeBytes: 1234567,
          protocol: 'https',
          headers: { 'User-Agent': 'test-agent' },
        },
        {
          uri: 'https://cdn.test/140.m4a',
          ext: 'm4a',
          hasVideo: false,
          hasAudio: true,
          bitrateKbps: 129.5,
          approxSizeBytes: 3000000,
        },
      ],
    });
  });

  it('uses the top-level entry when the extractor lists no formats', () => {
    const resolved = parseYtDlpInfo(JSON.stringify({ title: 'Voice note', url: 'https://cdn.test/v.mp3', ext: 'mp3' }));

    expect(resolved.candidates).toEqual([{ uri: 'https://cdn.test/v.mp3', ext: 'mp3', hasVideo: false, hasAudio: true }]);
  });

  it('rejects output that is not JSON', () => {
    expect(() => parseYtDlpInfo('<html>')).toThrow(ResolveError);
  });
});

describe('YtDlpResolver', () => {
  let bin: string;

  async function fakeYtDlp(body: string): Promise<YtDlpResolver> {
    const path = join(bin, 'yt-dlp');
    await writeFile(path, `#!/bin/sh\n${body}\n`, { mode: 0o755 });
    return new YtDlpResolver({ binaryPath: path, timeoutMs: 5000 });
  }

  beforeEach(async () => {
    bin = await mkdtemp(join(tmpdir(), 'reelfetch-ytdlp-'));
  });

  afterEach(async () => {
    await rm(bin, { recursive: true, force: true });
  });

  it('reads metadata printed by yt-dlp', async () => {
    const resolver = await fakeYtDlp(`echo '{"title":"Clip","formats":[{"url":"https://cdn.test/a.webm","ext":"webm","vcodec":"none","acodec":"opus","abr":160}]}'`);

    const resolved = await resolver.resolve(new URL('https://www.youtube.com/watch?v=abc'));

    expect(resolved.title).toBe('Clip');
    expect(resolved.candidates).toHaveLength(1);
    expect(resolved.candidates[0]).toMatchObject({ ext: 'webm', hasVideo: false, bitrateKbps: 160 });
  });

  it('treats private or removed videos as permanent resolve failures', async () => {
    const resolver = await fakeYtDlp('echo "ERROR: [youtube] abc: Private video. Sign in if you have been granted access" >&2\nexit 1');

    const error = await resolver.resolve(new URL('https://www.youtube.com/watch?v=abc')).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(ResolveError);
    expect(error).toMatchObject({
      message: 'ERROR: [youtube] abc: Private video. Sign in if you have been granted access',
    });
  });

  it('treats other extractor failures as retryable', async () => {
    const resolver = await fakeYtDlp('echo "ERROR: Unable to download webpage: timed out" >&2\nexit 1');

    await expect(resolver.resolve(new URL('https://www.youtube.com/watch?v=abc'))).rejects.toBeInstanceOf(NetworkError);
  });
});

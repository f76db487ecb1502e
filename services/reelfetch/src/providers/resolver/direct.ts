import { extname, posix } from 'path';
import { UnsupportedFormatError } from '../../core/errors.js';
import { AUDIO_EXTENSIONS, normalizeExtension } from '../../core/fetcher.js';
import type { ResolvedSource, SourceResolver } from '../../types/jobs.js';

function decodeSegment(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch {
    return segment;
  }
}

/** Extension of the URL path when it names a known media container. */
export function mediaExtensionOf(url: URL): string | undefined {
  return normalizeExtension(extname(url.pathname).slice(1));
}

/** Treats the URL itself as the media file. */
export class DirectResolver implements SourceResolver {
  readonly name = 'direct';

  async resolve(url: URL): Promise<ResolvedSource> {
    const ext = mediaExtensionOf(url);
    if (!ext) {
      throw new UnsupportedFormatError(`URL does not point at a known media file: ${url.pathname}`);
    }

    const title = decodeSegment(posix.basename(url.pathname, extname(url.pathname)));
    return {
      title: title || undefined,
      candidates: [
        {
          uri: url.href,
          ext,
          hasVideo: !AUDIO_EXTENSIONS.has(ext),
          hasAudio: true,
        },
      ],
    };
  }
}

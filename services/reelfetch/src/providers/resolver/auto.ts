import type { ResolvedSource, SourceResolver } from '../../types/jobs.js';
import { mediaExtensionOf } from './direct.js';

/** Direct media links skip the extractor; every other URL goes through it. */
export class AutoResolver implements SourceResolver {
  readonly name = 'auto';

  constructor(
    private readonly direct: SourceResolver,
    private readonly extractor: SourceResolver,
  ) {}

  resolve(url: URL): Promise<ResolvedSource> {
    return mediaExtensionOf(url) ? this.direct.resolve(url) : this.extractor.resolve(url);
  }
}

import { config, type ResolverName } from '../../config.js';
import type { SourceResolver } from '../../types/jobs.js';
import { AutoResolver } from './auto.js';
import { DirectResolver } from './direct.js';
import { YtDlpResolver } from './ytdlp.js';

export function createSourceResolver(name: ResolverName = config.sourceResolver): SourceResolver {
  const direct = new DirectResolver();
  if (name === 'direct') return direct;

  const ytdlp = new YtDlpResolver({ binaryPath: config.ytdlpPath, timeoutMs: config.resolveTimeoutMs });
  if (name === 'ytdlp') return ytdlp;
  return new AutoResolver(direct, ytdlp);
}

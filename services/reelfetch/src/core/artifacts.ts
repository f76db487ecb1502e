import { createHash } from 'crypto';
import { createReadStream } from 'fs';
import { copyFile, mkdir, readdir, rm, stat } from 'fs/promises';
import { join } from 'path';
import { pipeline } from 'stream/promises';

const MAX_TITLE_LENGTH = 120;

export async function sha256File(path: string): Promise<string> {
  const hash = createHash('sha256');
  await pipeline(createReadStream(path), hash);
  return hash.digest('hex');
}

/** Keeps letters, digits, spaces and `._-`; anything else becomes `_`. */
export function sanitizeTitle(title: string): string {
  return title
    .normalize('NFC')
    .replace(/[^\p{L}\p{N} ._-]/gu, '_')
    .trim()
    .replace(/^\.+/, '')
    .slice(0, MAX_TITLE_LENGTH)
    .trim();
}

/** Download name shown to the requester; falls back to the job id. */
export function artifactFileName(title: string | undefined, jobId: string, extension: string): string {
  const base = title ? sanitizeTitle(title) : '';
  return `${base || jobId}.${extension}`;
}

export async function storeArtifact(params: {
  directory: string;
  jobId: string;
  extension: string;
  sourcePath: string;
}): Promise<{ fileName: string; fullPath: string; sizeBytes: number; sha256: string }> {
  await mkdir(params.directory, { recursive: true });

  const fileName = `${params.jobId}.${params.extension}`;
  const fullPath = join(params.directory, fileName);
  await copyFile(params.sourcePath, fullPath);

  return {
    fileName,
    fullPath,
    sizeBytes: (await stat(fullPath)).size,
    sha256: await sha256File(fullPath),
  };
}

export async function cleanupOldArtifacts(directory: string, retentionHours: number): Promise<number> {
  await mkdir(directory, { recursive: true });
  const files = await readdir(directory);
  const cutoffMs = Date.now() - retentionHours * 60 * 60 * 1000;
  let deleted = 0;

  for (const file of files) {
    const fullPath = join(directory, file);
    const fileStat = await stat(fullPath);
    if (fileStat.mtimeMs < cutoffMs) {
      await rm(fullPath, { force: true });
      deleted += 1;
    }
  }

  return deleted;
}

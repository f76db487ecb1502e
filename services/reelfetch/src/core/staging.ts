import { mkdir, readdir, rm } from 'fs/promises';
import { join, resolve } from 'path';
import type { Logger } from '../types/jobs.js';

const JOB_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Scratch storage for in-flight jobs. Every job gets `<root>/<jobId>/`;
 * nothing is shared between jobs.
 */
export class StagingArea {
  readonly root: string;

  constructor(root: string, private readonly logger: Logger = console) {
    this.root = resolve(root);
  }

  dirFor(jobId: string): string {
    if (!JOB_ID_PATTERN.test(jobId)) {
      throw new Error(`Invalid job id for staging path: ${jobId}`);
    }
    return join(this.root, jobId);
  }

  async prepare(jobId: string): Promise<string> {
    const dir = this.dirFor(jobId);
    await mkdir(dir, { recursive: true });
    return dir;
  }

  async cleanup(jobId: string): Promise<void> {
    const dir = this.dirFor(jobId);
    try {
      await rm(dir, { recursive: true, force: true });
    } catch (error) {
      this.logger.error(`[reelfetch-staging] failed to remove ${dir}`, error);
      throw error;
    }
  }

  async list(): Promise<string[]> {
    await mkdir(this.root, { recursive: true });
    return readdir(this.root);
  }

  /** Removes directories left behind by a previous process. */
  async sweep(): Promise<number> {
    const entries = await this.list();
    for (const entry of entries) {
      await rm(join(this.root, entry), { recursive: true, force: true });
    }
    if (entries.length > 0) {
      this.logger.log(`[reelfetch-staging] swept ${entries.length} stale staging entries from ${this.root}`);
    }
    return entries.length;
  }
}

import { ReelfetchHttpClient } from './client.js';
import { JobsResource } from './jobs.js';
import { PresetsResource } from './presets.js';
import { Webhooks } from './webhooks.js';
import type { ReelfetchConfig } from './types.js';

export class Reelfetch {
  public readonly jobs: JobsResource;
  public readonly presets: PresetsResource;
  public readonly webhooks: Webhooks;
  private readonly client: ReelfetchHttpClient;

  constructor(config: ReelfetchConfig = {}) {
    this.client = new ReelfetchHttpClient(config);
    this.jobs = new JobsResource(this.client);
    this.presets = new PresetsResource(this.client);
    this.webhooks = new Webhooks();
  }

  setApiKey(apiKey: string): void {
    this.client.setApiKey(apiKey);
  }
}

export { Webhooks, SIGNATURE_HEADER } from './webhooks.js';
export type { ConstructEventOptions } from './webhooks.js';
export * from './types.js';
export * from './errors.js';

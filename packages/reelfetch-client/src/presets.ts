import type { ReelfetchHttpClient } from './client.js';
import type { PresetListResponse, RequestOptions } from './types.js';

export class PresetsResource {
  constructor(private readonly client: ReelfetchHttpClient) {}

  list(options?: RequestOptions): Promise<PresetListResponse> {
    return this.client.request<PresetListResponse>({
      method: 'GET',
      path: '/v1/presets',
      options,
    });
  }
}

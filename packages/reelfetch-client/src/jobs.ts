import { InvalidRequestError } from './errors.js';
import type { ReelfetchHttpClient } from './client.js';
import type {
  CancelJobResponse,
  JobSnapshot,
  RequestOptions,
  SubmitJobRequest,
  SubmitJobResponse,
} from './types.js';

export class JobsResource {
  constructor(private readonly client: ReelfetchHttpClient) {}

  submit(body: SubmitJobRequest, options?: RequestOptions): Promise<SubmitJobResponse> {
    if (!body.source_ref?.trim()) {
      throw new InvalidRequestError('source_ref is required');
    }
    if (!body.callback_url?.trim()) {
      throw new InvalidRequestError('callback_url is required');
    }

    return this.client.request<SubmitJobResponse>({
      method: 'POST',
      path: '/v1/jobs',
      body,
      options,
    });
  }

  retrieve(jobId: string, options?: RequestOptions): Promise<JobSnapshot> {
    return this.client.request<JobSnapshot>({
      method: 'GET',
      path: `/v1/jobs/${encodeURIComponent(jobId)}`,
      options,
    });
  }

  cancel(jobId: string, options?: RequestOptions): Promise<CancelJobResponse> {
    return this.client.request<CancelJobResponse>({
      method: 'POST',
      path: `/v1/jobs/${encodeURIComponent(jobId)}/cancel`,
      options,
    });
  }
}

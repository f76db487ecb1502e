import { randomUUID } from 'crypto';
import {
  SIGNATURE_HEADER,
  Webhooks,
  type DeliveryEvent,
  type JobCompletedEvent,
  type JobFailedEvent,
} from 'reelfetch-client';
import { DeliveryError, errorMessage, toPipelineError } from '../../core/errors.js';
import type { ArtifactStorage, UploadArtifactResult } from '../storage/types.js';
import type {
  Artifact,
  DeliveryJob,
  DeliveryTarget,
  FailureReport,
  Logger,
} from '../../types/jobs.js';

/** What the HTTP and Redis intakes attach to each Job. */
export interface WebhookContext {
  callbackUrl: string;
  reference?: string;
}

export interface WebhookDeliveryOptions {
  storage: ArtifactStorage;
  signingSecret: string;
  timeoutMs: number;
  logger?: Logger;
}

function eventId(): string {
  return `evt_${randomUUID().replace(/-/g, '')}`;
}

/**
 * Publishes the artifact through artifact storage and notifies the requester's
 * callback URL with a signed `job.completed` / `job.failed` event.
 */
export class WebhookDeliveryTarget implements DeliveryTarget<WebhookContext> {
  readonly name = 'webhook';
  private readonly webhooks = new Webhooks();
  private readonly logger: Logger;

  constructor(private readonly options: WebhookDeliveryOptions) {
    this.logger = options.logger ?? console;
  }

  async onComplete(job: DeliveryJob<WebhookContext>, artifact: Artifact): Promise<void> {
    let uploaded: UploadArtifactResult;
    try {
      uploaded = await this.options.storage.uploadArtifact({
        jobId: artifact.jobId,
        filePath: artifact.path,
        fileName: artifact.fileName,
        mimeType: artifact.mimeType,
        extension: artifact.extension,
      });
    } catch (error) {
      throw toPipelineError(error, (message, options) => new DeliveryError(`Artifact upload failed: ${message}`, options));
    }

    const event: JobCompletedEvent = {
      event_type: 'job.completed',
      event_id: eventId(),
      created_at: new Date().toISOString(),
      data: {
        job_id: job.id,
        reference: job.requesterContext.reference,
        source_ref: job.sourceRef,
        output_spec: job.outputSpec,
        artifact: {
          download_url: uploaded.downloadUrl,
          file_name: artifact.fileName,
          mime_type: artifact.mimeType,
          size_bytes: uploaded.sizeBytes,
          sha256: uploaded.sha256,
        },
      },
    };
    await this.post(job.requesterContext.callbackUrl, event);
  }

  async onFailure(job: DeliveryJob<WebhookContext>, failure: FailureReport): Promise<void> {
    const event: JobFailedEvent = {
      event_type: 'job.failed',
      event_id: eventId(),
      created_at: new Date().toISOString(),
      data: {
        job_id: job.id,
        reference: job.requesterContext.reference,
        source_ref: job.sourceRef,
        output_spec: job.outputSpec,
        failure: { kind: failure.kind, detail: failure.detail },
      },
    };
    await this.post(job.requesterContext.callbackUrl, event);
  }

  private async post(callbackUrl: string, event: DeliveryEvent): Promise<void> {
    const body = JSON.stringify(event);
    const signature = this.webhooks.generateSignature(body, this.options.signingSecret);

    let response: Response;
    try {
      response = await fetch(callbackUrl, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          [SIGNATURE_HEADER]: signature,
        },
        body,
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      throw new DeliveryError(`Callback request failed: ${errorMessage(error)}`, { cause: error });
    }

    if (!response.ok) {
      throw new DeliveryError(`Callback responded with HTTP ${response.status}`);
    }

    this.logger.log(
      `[reelfetch-webhook] delivered event=${event.event_type} job_id=${event.data.job_id} status=${response.status}`,
    );
  }
}

import { createHmac, timingSafeEqual } from 'node:crypto';
import { InvalidRequestError } from './errors.js';
import type { DeliveryEvent } from './types.js';

const DEFAULT_TOLERANCE_SECONDS = 300;

export const SIGNATURE_HEADER = 'X-Reelfetch-Signature';

export interface ConstructEventOptions {
  tolerance?: number;
}

function isDeliveryEvent(value: unknown): value is DeliveryEvent {
  if (typeof value !== 'object' || value === null) return false;
  if (!('event_type' in value) || !('data' in value)) return false;
  const eventType = value.event_type;
  return (
    (eventType === 'job.completed' || eventType === 'job.failed')
    && typeof value.data === 'object'
    && value.data !== null
  );
}

export class Webhooks {
  constructEvent(
    payload: string | Buffer,
    signature: string | undefined,
    secret: string,
    options: ConstructEventOptions = {},
  ): DeliveryEvent {
    const tolerance = options.tolerance ?? DEFAULT_TOLERANCE_SECONDS;

    if (!signature) {
      throw new InvalidRequestError(`Missing ${SIGNATURE_HEADER} header`, 'WEBHOOK_SIGNATURE_ERROR');
    }
    this.assertSecret(secret);

    const payloadString = typeof payload === 'string' ? payload : payload.toString('utf8');
    const { timestamp, signatures } = this.parseSignatureHeader(signature);

    const now = Math.floor(Date.now() / 1000);
    if (Math.abs(now - timestamp) > tolerance) {
      throw new InvalidRequestError(
        `Webhook timestamp outside tolerance window (${tolerance}s)`,
        'WEBHOOK_SIGNATURE_ERROR',
      );
    }

    const expectedSignature = this.digest(payloadString, secret, timestamp);

    const valid = signatures.some((candidate) => this.secureCompare(candidate, expectedSignature));
    if (!valid) {
      throw new InvalidRequestError('Invalid webhook signature', 'WEBHOOK_SIGNATURE_ERROR');
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(payloadString);
    } catch {
      throw new InvalidRequestError('Invalid webhook payload JSON', 'WEBHOOK_SIGNATURE_ERROR');
    }
    if (!isDeliveryEvent(parsed)) {
      throw new InvalidRequestError('Unrecognized webhook event', 'WEBHOOK_SIGNATURE_ERROR');
    }
    return parsed;
  }

  /** Builds the `t=<unix>,v1=<hex>` header value the service sends with each event. */
  generateSignature(payload: string, secret: string, timestamp?: number): string {
    this.assertSecret(secret);
    const ts = timestamp ?? Math.floor(Date.now() / 1000);
    return `t=${ts},v1=${this.digest(payload, secret, ts)}`;
  }

  private digest(payload: string, secret: string, timestamp: number): string {
    return createHmac('sha256', secret)
      .update(`${timestamp}.${payload}`)
      .digest('hex');
  }

  private assertSecret(secret: string): void {
    if (!secret || !secret.startsWith('whsec_')) {
      throw new InvalidRequestError(
        'Invalid webhook secret format (expected whsec_...)',
        'WEBHOOK_SIGNATURE_ERROR',
      );
    }
  }

  private parseSignatureHeader(header: string): { timestamp: number; signatures: string[] } {
    const parts = header.split(',').map((part) => part.trim());
    const timestampPart = parts.find((part) => part.startsWith('t='));
    const signatureParts = parts.filter((part) => part.startsWith('v1='));

    if (!timestampPart || signatureParts.length === 0) {
      throw new InvalidRequestError(`Malformed ${SIGNATURE_HEADER} header`, 'WEBHOOK_SIGNATURE_ERROR');
    }

    const timestamp = Number.parseInt(timestampPart.slice(2), 10);
    if (!Number.isFinite(timestamp)) {
      throw new InvalidRequestError('Invalid webhook timestamp', 'WEBHOOK_SIGNATURE_ERROR');
    }

    return {
      timestamp,
      signatures: signatureParts.map((part) => part.slice(3)),
    };
  }

  private secureCompare(a: string, b: string): boolean {
    if (a.length !== b.length) return false;
    return timingSafeEqual(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
  }
}

import type { PresetName } from '../types/jobs.js';
import { parseSourceUrl } from './platforms.js';
import { isPresetName } from './presets.js';

const MAX_REFERENCE_LENGTH = 256;
const MAX_URL_LENGTH = 4096;

export interface JobRequest {
  sourceRef: string;
  outputSpec?: PresetName;
  callbackUrl: string;
  reference?: string;
}

export type ParsedJobRequest = { ok: true; value: JobRequest } | { ok: false; message: string };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function readUrl(body: Record<string, unknown>, field: string): string | { error: string } {
  const raw = body[field];
  if (typeof raw !== 'string' || raw.trim().length === 0) {
    return { error: `${field} is required and must be a non-empty string` };
  }
  const value = raw.trim();
  if (value.length > MAX_URL_LENGTH) {
    return { error: `${field} exceeds max length of ${MAX_URL_LENGTH} characters` };
  }
  if (!parseSourceUrl(value)) {
    return { error: `${field} must be an absolute http(s) URL` };
  }
  return value;
}

/** Validates a `{ source_ref, output_spec?, callback_url, reference? }` submission body. */
export function parseJobRequest(body: unknown): ParsedJobRequest {
  if (!isObject(body)) {
    return { ok: false, message: 'Request body must be a JSON object' };
  }

  const sourceRef = readUrl(body, 'source_ref');
  if (typeof sourceRef !== 'string') return { ok: false, message: sourceRef.error };

  const callbackUrl = readUrl(body, 'callback_url');
  if (typeof callbackUrl !== 'string') return { ok: false, message: callbackUrl.error };

  const result: JobRequest = { sourceRef, callbackUrl };

  if (body.output_spec !== undefined) {
    if (!isPresetName(body.output_spec)) {
      return { ok: false, message: 'output_spec must be one of the presets listed at /v1/presets' };
    }
    result.outputSpec = body.output_spec;
  }

  if (body.reference !== undefined) {
    if (typeof body.reference !== 'string' || body.reference.length > MAX_REFERENCE_LENGTH) {
      return { ok: false, message: `reference must be a string of at most ${MAX_REFERENCE_LENGTH} characters` };
    }
    result.reference = body.reference;
  }

  return { ok: true, value: result };
}

import {
  AuthenticationError,
  InvalidRequestError,
  NotFoundError,
  QueueSaturatedError,
  ReelfetchError,
} from './errors.js';
import type { ErrorResponse, ReelfetchConfig, RequestOptions } from './types.js';

const DEFAULT_BASE_URL = 'http://localhost:3030';
const USER_AGENT = 'reelfetch-client/0.1.0';

interface RequestConfig {
  path: string;
  method: 'GET' | 'POST';
  body?: unknown;
  options?: RequestOptions;
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function buildPath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function parseResponseBody(raw: string): unknown {
  if (!raw) return {};
  try {
    return JSON.parse(raw) as unknown;
  } catch {
    return { message: raw };
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function isErrorResponse(input: unknown): input is ErrorResponse {
  if (!isObject(input)) return false;
  const err = input.error;
  if (!isObject(err)) return false;
  return typeof err.code === 'string' && typeof err.message === 'string';
}

export class ReelfetchHttpClient {
  private readonly baseUrl: string;
  private apiKey?: string;

  constructor(config: ReelfetchConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.apiKey = config.apiKey;
  }

  setApiKey(apiKey: string): void {
    this.apiKey = apiKey;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    const url = new URL(`${this.baseUrl}${buildPath(config.path)}`);

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };

    const apiKey = config.options?.apiKey ?? this.apiKey;
    if (apiKey) {
      headers['x-api-key'] = apiKey;
    }

    let body: string | undefined;
    if (config.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(config.body);
    }

    const response = await fetch(url.toString(), {
      method: config.method,
      headers,
      body,
      signal: config.options?.signal,
    });

    const rawText = await response.text();
    const parsedBody = parseResponseBody(rawText);

    if (!response.ok) {
      throw this.toApiError(response.status, parsedBody, response.headers);
    }

    return parsedBody as T;
  }

  private toApiError(status: number, payload: unknown, headers: Headers): ReelfetchError {
    let code = 'UNKNOWN';
    let message = `reelfetch request failed with status ${status}`;
    let details: Record<string, unknown> | undefined;

    if (isErrorResponse(payload)) {
      code = payload.error.code;
      message = payload.error.message;
      details = payload.error.details;
    } else if (isObject(payload)) {
      if (typeof payload.code === 'string') code = payload.code;
      if (typeof payload.message === 'string') message = payload.message;
      if (isObject(payload.details)) details = payload.details;
    }

    if (status === 401) {
      return new AuthenticationError(message, payload);
    }
    if (status === 400 || status === 422) {
      return new InvalidRequestError(message, code, details, payload);
    }
    if (status === 404) {
      return new NotFoundError(message, code, payload);
    }
    if (status === 503 && code === 'QUEUE_SATURATED') {
      const retryFromBody =
        details && typeof details.retry_after_seconds === 'number'
          ? details.retry_after_seconds
          : undefined;
      const retryFromHeader = headers.get('retry-after');
      const retryAfterSeconds =
        retryFromBody
        ?? (retryFromHeader ? Number.parseInt(retryFromHeader, 10) : undefined);
      return new QueueSaturatedError(message, retryAfterSeconds, payload);
    }

    return new ReelfetchError(message, code, status, details, payload);
  }
}

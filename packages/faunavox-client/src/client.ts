import {
  AuthenticationError,
  FaunavoxApiError,
  InvalidRequestError,
  NotFoundError,
  PermissionDeniedError,
  ServiceUnavailableError,
} from './errors.js';
import type { ErrorResponse, FaunavoxClientConfig, RequestOptions } from './types.js';

const DEFAULT_BASE_URL = 'http://localhost:3020';
const USER_AGENT = 'faunavox-client/0.1.0';

interface RequestConfig {
  path: string;
  method: 'GET' | 'POST';
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /** Sent as-is instead of a JSON body. */
  binary?: { data: Uint8Array; contentType: string };
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

function isRecord(input: unknown): input is Record<string, unknown> {
  return typeof input === 'object' && input !== null;
}

function isErrorResponse(input: unknown): input is ErrorResponse {
  if (!isRecord(input) || !isRecord(input.error)) return false;
  return typeof input.error.code === 'string' && typeof input.error.message === 'string';
}

export class FaunavoxHttpClient {
  private readonly baseUrl: string;
  private callerId?: string;
  private readonly apiKey?: string;

  constructor(config: FaunavoxClientConfig = {}) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl ?? DEFAULT_BASE_URL);
    this.callerId = config.callerId;
    this.apiKey = config.apiKey;
  }

  setCallerId(callerId: string): void {
    this.callerId = callerId;
  }

  async request<T>(config: RequestConfig): Promise<T> {
    const url = new URL(`${this.baseUrl}${buildPath(config.path)}`);
    if (config.query) {
      for (const [key, value] of Object.entries(config.query)) {
        if (value === undefined) continue;
        url.searchParams.set(key, String(value));
      }
    }

    const headers: Record<string, string> = {
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    };

    const callerId = config.options?.callerId ?? this.callerId;
    if (callerId) {
      headers['x-caller-id'] = callerId;
    }
    if (this.apiKey) {
      headers['x-api-key'] = this.apiKey;
    }

    let body: string | Uint8Array | undefined;
    if (config.binary) {
      headers['Content-Type'] = config.binary.contentType;
      body = config.binary.data;
    } else if (config.body !== undefined) {
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
      throw this.toApiError(response.status, parsedBody);
    }

    return parsedBody as T;
  }

  private toApiError(status: number, payload: unknown): FaunavoxApiError {
    let code = 'UNKNOWN';
    let message = `Faunavox API request failed with status ${status}`;
    let details: Record<string, unknown> | undefined;

    if (isErrorResponse(payload)) {
      code = payload.error.code;
      message = payload.error.message;
      details = payload.error.details;
    } else if (isRecord(payload) && typeof payload.message === 'string') {
      message = payload.message;
    }

    if (status === 401) {
      return new AuthenticationError(message, payload);
    }
    if (status === 403) {
      return new PermissionDeniedError(message, payload);
    }
    if (status === 404) {
      return new NotFoundError(message, code, payload);
    }
    if (status === 400 || status === 413 || status === 415 || status === 422) {
      return new InvalidRequestError(message, code, status, details, payload);
    }
    if (status === 502 || status === 503 || status === 504) {
      return new ServiceUnavailableError(message, code, status, payload);
    }

    return new FaunavoxApiError(message, code, status, details, payload);
  }
}

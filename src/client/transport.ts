import type { JsonObject } from '../types.js';
import {
  AuthError,
  ConflictError,
  DecodeError,
  NetworkError,
  NotFoundError,
  ServiceError,
  ValidationError,
} from '../errors.js';
import { serviceMessages } from '../record/codec.js';
import type { ResolvedConfig } from './config.js';

export type HttpMethod = 'GET' | 'PUT' | 'POST' | 'PATCH' | 'DELETE';

export interface TransportRequest {
  /** Client operation ("get", "query", ...) named in DecodeError. */
  operation: string;
  method: HttpMethod;
  /** Base-relative path, already URL-encoded. */
  path: string;
  body?: JsonObject;
  /** Only idempotent requests are retried after a transport failure. */
  idempotent: boolean;
  /** Item key the request addresses; attached to NotFound/Conflict errors. */
  key?: string;
}

export interface TransportResponse {
  status: number;
  body: unknown;
}

/** Internal: sleep for ms milliseconds */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseBody(text: string): unknown {
  return text === '' ? null : JSON.parse(text);
}

/**
 * Maps a non-2xx status to the error kind callers branch on.
 */
export function errorForStatus(status: number, body: unknown, key?: string): Error {
  const messages = serviceMessages(body);
  const detail = messages.length > 0 ? messages.join('; ') : undefined;

  switch (status) {
    case 400:
    case 413:
    case 422:
      return new ValidationError(detail ?? `Request rejected by the service (HTTP ${status})`, status, messages);
    case 401:
    case 403:
      return new AuthError(status, messages, detail);
    case 404:
      return new NotFoundError(key, detail);
    case 409:
      return new ConflictError(key, detail);
    default:
      return new ServiceError(status, messages, detail);
  }
}

/**
 * Issues requests against one base: `{endpoint}/{projectId}/{base}/{path}`.
 * Stateless apart from the resolved config; safe to share.
 */
export class HttpTransport {
  private readonly baseUrl: string;

  constructor(
    private readonly config: ResolvedConfig,
    baseName: string,
  ) {
    this.baseUrl = `${config.endpoint}/${encodeURIComponent(config.projectId)}/${encodeURIComponent(baseName)}`;
  }

  async send(request: TransportRequest): Promise<TransportResponse> {
    const { status, text } = await this.exchangeWithRetry(request);

    if (status < 200 || status >= 300) {
      let body: unknown = text;
      try {
        body = parseBody(text);
      } catch {
        // non-JSON error body (proxy page, plain text): classify by status alone
      }
      throw errorForStatus(status, body, request.key);
    }

    try {
      return { status, body: parseBody(text) };
    } catch (err) {
      throw new DecodeError(request.operation, 'response body is not valid JSON', err);
    }
  }

  /**
   * One HTTP exchange with linear backoff. Only transport failures are
   * retried, and only for idempotent requests; any HTTP status is final.
   */
  private async exchangeWithRetry(
    request: TransportRequest,
  ): Promise<{ status: number; text: string }> {
    const retries = request.idempotent ? this.config.maxRetries : 0;
    let attempt = 0;
    while (true) {
      try {
        return await this.exchange(request);
      } catch (err) {
        attempt++;
        if (attempt > retries) {
          throw new NetworkError(
            `${request.method} ${request.path} failed after ${attempt} attempt(s): ${describe(err)}`,
            attempt,
            err,
          );
        }
        const nextDelayMs = this.config.retryDelayMs * attempt;
        try {
          this.config.onRetry(attempt, err, nextDelayMs, { method: request.method, path: request.path });
        } catch {
          // a throwing hook must not change the outcome of the request
        }
        await sleep(nextDelayMs);
      }
    }
  }

  private async exchange(request: TransportRequest): Promise<{ status: number; text: string }> {
    const headers: Record<string, string> = {
      'X-API-Key': this.config.projectKey,
      Accept: 'application/json',
    };
    const init: RequestInit = {
      method: request.method,
      headers,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    };
    if (request.body !== undefined) {
      headers['Content-Type'] = 'application/json';
      init.body = JSON.stringify(request.body);
    }

    const resp = await this.config.fetch(`${this.baseUrl}/${request.path}`, init);
    const text = await resp.text();
    return { status: resp.status, text };
  }
}

function describe(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'TimeoutError' ? 'request timed out' : err.message;
  }
  return String(err);
}

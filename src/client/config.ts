import { ConfigurationError } from '../errors.js';

export const DEFAULT_ENDPOINT = 'https://database.deta.sh/v1';
export const PROJECT_KEY_ENV = 'DETA_PROJECT_KEY';
export const ENDPOINT_ENV = 'DETA_ENDPOINT';

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface RequestSummary {
  method: string;
  path: string;
}

export type RetryHook = (
  attempt: number,
  error: unknown,
  nextDelayMs: number,
  request: RequestSummary,
) => void;

export interface DetaConfig {
  /** `<projectId>_<secret>` as issued for the project. */
  projectKey: string;
  endpoint?: string;
  /** Per-attempt timeout. */
  timeoutMs?: number;
  /** Retries after a transport failure, idempotent requests only. */
  maxRetries?: number;
  /** Linear backoff step: attempt n waits retryDelayMs * n. */
  retryDelayMs?: number;
  fetch?: FetchLike;
  onRetry?: RetryHook;
}

/** Internal: config with defaults applied */
export interface ResolvedConfig {
  readonly projectKey: string;
  readonly projectId: string;
  readonly endpoint: string;
  readonly timeoutMs: number;
  readonly maxRetries: number;
  readonly retryDelayMs: number;
  readonly fetch: FetchLike;
  readonly onRetry: RetryHook;
}

const PROJECT_KEY_PATTERN = /^[A-Za-z0-9_.~-]+$/;

/** Largest delay Node timers honour; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2 ** 31 - 1;

function nonNegativeInteger(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative integer, got ${value}`);
  }
  return value;
}

function defaultOnRetry(
  attempt: number,
  error: unknown,
  nextDelayMs: number,
  request: RequestSummary,
): void {
  console.warn(
    `[deta] ${request.method} ${request.path} failed (attempt ${attempt}), retrying in ${nextDelayMs}ms:`,
    error,
  );
}

export function resolveConfig(config: DetaConfig): ResolvedConfig {
  const key = config.projectKey;
  if (typeof key !== 'string' || key.trim() === '') {
    throw new ConfigurationError('projectKey must be a non-empty string');
  }
  if (!PROJECT_KEY_PATTERN.test(key)) {
    throw new ConfigurationError('projectKey contains characters outside [A-Za-z0-9_.~-]');
  }
  const projectId = key.split('_')[0] ?? '';
  if (projectId === '') {
    throw new ConfigurationError('projectKey must start with the project id');
  }

  const endpoint = (config.endpoint ?? DEFAULT_ENDPOINT).replace(/\/+$/, '');
  try {
    new URL(endpoint);
  } catch (err) {
    throw new ConfigurationError(`endpoint "${endpoint}" is not a valid URL`, err);
  }

  const timeoutMs = config.timeoutMs ?? 10_000;
  if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`timeoutMs must be a positive number, got ${timeoutMs}`);
  }
  if (timeoutMs > MAX_TIMER_MS) {
    throw new ConfigurationError(`timeoutMs must be at most ${MAX_TIMER_MS}, got ${timeoutMs}`);
  }

  const maxRetries = nonNegativeInteger('maxRetries', config.maxRetries ?? 2);
  const retryDelayMs = nonNegativeInteger('retryDelayMs', config.retryDelayMs ?? 250);
  // the last wait is retryDelayMs * maxRetries
  const longestDelayMs = retryDelayMs * Math.max(maxRetries, 1);
  if (longestDelayMs > MAX_TIMER_MS) {
    throw new ConfigurationError(
      `retryDelayMs * maxRetries must be at most ${MAX_TIMER_MS}, got ${longestDelayMs}`,
    );
  }

  return {
    projectKey: key,
    projectId,
    endpoint,
    timeoutMs,
    maxRetries,
    retryDelayMs,
    fetch: config.fetch ?? ((url, init) => fetch(url, init)),
    onRetry: config.onRetry ?? defaultOnRetry,
  };
}

/**
 * Reads the project key (and optionally the endpoint) from the environment.
 * Read once, at client construction; never per request.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<Omit<DetaConfig, 'projectKey'>> = {},
): DetaConfig {
  const projectKey = env[PROJECT_KEY_ENV];
  if (projectKey === undefined || projectKey.trim() === '') {
    throw new ConfigurationError(`${PROJECT_KEY_ENV} is not set`);
  }
  const endpoint = env[ENDPOINT_ENV];
  return {
    ...(endpoint !== undefined && endpoint !== '' ? { endpoint } : {}),
    ...overrides,
    projectKey,
  };
}

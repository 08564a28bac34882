export class DetaError extends Error {
  override readonly name: string = 'DetaError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Missing or malformed project key, base name or client option. */
export class ConfigurationError extends DetaError {
  override readonly name = 'ConfigurationError';
}

/** The request never produced an HTTP response: DNS, TLS, reset, timeout. */
export class NetworkError extends DetaError {
  override readonly name = 'NetworkError';

  constructor(
    message: string,
    readonly attempts: number,
    cause?: unknown,
  ) {
    super(message, cause);
  }
}

export class AuthError extends DetaError {
  override readonly name = 'AuthError';

  constructor(
    readonly status: number,
    readonly serviceMessages: string[] = [],
    message?: string,
  ) {
    super(message ?? `Project key rejected by the service (HTTP ${status})`);
  }
}

export class NotFoundError extends DetaError {
  override readonly name = 'NotFoundError';
  readonly status = 404;

  constructor(
    readonly key: string | undefined,
    message?: string,
  ) {
    super(message ?? (key === undefined ? 'Resource not found' : `Item "${key}" not found`));
  }
}

export class ConflictError extends DetaError {
  override readonly name = 'ConflictError';
  readonly status = 409;

  constructor(
    readonly key: string | undefined,
    message?: string,
  ) {
    super(message ?? (key === undefined ? 'Key already exists' : `Item "${key}" already exists`));
  }
}

/**
 * The request was rejected before it was sent (oversized batch, bad key,
 * conflicting filter) or by the service with 400/413/422.
 * `status` is undefined for client-side rejections.
 */
export class ValidationError extends DetaError {
  override readonly name = 'ValidationError';

  constructor(
    message: string,
    readonly status?: number,
    readonly serviceMessages: string[] = [],
  ) {
    super(message);
  }
}

export class DecodeError extends DetaError {
  override readonly name = 'DecodeError';

  constructor(
    readonly operation: string,
    message: string,
    cause?: unknown,
  ) {
    super(`${operation}: ${message}`, cause);
  }
}

/** 5xx, or any status the client has no specific meaning for. */
export class ServiceError extends DetaError {
  override readonly name = 'ServiceError';

  constructor(
    readonly status: number,
    readonly serviceMessages: string[] = [],
    message?: string,
  ) {
    super(message ?? `Service responded with HTTP ${status}`);
  }
}

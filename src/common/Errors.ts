/**
 * Error taxonomy for the gateway.
 *
 * Every error that may reach a client carries an HTTP status and a short,
 * fixed public message. Detail from the store or the runtime goes in `cause`
 * and only ever reaches the logs.
 */

export class ServiceError extends Error {
  public readonly statusCode: number;

  constructor(statusCode: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ServiceError';
    this.statusCode = statusCode;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends ServiceError {
  constructor(message: string) {
    super(400, message);
    this.name = 'ValidationError';
  }
}

export class CredentialMissingError extends ServiceError {
  constructor() {
    super(401, 'authorization token required');
    this.name = 'CredentialMissingError';
  }
}

export class CredentialInvalidError extends ServiceError {
  constructor() {
    super(401, 'invalid authorization token');
    this.name = 'CredentialInvalidError';
  }
}

export class KeyNotFoundError extends ServiceError {
  constructor() {
    super(404, 'key not found');
    this.name = 'KeyNotFoundError';
  }
}

export class RouteNotFoundError extends ServiceError {
  constructor() {
    super(404, 'not found');
    this.name = 'RouteNotFoundError';
  }
}

export class MethodNotAllowedError extends ServiceError {
  public readonly allowed: readonly string[];

  constructor(allowed: readonly string[]) {
    super(405, 'method not allowed');
    this.name = 'MethodNotAllowedError';
    this.allowed = allowed;
  }
}

export class PayloadTooLargeError extends ServiceError {
  constructor() {
    super(413, 'request body too large');
    this.name = 'PayloadTooLargeError';
  }
}

export class InternalFailureError extends ServiceError {
  constructor(cause?: unknown) {
    super(500, 'internal server error', { cause });
    this.name = 'InternalFailureError';
  }
}

export class UpstreamUnavailableError extends ServiceError {
  constructor(cause?: unknown) {
    super(503, 'store connection failed', { cause });
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * Raised when a store operation does not settle before its deadline.
 * Not a ServiceError: handlers decide whether it means 500 or 503.
 */
export class DeadlineExceededError extends Error {
  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'DeadlineExceededError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class RequestAbortedError extends Error {
  constructor(operation: string) {
    super(`${operation} cancelled`);
    this.name = 'RequestAbortedError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Error.captureStackTrace(this, this.constructor);
  }
}

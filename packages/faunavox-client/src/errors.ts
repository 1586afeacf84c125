export class FaunavoxApiError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: Record<string, unknown>,
    public readonly raw?: unknown,
  ) {
    super(message);
    this.name = 'FaunavoxApiError';
    Object.setPrototypeOf(this, FaunavoxApiError.prototype);
  }
}

export class AuthenticationError extends FaunavoxApiError {
  constructor(message = 'Missing or invalid credentials', raw?: unknown) {
    super(message, 'UNAUTHORIZED', 401, undefined, raw);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}

export class PermissionDeniedError extends FaunavoxApiError {
  constructor(message = 'Resource belongs to another caller', raw?: unknown) {
    super(message, 'FORBIDDEN', 403, undefined, raw);
    this.name = 'PermissionDeniedError';
    Object.setPrototypeOf(this, PermissionDeniedError.prototype);
  }
}

export class InvalidRequestError extends FaunavoxApiError {
  constructor(message: string, code = 'VALIDATION_ERROR', statusCode = 400, details?: Record<string, unknown>, raw?: unknown) {
    super(message, code, statusCode, details, raw);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export class NotFoundError extends FaunavoxApiError {
  constructor(message = 'Resource not found', code = 'NOT_FOUND', raw?: unknown) {
    super(message, code, 404, undefined, raw);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class ServiceUnavailableError extends FaunavoxApiError {
  constructor(message: string, code = 'SERVICE_UNAVAILABLE', statusCode = 503, raw?: unknown) {
    super(message, code, statusCode, undefined, raw);
    this.name = 'ServiceUnavailableError';
    Object.setPrototypeOf(this, ServiceUnavailableError.prototype);
  }
}

export class TimeoutError extends FaunavoxApiError {
  constructor(message: string) {
    super(message, 'CLIENT_TIMEOUT', 0);
    this.name = 'TimeoutError';
    Object.setPrototypeOf(this, TimeoutError.prototype);
  }
}

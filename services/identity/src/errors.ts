export type ErrorDetails = Record<string, unknown> | null;

export class ServiceError extends Error {
  readonly status: number;

  readonly code: string;

  readonly details: ErrorDetails;

  constructor(status: number, code: string, message: string, details: ErrorDetails = null) {
    super(message);
    this.name = 'ServiceError';
    this.status = status;
    this.code = code;
    this.details = details;
  }
}

export type UniqueTarget = 'email' | 'username' | 'linked_identity';

/**
 * Raised by repositories when the store rejects a write on a unique constraint.
 */
export class UniqueConstraintError extends ServiceError {
  readonly target: UniqueTarget;

  constructor(target: UniqueTarget, options: { cause?: unknown } = {}) {
    super(409, 'STORE_UNIQUE_VIOLATION', `Unique constraint violated on ${target}.`, { target });
    this.name = 'UniqueConstraintError';
    this.target = target;
    if (options.cause !== undefined) {
      this.cause = options.cause;
    }
  }
}

export function badRequest(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(400, code, message, details);
}

export function unauthorized(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(401, code, message, details);
}

export function notFound(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(404, code, message, details);
}

export function conflict(code: string, message: string, details?: ErrorDetails) {
  return new ServiceError(409, code, message, details);
}

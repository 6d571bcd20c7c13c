import type { ErrorName } from '../types/schemas.js';

/**
 * Base class for errors the HTTP layer knows how to answer.
 * `status` is the response code, `code` the `error` field of the body.
 */
export abstract class ApiError extends Error {
  abstract readonly status: number;
  abstract readonly code: ErrorName;
}

export class ValidationError extends ApiError {
  readonly status = 400;
  readonly code = 'ValidationError' as const;

  constructor(message = "Provide valid 'name' and 'email'.") {
    super(message);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends ApiError {
  readonly status = 404;
  readonly code = 'NotFound' as const;

  constructor(message = 'User not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class BadRequestError extends ApiError {
  readonly status = 400;
  readonly code = 'BadRequest' as const;

  constructor(message = 'Malformed request body') {
    super(message);
    this.name = 'BadRequestError';
  }
}

/**
 * Known path, unsupported method. `allow` becomes the Allow header.
 */
export class MethodNotAllowedError extends ApiError {
  readonly status = 405;
  readonly code = 'MethodNotAllowed' as const;

  constructor(readonly allow: string[]) {
    super('Method not allowed');
    this.name = 'MethodNotAllowedError';
  }
}

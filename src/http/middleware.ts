import type { ErrorRequestHandler, RequestHandler } from 'express';
import { ApiError, BadRequestError, MethodNotAllowedError, NotFoundError } from '../store/errors.js';
import type { ErrorBody } from '../types/schemas.js';

export type LogLine = (line: string) => void;

/**
 * One line per finished request: `GET /users/1 200 0.4ms`.
 */
export function accessLog(log: LogLine): RequestHandler {
  return (req, res, next) => {
    const started = process.hrtime.bigint();
    res.on('finish', () => {
      const elapsedMs = Number(process.hrtime.bigint() - started) / 1e6;
      log(`${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`);
    });
    next();
  };
}

export const notFoundHandler: RequestHandler = (_req, _res, next) => {
  next(new NotFoundError('Route not found'));
};

/**
 * Terminal `.all()` handler for a route: answers 405 listing `methods`.
 * HEAD is allowed wherever GET is, since Express serves it from the GET handler.
 */
export function methodNotAllowed(...methods: string[]): RequestHandler {
  const allow = methods.includes('GET') ? [...methods, 'HEAD'] : methods;
  return (_req, _res, next) => {
    next(new MethodNotAllowedError(allow));
  };
}

// body-parser tags its errors with a `type` such as 'entity.parse.failed'
function isBodyParserError(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'type' in err && typeof err.type === 'string'
    && 'status' in err && typeof err.status === 'number' && err.status >= 400 && err.status < 500;
}

/**
 * Maps thrown errors to `{ error, message }` bodies. Domain errors carry
 * their own status; everything else is a 400 with a generic message and is
 * reported through `logError`.
 */
export function errorHandler(logError: (err: unknown) => void): ErrorRequestHandler {
  return (err: unknown, _req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }

    let apiError: ApiError;
    if (err instanceof ApiError) {
      apiError = err;
    } else if (isBodyParserError(err)) {
      apiError = new BadRequestError();
    } else {
      logError(err);
      apiError = new BadRequestError('Bad request');
    }

    if (apiError instanceof MethodNotAllowedError) {
      res.set('Allow', apiError.allow.join(', '));
    }
    const body: ErrorBody = { error: apiError.code, message: apiError.message };
    res.status(apiError.status).json(body);
  };
}

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import { isRecord } from '../config';
import { createLogger } from '../logger';
import { GraphStoreError } from '../domain/services/exceptions';

const logger = createLogger('HTTP');

export class AppError extends Error {
  readonly isOperational: boolean = true;

  constructor(
    message: string,
    readonly statusCode: number = 500,
    readonly code: string = 'INTERNAL_SERVER_ERROR',
    readonly details?: unknown
  ) {
    super(message);
    this.name = 'AppError';
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 400, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class AuthenticationError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401, 'AUTHENTICATION_ERROR');
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = 'Access denied') {
    super(message, 403, 'AUTHORIZATION_ERROR');
    this.name = 'AuthorizationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Resource not found') {
    super(message, 404, 'NOT_FOUND_ERROR');
    this.name = 'NotFoundError';
  }
}

export class RateLimitError extends AppError {
  constructor(message: string = 'Too many requests', readonly retryAfterSeconds?: number) {
    super(message, 429, 'RATE_LIMIT_ERROR', retryAfterSeconds === undefined ? undefined : { retryAfter: retryAfterSeconds });
    this.name = 'RateLimitError';
  }
}

export class DatabaseError extends AppError {
  constructor(message: string, readonly originalError?: unknown) {
    super(message, 500, 'DATABASE_ERROR');
    this.name = 'DatabaseError';
  }
}

class InternalServerError extends AppError {
  readonly isOperational: boolean = false;

  constructor(message: string) {
    super(message);
    this.name = 'InternalServerError';
  }
}

export interface ErrorResponseBody {
  success: false;
  error: {
    message: string;
    code: string;
    statusCode: number;
    correlationId: string;
    details?: unknown;
    stack?: string;
  };
}

export const sanitizeErrorMessage = (message: string): string =>
  message
    .replace(/password=[^&\s]*/gi, 'password=***')
    .replace(/token=[^&\s]*/gi, 'token=***')
    .replace(/key=[^&\s]*/gi, 'key=***')
    .replace(/secret=[^&\s]*/gi, 'secret=***')
    .replace(/Bearer\s+\S+/g, 'Bearer ***');

const CORRELATION_HEADER = 'X-Correlation-ID';

export const correlationId: RequestHandler = (req, res, next) => {
  const incoming = req.get(CORRELATION_HEADER);
  const id = incoming && incoming.length <= 128 ? incoming : `req_${uuidv4()}`;
  res.locals.correlationId = id;
  res.setHeader(CORRELATION_HEADER, id);
  next();
};

const correlationIdOf = (res: Response): string =>
  typeof res.locals.correlationId === 'string' ? res.locals.correlationId : `err_${uuidv4()}`;

/** Status carried by errors from express and body-parser (`status`) or our own (`statusCode`). */
const httpStatusOf = (error: unknown): number | undefined => {
  if (!isRecord(error)) {
    return undefined;
  }
  const status = error.statusCode ?? error.status;
  return typeof status === 'number' && status >= 400 && status < 600 ? status : undefined;
};

const toAppError = (error: unknown, isDevelopment: boolean): AppError => {
  if (error instanceof AppError) {
    return error;
  }
  if (error instanceof GraphStoreError) {
    return new DatabaseError('Database operation failed', error);
  }
  const message = sanitizeErrorMessage(error instanceof Error ? error.message : String(error));
  switch (httpStatusOf(error)) {
    case 400:
      return new ValidationError(message);
    case 401:
      return new AuthenticationError(message);
    case 403:
      return new AuthorizationError(message);
    case 404:
      return new NotFoundError(message);
    case 413:
      return new AppError(message, 413, 'PAYLOAD_TOO_LARGE');
    case 429:
      return new RateLimitError(message);
    default:
      return new InternalServerError(isDevelopment ? message : 'Internal server error');
  }
};

export const errorHandler = (error: unknown, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const isDevelopment = process.env.NODE_ENV === 'development';
  const appError = toAppError(error, isDevelopment);
  const id = correlationIdOf(res);
  const message = sanitizeErrorMessage(appError.message);

  const logLevel = appError.statusCode >= 500 ? 'error' : 'warn';
  logger.log(logLevel, `${req.method} ${req.path} - ${appError.statusCode} - ${message}`, {
    correlationId: id,
    cause: error instanceof Error ? sanitizeErrorMessage(error.message) : undefined,
  });

  if (appError instanceof RateLimitError && appError.retryAfterSeconds !== undefined) {
    res.setHeader('Retry-After', String(appError.retryAfterSeconds));
  }

  const body: ErrorResponseBody = {
    success: false,
    error: {
      message,
      code: appError.code,
      statusCode: appError.statusCode,
      correlationId: id,
    },
  };
  if (appError.details !== undefined) {
    body.error.details = appError.details;
  }
  if (isDevelopment && error instanceof Error && error.stack) {
    body.error.stack = error.stack;
  }
  res.status(appError.statusCode).json(body);
};

export const catchAsync = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler => {
  return (req, res, next) => {
    fn(req, res, next).catch(next);
  };
};

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
};

export default errorHandler;

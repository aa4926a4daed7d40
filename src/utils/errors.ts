import type { Response } from 'express';
import logger from './logger';

export interface ErrorBody {
  error: string;
  message?: string;
}

export class AppError extends Error {
  status: number;
  detail?: string;

  constructor(message: string, status = 500, detail?: string) {
    super(message);
    this.status = status;
    this.detail = detail;
    this.name = 'AppError';
  }

  toBody(): ErrorBody {
    return this.detail ? { error: this.message, message: this.detail } : { error: this.message };
  }
}

/** Missing or malformed request input. */
export class ValidationError extends AppError {
  constructor(message: string, detail?: string) {
    super(message, 400, detail);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * The service is missing an external credential. Not retryable until the
 * deployment is reconfigured.
 */
export class ConfigurationError extends AppError {
  constructor(message: string, detail?: string) {
    super(message, 503, detail);
    this.name = 'ConfigurationError';
  }
}

export class UpstreamError extends AppError {
  constructor(message: string) {
    super(message, 500);
    this.name = 'UpstreamError';
  }
}

export class PersistenceError extends AppError {
  constructor(message: string) {
    super(message, 500);
    this.name = 'PersistenceError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Convert an error caught at a route boundary into a JSON response.
 * Client errors are answered as-is; everything else is logged first.
 */
export function handleRouteError(err: unknown, res: Response, context: string): void {
  if (err instanceof AppError) {
    if (err.status >= 500) {
      logger.error({ err }, context);
    } else {
      logger.debug({ err: err.message, status: err.status }, context);
    }
    res.status(err.status).json(err.toBody());
    return;
  }

  logger.error({ err }, context);
  res.status(500).json({ error: errorMessage(err) });
}

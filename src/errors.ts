/**
 * Error types shared by the pipeline stages.
 *
 * @module errors
 */

import { log } from './logger.js';

/** A required key is absent from the config. */
export class MissingKeyError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MissingKeyError';
  }
}

/** A value is present but not acceptable. */
export class InvalidValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidValueError';
  }
}

type ErrorClass = new (message: string) => Error;

/**
 * Log a message at critical level and throw it.
 *
 * Used for problems that must stop the whole run rather than a single report.
 */
export function raiseCritical(message: string, ErrorType: ErrorClass = InvalidValueError): never {
  log.critical(message);
  throw new ErrorType(message);
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

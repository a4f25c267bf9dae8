import { ModpinError, ErrorCodes, CommandResult, PackageRef, SourceKind } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the fetch engine and the modpin CLI
 */

export class ParseError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(`Parse error: ${message}`, ErrorCodes.PARSE_ERROR, details, options);
    this.name = 'ParseError';
  }
}

export class ResolutionError extends ModpinError {
  constructor(ref: PackageRef, reason: string) {
    super(
      `No viable source for ${ref.path}@${ref.version}: ${reason}`,
      ErrorCodes.RESOLUTION_ERROR,
      { path: ref.path, version: ref.version }
    );
    this.name = 'ResolutionError';
  }
}

export interface TransferErrorDetails {
  strategy: SourceKind;
  url: string;
  status?: number;
}

/**
 * A single download attempt failed. Recoverable while candidates remain.
 */
export class TransferError extends ModpinError {
  public readonly strategy: SourceKind;
  public readonly url: string;
  public readonly status?: number;

  constructor(message: string, details: TransferErrorDetails, options?: ErrorOptions) {
    super(message, ErrorCodes.TRANSFER_ERROR, { ...details }, options);
    this.name = 'TransferError';
    this.strategy = details.strategy;
    this.url = details.url;
    this.status = details.status;
  }
}

export class ExtractionError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(`Extraction failed: ${message}`, ErrorCodes.EXTRACTION_ERROR, details, options);
    this.name = 'ExtractionError';
  }
}

export class FileSystemError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Render an unknown thrown value as a message.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof ModpinError) {
    // Details stay out of the way unless running verbose
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exitCode = 1;
    }
  };
}

import { MmpkgError, ErrorCodes, CommandResult } from '../types/index.js';
import { EXIT_CODES } from '../constants/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for different types of errors in the mmpkg CLI
 */

export class FileSystemError extends MmpkgError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends MmpkgError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends MmpkgError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Raised when a package record (from the external packages file or the
 * catalog snapshot) is missing a required field or carries an unknown one.
 */
export class MalformedRecordError extends MmpkgError {
  constructor(message: string, details?: unknown) {
    super(`Malformed package record: ${message}`, ErrorCodes.MALFORMED_RECORD, details);
  }
}

export class CatalogFetchError extends MmpkgError {
  constructor(url: string, reason: string) {
    super(`Unable to retrieve packages from ${url}: ${reason}`, ErrorCodes.FETCH_ERROR, { url });
  }
}

/**
 * No snapshot on disk and nothing could be fetched.
 */
export class CatalogUnavailableError extends MmpkgError {
  constructor(cause?: string) {
    super(
      `No package catalog is available${cause ? ` (${cause})` : ''}. Check your network connection and run 'mmpkg db --refresh'`,
      ErrorCodes.CATALOG_UNAVAILABLE
    );
  }
}

export class OperationInterruptedError extends MmpkgError {
  constructor(message: string = 'Operation interrupted') {
    super(message, ErrorCodes.INTERRUPTED);
    this.name = 'OperationInterruptedError';
  }
}

export function isInterrupted(error: unknown): error is OperationInterruptedError {
  return error instanceof OperationInterruptedError;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof MmpkgError) {
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
      if (isInterrupted(error)) {
        console.error(error.message);
        process.exit(EXIT_CODES.INTERRUPTED);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(EXIT_CODES.FAILURE);
    }
  };
}

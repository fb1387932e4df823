import { RefAsmError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure modes of a resolution
 */

export class PackageNotFoundError extends RefAsmError {
  constructor(packageId: string, version?: string) {
    super(
      `Package '${packageId}${version ? `@${version}` : ''}' not found in any configured registry`,
      ErrorCodes.PACKAGE_NOT_FOUND,
      { packageId, version }
    );
    this.name = 'PackageNotFoundError';
  }
}

export class VersionConflictError extends RefAsmError {
  constructor(
    packageId: string,
    details: {
      ranges: string[];
      requestedBy: string[];
      availableVersions: string[];
    }
  ) {
    const msg = `No version of '${packageId}' satisfies ranges: ${details.ranges.join(', ')}${details.availableVersions.length ? `. Available: ${details.availableVersions.join(', ')}` : ''}`;
    super(msg, ErrorCodes.VERSION_CONFLICT, { packageId, ...details });
    this.name = 'VersionConflictError';
  }
}

export class InvalidPackageError extends RefAsmError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid package: ${reason}`, ErrorCodes.INVALID_PACKAGE, details);
    this.name = 'InvalidPackageError';
  }
}

export class PackageDownloadError extends RefAsmError {
  constructor(packageId: string, version: string, details?: Record<string, unknown>) {
    super(`Failed to download package '${packageId}@${version}'`, ErrorCodes.DOWNLOAD_FAILED, { packageId, version, ...details });
    this.name = 'PackageDownloadError';
  }
}

export class FileSystemError extends RefAsmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends RefAsmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class InvalidVersionRangeError extends ValidationError {
  constructor(range: string) {
    super(`'${range}' is not a valid version range`, { range });
    this.name = 'InvalidVersionRangeError';
  }
}

export class ConfigError extends RefAsmError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class OperationCancelledError extends RefAsmError {
  constructor(message: string = 'Operation was cancelled') {
    super(message, ErrorCodes.CANCELLED);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Throw an OperationCancelledError when the signal has been aborted
 */
export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new OperationCancelledError();
  }
}

/**
 * Aborted timers and streams reject with a DOMException/Error named AbortError
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error instanceof OperationCancelledError);
}

/**
 * Read the errno-style code from an unknown error value
 */
export function getErrorCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof RefAsmError) {
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
      if (error instanceof OperationCancelledError) {
        process.exit(130);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}

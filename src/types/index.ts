/**
 * Common types and interfaces for the refasm resolver
 */

// Directory layout
export interface RefAsmDirectories {
  config: string;
  cacheRoot: string;
  globalPackages: string;
}

// Configuration file types

export interface FeedConfig {
  name?: string;
  path: string;
}

export interface RefAsmConfig {
  feeds?: FeedConfig[];
  globalPackagesFolder?: string;
  cacheRoot?: string;
}

// Error types
export class RefAsmError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'RefAsmError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  PACKAGE_NOT_FOUND = 'PACKAGE_NOT_FOUND',
  INVALID_PACKAGE = 'INVALID_PACKAGE',
  VERSION_CONFLICT = 'VERSION_CONFLICT',
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR',
  CANCELLED = 'CANCELLED'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

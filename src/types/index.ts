/**
 * Common types and interfaces for the prerequisite build engine
 */

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

// Error types
export class PrereqError extends Error {
  public code: string;
  public details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'PrereqError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  DOWNLOAD_FAILED = 'DOWNLOAD_FAILED',
  EXTRACTION_FAILED = 'EXTRACTION_FAILED',
  UNSUPPORTED_COMPRESSION = 'UNSUPPORTED_COMPRESSION',
  BAD_SCRIPT = 'BAD_SCRIPT',
  MISSING_DEFINITION = 'MISSING_DEFINITION',
  MISSING_PATH = 'MISSING_PATH',
  BUILD_FAILED = 'BUILD_FAILED',
  MISSING_TARGETS = 'MISSING_TARGETS',
  MISSING_SYSTEM_LIBS = 'MISSING_SYSTEM_LIBS',
  DOWNLOAD_REQUIRED = 'DOWNLOAD_REQUIRED',
  BUILD_REQUIRED = 'BUILD_REQUIRED',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
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

/**
 * Outcome of probing whether an optional component can be used.
 */
export type Availability =
  | { available: true }
  | { available: false; reason: string };

import { PrereqError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes raised while resolving, fetching and building prerequisites
 */

export class DownloadFailure extends PrereqError {
  constructor(public readonly repo: string, public readonly component: string) {
    super(`Failed to get ${component} from ${repo}`, ErrorCodes.DOWNLOAD_FAILED, { repo, component });
    this.name = 'DownloadFailure';
  }
}

export class ExtractionError extends PrereqError {
  constructor(public readonly component: string, reason?: string) {
    super(`Failed to extract ${component}`, ErrorCodes.EXTRACTION_FAILED, { component, reason });
    this.name = 'ExtractionError';
  }
}

export class UnsupportedCompression extends PrereqError {
  constructor(public readonly component: string) {
    super(`Don't know how to extract ${component}`, ErrorCodes.UNSUPPORTED_COMPRESSION, { component });
    this.name = 'UnsupportedCompression';
  }
}

/**
 * The component definition script could not be loaded or threw while running.
 */
export class ComponentScriptError extends PrereqError {
  constructor(public readonly script: string, public readonly trace: string) {
    super(`Failed to execute ${script}:\n${trace}`, ErrorCodes.BAD_SCRIPT, { script });
    this.name = 'ComponentScriptError';
  }
}

export class MissingDefinition extends PrereqError {
  constructor(public readonly component: string) {
    super(`No definition for ${component}`, ErrorCodes.MISSING_DEFINITION, { component });
    this.name = 'MissingDefinition';
  }
}

export class MissingPath extends PrereqError {
  constructor(public readonly variable: string, path?: string) {
    super(`${variable} specifies a path that doesn't exist`, ErrorCodes.MISSING_PATH, { variable, path });
    this.name = 'MissingPath';
  }
}

export class BuildFailure extends PrereqError {
  constructor(public readonly component: string) {
    super(`${component} failed to build`, ErrorCodes.BUILD_FAILED, { component });
    this.name = 'BuildFailure';
  }
}

/**
 * Expected headers, libraries or programs are absent. With a package name the
 * message points the user at the system package instead of the build log.
 */
export class MissingTargets extends PrereqError {
  constructor(public readonly component: string, public readonly packageName?: string) {
    super(
      packageName === undefined
        ? `${component} has missing targets after build.  See config.log for details`
        : `Package ${packageName} is required. Check config.log`,
      ErrorCodes.MISSING_TARGETS,
      { component, packageName }
    );
    this.name = 'MissingTargets';
  }
}

export class MissingSystemLibs extends PrereqError {
  constructor(public readonly component: string) {
    super(`${component} has unmet dependencies required for build`, ErrorCodes.MISSING_SYSTEM_LIBS, { component });
    this.name = 'MissingSystemLibs';
  }
}

export class DownloadRequired extends PrereqError {
  constructor(public readonly component: string) {
    super(`${component} needs to be built, use --build-deps=yes`, ErrorCodes.DOWNLOAD_REQUIRED, { component });
    this.name = 'DownloadRequired';
  }
}

export class BuildRequired extends PrereqError {
  constructor(public readonly component: string) {
    super(`${component} needs to be built, use --build-deps=yes`, ErrorCodes.BUILD_REQUIRED, { component });
    this.name = 'BuildRequired';
  }
}

export class FileSystemError extends PrereqError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends PrereqError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof PrereqError) {
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
      console.error(`❌ ${result.error}`);
      process.exit(1);
    }
  };
}

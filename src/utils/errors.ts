/**
 * Base class for every error the cleaner raises on purpose.
 * Per-entry deletion failures are never thrown; they are collected as DeletionError records.
 */
export class CleanerError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Malformed task list or config file. Raised before any run can start. */
export class ConfigError extends CleanerError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

/** A category's base folder could not be determined from the environment. */
export class ResolutionError extends CleanerError {
  readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message, 'RESOLUTION_ERROR');
    this.missing = missing;
  }
}

export class EngineBusyError extends CleanerError {
  constructor() {
    super('A cleaning run is already in progress', 'ENGINE_BUSY');
  }
}

export class UnsupportedPlatformError extends CleanerError {
  constructor(feature: string, platform: string) {
    super(`${feature} is only supported on Windows (current platform: ${platform})`, 'UNSUPPORTED_PLATFORM');
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Node system error code (EPERM, EBUSY, ...) or the code of a CleanerError. */
export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

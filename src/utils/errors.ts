/**
 * Typed errors for the fetch pipeline
 *
 * - InstanceSyncError (base)
 *   - NetworkError (transport failure, deadline, non-2xx status)
 *   - ParseError (body is not valid JSON/TOML or does not match its schema)
 *   - FilesystemError (create/read/write/rename failure)
 *   - IntegrityError (downloaded bytes do not hash to the expected value)
 *   - ConfigError (invalid environment configuration)
 */

export class InstanceSyncError extends Error {
  readonly code: string;

  constructor(message: string, code: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'InstanceSyncError';
    this.code = code;
  }
}

export class NetworkError extends InstanceSyncError {
  readonly url: string;
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, url: string, status?: number, cause?: unknown) {
    super(message, 'NETWORK_ERROR', cause);
    this.name = 'NetworkError';
    this.url = url;
    this.status = status;
    this.retryable = isRetryableStatus(status);
  }
}

export class ParseError extends InstanceSyncError {
  readonly source: string;

  constructor(message: string, source: string, cause?: unknown) {
    super(message, 'PARSE_ERROR', cause);
    this.name = 'ParseError';
    this.source = source;
  }
}

export class FilesystemError extends InstanceSyncError {
  readonly path: string;
  readonly errno?: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(message, 'FILESYSTEM_ERROR', cause);
    this.name = 'FilesystemError';
    this.path = path;
    this.errno = errnoCode(cause);
  }
}

export class IntegrityError extends InstanceSyncError {
  readonly expected: string;
  readonly actual: string;

  constructor(expected: string, actual: string) {
    super(`Content hash mismatch: expected ${expected}, got ${actual}`, 'INTEGRITY_ERROR');
    this.name = 'IntegrityError';
    this.expected = expected;
    this.actual = actual;
  }
}

export class ConfigError extends InstanceSyncError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
    this.name = 'ConfigError';
  }
}

/**
 * A missing status means the request never completed (connection reset, DNS, deadline)
 */
function isRetryableStatus(status: number | undefined): boolean {
  if (status === undefined) return true;
  return status === 408 || status === 429 || status >= 500;
}

export function isRetryable(error: Error): boolean {
  return error instanceof NetworkError && error.retryable;
}

/**
 * Errors raised by fs may come from another realm, so this checks shape only
 */
export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

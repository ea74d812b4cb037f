/**
 * Error hierarchy for the packloader library.
 *
 * None of these cross the public PackageLoader boundary: resolution failures
 * collapse into an invalid Package or an omitted record, and the error itself
 * goes to the diagnostic log.
 */

export interface ErrorOptions {
  cause?: Error;
}

export class PackageLoaderError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(
    code: string,
    message: string,
    details?: Record<string, unknown>,
    cause?: Error,
  ) {
    super(message, cause ? { cause } : undefined);
    this.name = 'PackageLoaderError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

export class ConfigNotFoundError extends PackageLoaderError {
  constructor(configPath: string, options?: ErrorOptions) {
    super('CONFIG_NOT_FOUND', `Configuration file not found: ${configPath}`, { configPath }, options?.cause);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends PackageLoaderError {
  constructor(message: string, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, {}, options?.cause);
    this.name = 'ConfigError';
  }
}

export class FormatUnresolvedError extends PackageLoaderError {
  constructor(format: string, searchPaths: readonly string[], options?: ErrorOptions) {
    super(
      'FORMAT_UNRESOLVED',
      `No package structure plugin found for format '${format}'`,
      { format, searchPaths: [...searchPaths] },
      options?.cause,
    );
    this.name = 'FormatUnresolvedError';
  }

  get format(): string {
    return String(this.details['format']);
  }
}

export class ModuleLoadError extends PackageLoaderError {
  constructor(fileName: string, reason: string, options?: ErrorOptions) {
    super(
      'MODULE_LOAD_ERROR',
      `Failed to load plugin module ${fileName}: ${reason}`,
      { fileName, reason },
      options?.cause,
    );
    this.name = 'ModuleLoadError';
  }

  get fileName(): string {
    return String(this.details['fileName']);
  }

  get reason(): string {
    return String(this.details['reason']);
  }
}

export class InvalidMetadataError extends PackageLoaderError {
  constructor(source: string, reason: string, options?: ErrorOptions) {
    super('INVALID_METADATA', `Invalid plugin metadata in ${source}: ${reason}`, { source, reason }, options?.cause);
    this.name = 'InvalidMetadataError';
  }
}

export class IndexParseError extends PackageLoaderError {
  constructor(reason: string, offset?: number, options?: ErrorOptions) {
    super(
      'INDEX_PARSE_ERROR',
      offset === undefined ? `Malformed plugin index: ${reason}` : `Malformed plugin index at byte ${offset}: ${reason}`,
      offset === undefined ? { reason } : { reason, offset },
      options?.cause,
    );
    this.name = 'IndexParseError';
  }
}

export class LoaderDisposedError extends PackageLoaderError {
  constructor(format: string, options?: ErrorOptions) {
    super('LOADER_DISPOSED', `Package loader disposed while resolving format '${format}'`, { format }, options?.cause);
    this.name = 'LoaderDisposedError';
  }
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  FORMAT_UNRESOLVED: 'FORMAT_UNRESOLVED',
  MODULE_LOAD_ERROR: 'MODULE_LOAD_ERROR',
  INVALID_METADATA: 'INVALID_METADATA',
  INDEX_PARSE_ERROR: 'INDEX_PARSE_ERROR',
  LOADER_DISPOSED: 'LOADER_DISPOSED',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/** Wrap an unknown thrown value so it can travel as an error cause. */
export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export enum ErrorCode {
  FORMAT_ERROR = 'FORMAT_ERROR',
  IO_ERROR = 'IO_ERROR',
  PARSE_ERROR = 'PARSE_ERROR',
  PATTERN_COMPILE_ERROR = 'PATTERN_COMPILE_ERROR',
  NETWORK_ERROR = 'NETWORK_ERROR',
  PARTIAL_IMPORT = 'PARTIAL_IMPORT',
  CONFIG_ERROR = 'CONFIG_ERROR',
}

export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AppError';
  }
}

/**
 * Malformed SteamID string
 */
export class FormatError extends AppError {
  constructor(public readonly input: string, expected: string) {
    super(ErrorCode.FORMAT_ERROR, `Invalid ${expected}: "${input}"`, { input });
    this.name = 'FormatError';
  }
}

export class IOError extends AppError {
  constructor(public readonly path: string, operation: 'read' | 'write', cause: unknown) {
    super(
      ErrorCode.IO_ERROR,
      `Failed to ${operation} ${path}: ${describeError(cause)}`,
      { path, operation },
      { cause }
    );
    this.name = 'IOError';
  }
}

export class ParseError extends AppError {
  constructor(source: string, reason: string, cause?: unknown) {
    super(ErrorCode.PARSE_ERROR, `Failed to parse ${source}: ${reason}`, { source }, { cause });
    this.name = 'ParseError';
  }
}

export class PatternCompileError extends AppError {
  constructor(public readonly pattern: string, cause: unknown) {
    super(
      ErrorCode.PATTERN_COMPILE_ERROR,
      `Invalid name pattern "${pattern}": ${describeError(cause)}`,
      { pattern },
      { cause }
    );
    this.name = 'PatternCompileError';
  }
}

/**
 * A failed outbound request. `target` is the SteamID the request was made
 * for, or the URL for plain downloads.
 */
export class NetworkError extends AppError {
  constructor(
    public readonly target: string,
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(ErrorCode.NETWORK_ERROR, message, { target, ...(status !== undefined && { status }) }, { cause });
    this.name = 'NetworkError';
  }
}

export interface ImportFailure {
  index: number;
  reason: string;
}

export class PartialImportError extends AppError {
  constructor(source: string, public readonly failures: ImportFailure[], imported: number) {
    super(
      ErrorCode.PARTIAL_IMPORT,
      `Imported ${imported} entries from ${source}, skipped ${failures.length}`,
      { source, imported, skipped: failures.length }
    );
    this.name = 'PartialImportError';
  }
}

/**
 * One or more environment variables failed validation. `issues` holds one
 * `NAME: problem` line per variable.
 */
export class ConfigError extends AppError {
  constructor(public readonly issues: string[], cause?: unknown) {
    super(ErrorCode.CONFIG_ERROR, `Invalid configuration: ${issues.join('; ')}`, { issues }, { cause });
    this.name = 'ConfigError';
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export type LogSourceErrorCode = 'LOG_FILE_NOT_FOUND' | 'LOG_FILE_UNREACHABLE';

export type ConfigErrorCode =
  | 'CONFIG_READ_FAILED'
  | 'CONFIG_PARSE_FAILED'
  | 'CONFIG_INVALID';

export class LogSourceError extends Error {
  constructor(
    public code: LogSourceErrorCode,
    message: string,
    public filePath?: string,
    public originalError?: unknown
  ) {
    super(message);
    this.name = 'LogSourceError';
  }
}

export class ConfigError extends Error {
  constructor(
    public code: ConfigErrorCode,
    message: string,
    public details: string[] = []
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function errorMessage(value: unknown): string {
  if (value instanceof Error) {
    return value.message;
  }
  if (
    typeof value === 'object' &&
    value !== null &&
    'message' in value &&
    typeof value.message === 'string'
  ) {
    return value.message;
  }
  return String(value);
}

/**
 * Matches on shape: errors raised by Node's fs bindings are not always
 * `instanceof Error` in the caller's realm.
 */
export function hasErrorCode(value: unknown, code: string): boolean {
  return (
    typeof value === 'object' &&
    value !== null &&
    'code' in value &&
    value.code === code
  );
}

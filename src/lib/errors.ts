export const ErrorCode = {
  E_MISSING_ARGUMENTS: 'E_MISSING_ARGUMENTS',
  E_INVALID_ARGUMENT: 'E_INVALID_ARGUMENT',
  E_NOT_FOUND: 'E_NOT_FOUND',
  E_PERMISSION_DENIED: 'E_PERMISSION_DENIED',
  E_NOT_FILE: 'E_NOT_FILE',
  E_TOO_LARGE: 'E_TOO_LARGE',
  E_INVALID_ENCODING: 'E_INVALID_ENCODING',
  E_UNKNOWN: 'E_UNKNOWN',
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

export type ErrorKind = 'config' | 'io';

const CONFIG_ERROR_CODES: ReadonlySet<ErrorCode> = new Set([
  ErrorCode.E_MISSING_ARGUMENTS,
  ErrorCode.E_INVALID_ARGUMENT,
]);

export function kindOf(code: ErrorCode): ErrorKind {
  return CONFIG_ERROR_CODES.has(code) ? 'config' : 'io';
}

export class LineFindError extends Error {
  readonly kind: ErrorKind;

  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly path?: string,
    readonly details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'LineFindError';
    this.kind = kindOf(code);
  }

  static fromError(
    code: ErrorCode,
    message: string,
    cause: unknown,
    path?: string,
    details?: Record<string, unknown>
  ): LineFindError {
    const error = new LineFindError(code, message, path, details, cause);
    if (cause instanceof Error && cause.stack) {
      error.stack = `${error.stack ?? error.message}\nCaused by: ${cause.stack}`;
    }
    return error;
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return (
    error instanceof Error && 'code' in error && typeof error.code === 'string'
  );
}

export const NODE_ERROR_CODE_MAP: Readonly<Record<string, ErrorCode>> = {
  ENOENT: ErrorCode.E_NOT_FOUND,
  ENAMETOOLONG: ErrorCode.E_NOT_FOUND,
  EACCES: ErrorCode.E_PERMISSION_DENIED,
  EPERM: ErrorCode.E_PERMISSION_DENIED,
  EISDIR: ErrorCode.E_NOT_FILE,
  ENOTDIR: ErrorCode.E_NOT_FOUND,
  ELOOP: ErrorCode.E_NOT_FOUND,
  EFBIG: ErrorCode.E_TOO_LARGE,
};

const MESSAGE_PATTERNS: readonly (readonly [RegExp, ErrorCode])[] = [
  [/ENOENT|no such file/i, ErrorCode.E_NOT_FOUND],
  [/EACCES|EPERM|permission denied/i, ErrorCode.E_PERMISSION_DENIED],
  [/EISDIR|is a directory/i, ErrorCode.E_NOT_FILE],
];

function classifyMessage(message: string): ErrorCode {
  for (const [pattern, code] of MESSAGE_PATTERNS) {
    if (pattern.test(message)) return code;
  }
  return ErrorCode.E_UNKNOWN;
}

export function classifyError(error: unknown): ErrorCode {
  if (error instanceof LineFindError) return error.code;
  if (isNodeError(error) && error.code !== undefined) {
    const mapped = NODE_ERROR_CODE_MAP[error.code];
    if (mapped) return mapped;
  }
  if (error instanceof Error) return classifyMessage(error.message);
  if (typeof error === 'string') return classifyMessage(error);
  return ErrorCode.E_UNKNOWN;
}

const SUGGESTIONS: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.E_MISSING_ARGUMENTS]:
    'Pass a search term and a file path: linefind <query> <file_path>',
  [ErrorCode.E_INVALID_ARGUMENT]:
    'Run linefind --help for the accepted options. Use -- before a query that starts with a dash.',
  [ErrorCode.E_NOT_FOUND]: 'Check that the file exists and the path is spelled correctly.',
  [ErrorCode.E_PERMISSION_DENIED]: 'Check that the file is readable by the current user.',
  [ErrorCode.E_NOT_FILE]: 'The path must name a regular file, not a directory.',
  [ErrorCode.E_TOO_LARGE]:
    'Raise LINEFIND_MAX_FILE_SIZE or search a smaller file.',
  [ErrorCode.E_INVALID_ENCODING]: 'Only UTF-8 text files can be searched.',
  [ErrorCode.E_UNKNOWN]: 'Run again with LINEFIND_LOG_LEVEL=debug for details.',
};

export function getSuggestion(code: ErrorCode): string {
  return SUGGESTIONS[code];
}

function messageOf(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function toLineFindError(error: unknown, path?: string): LineFindError {
  if (error instanceof LineFindError) return error;
  const code = classifyError(error);
  return LineFindError.fromError(code, messageOf(error), error, path);
}

export interface DetailedError {
  code: ErrorCode;
  message: string;
  path?: string;
  suggestion?: string;
  details?: Record<string, unknown>;
}

export function createDetailedError(
  error: unknown,
  path?: string,
  details?: Record<string, unknown>
): DetailedError {
  const code = classifyError(error);
  const resolvedPath =
    path ?? (error instanceof LineFindError ? error.path : undefined);
  const resolvedDetails =
    details ?? (error instanceof LineFindError ? error.details : undefined);

  return {
    code,
    message: messageOf(error),
    path: resolvedPath,
    suggestion: getSuggestion(code),
    details: resolvedDetails,
  };
}

export function formatDetailedError(
  detailed: DetailedError,
  program = 'linefind'
): string {
  const lines = [`${program}: ${detailed.message} [${detailed.code}]`];
  if (detailed.path !== undefined) lines.push(`  path: ${detailed.path}`);
  if (detailed.suggestion) lines.push(`  hint: ${detailed.suggestion}`);
  return lines.join('\n');
}

type EnvParseResult = number | null | undefined;

export type EnvSource = Readonly<Record<string, string | undefined>>;

const MAX_FILE_SIZE_LIMIT = 1024 * 1024 * 1024;

function parseEnvIntValue(
  envVar: string,
  min: number,
  max: number,
  env: EnvSource
): EnvParseResult {
  const value = env[envVar];
  if (!value) return undefined;

  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) return null;

  const parsed = parseInt(trimmed, 10);
  if (parsed < min || parsed > max) {
    return null;
  }

  return parsed;
}

// Helper function for parsing and validating integer environment variables
export function parseEnvInt(
  envVar: string,
  defaultValue: number,
  min: number,
  max: number,
  env: EnvSource = process.env
): number {
  const parsed = parseEnvIntValue(envVar, min, max, env);
  if (parsed === undefined) return defaultValue;
  if (parsed === null) {
    const value = env[envVar] ?? '';
    console.error(
      `[WARNING] Invalid ${envVar} value: ${value} (must be ${min}-${max}). Using default: ${defaultValue}`
    );
    return defaultValue;
  }
  return parsed;
}

export const CASE_INSENSITIVE_ENV = 'CASE_INSENSITIVE';

export const PROGRAM_NAME = 'linefind';

export const DEFAULT_MAX_TEXT_FILE_SIZE = 100 * 1024 * 1024;

export function resolveMaxFileSize(env: EnvSource = process.env): number {
  return parseEnvInt(
    'LINEFIND_MAX_FILE_SIZE',
    DEFAULT_MAX_TEXT_FILE_SIZE,
    1,
    MAX_FILE_SIZE_LIMIT,
    env
  );
}

export const EXIT_SUCCESS = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

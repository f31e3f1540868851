export type LogLevel =
  | 'debug'
  | 'info'
  | 'notice'
  | 'warning'
  | 'error'
  | 'critical';

const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'notice',
  'warning',
  'error',
  'critical',
];

const DEFAULT_LEVEL: LogLevel = 'warning';
const LOG_LEVEL_ENV = 'LINEFIND_LOG_LEVEL';

let invalidLevelReported = false;
let configuredLevel: LogLevel | undefined;

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function resolveLogLevel(
  env: Readonly<Record<string, string | undefined>> = process.env
): LogLevel {
  const raw = env[LOG_LEVEL_ENV];
  if (!raw) return DEFAULT_LEVEL;

  const normalized = raw.trim().toLowerCase();
  if (isLogLevel(normalized)) return normalized;

  if (!invalidLevelReported) {
    invalidLevelReported = true;
    console.error(
      `[WARNING] Invalid ${LOG_LEVEL_ENV} value: ${raw}. Using default: ${DEFAULT_LEVEL}`
    );
  }
  return DEFAULT_LEVEL;
}

/** Fixes the threshold from `env` instead of reading `process.env` per call. */
export function configureLogger(
  env: Readonly<Record<string, string | undefined>>
): void {
  configuredLevel = resolveLogLevel(env);
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

// Internal logging function - use `logger` object for external access
function log(level: LogLevel, data: string, loggerName?: string): void {
  if (!isLevelEnabled(level, configuredLevel ?? resolveLogLevel())) return;
  console.error(`[${level}] ${loggerName ? `${loggerName}: ` : ''}${data}`);
}

export const logger = {
  debug: (msg: string, loggerName?: string): void => {
    log('debug', msg, loggerName);
  },
  info: (msg: string, loggerName?: string): void => {
    log('info', msg, loggerName);
  },
  notice: (msg: string, loggerName?: string): void => {
    log('notice', msg, loggerName);
  },
  warning: (msg: string, loggerName?: string): void => {
    log('warning', msg, loggerName);
  },
  error: (msg: string, loggerName?: string): void => {
    log('error', msg, loggerName);
  },
  critical: (msg: string, loggerName?: string): void => {
    log('critical', msg, loggerName);
  },
};

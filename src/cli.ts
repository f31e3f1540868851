import { parseArgs as parseNodeArgs } from 'node:util';

import type { CliRequest, Config, Environment } from './config/types.js';
import { CASE_INSENSITIVE_ENV, PROGRAM_NAME } from './lib/constants.js';
import { ErrorCode, LineFindError } from './lib/errors.js';
import { err, ok, type Result } from './lib/result.js';
import { ConfigSchema } from './schemas/config.js';

export const USAGE = [
  `Usage: ${PROGRAM_NAME} [options] [--] <query> <file_path>`,
  '',
  'Print every line of <file_path> that contains <query>.',
  '',
  'Options:',
  '  -i, --ignore-case  match regardless of letter case',
  '  -h, --help         show this message',
  '',
  'Environment:',
  `  ${CASE_INSENSITIVE_ENV}   any value enables case-insensitive matching`,
].join('\n');

interface ParsedCommandLine {
  positionals: string[];
  ignoreCase: boolean;
  help: boolean;
}

const REQUIRED_POSITIONALS = ['query', 'file_path'] as const;

function parseCommandLine(
  userArgs: readonly string[]
): Result<ParsedCommandLine> {
  try {
    const { values, positionals } = parseNodeArgs({
      args: [...userArgs],
      strict: true,
      allowPositionals: true,
      options: {
        'ignore-case': {
          type: 'boolean',
          short: 'i',
          default: false,
        },
        help: {
          type: 'boolean',
          short: 'h',
          default: false,
        },
      } as const,
    });

    return ok({
      positionals,
      ignoreCase: values['ignore-case'],
      help: values.help,
    });
  } catch (error: unknown) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(
      LineFindError.fromError(
        ErrorCode.E_INVALID_ARGUMENT,
        `Invalid arguments: ${reason}`,
        error
      )
    );
  }
}

function missingArgumentsError(received: number): LineFindError {
  const missing = REQUIRED_POSITIONALS.slice(received);
  return new LineFindError(
    ErrorCode.E_MISSING_ARGUMENTS,
    'Missing arguments: expected <query> <file_path>',
    undefined,
    { missing }
  );
}

function isCaseInsensitiveEnv(env: Environment): boolean {
  return env[CASE_INSENSITIVE_ENV] !== undefined;
}

function buildConfig(
  parsed: ParsedCommandLine,
  env: Environment
): Result<Config> {
  const [query, filePath] = parsed.positionals;
  if (query === undefined || filePath === undefined) {
    return err(missingArgumentsError(parsed.positionals.length));
  }

  const config = ConfigSchema.parse({
    query,
    filePath,
    caseInsensitive: parsed.ignoreCase || isCaseInsensitiveEnv(env),
  });
  return ok(Object.freeze(config));
}

/**
 * Resolves the search configuration from `args` (program name first, then
 * the user arguments) and the process environment. Positionals after the
 * second are ignored.
 */
export function resolveConfig(
  args: readonly string[],
  env: Environment
): Result<Config> {
  const parsed = parseCommandLine(args.slice(1));
  if (!parsed.ok) return parsed;
  return buildConfig(parsed.value, env);
}

export function resolveCliRequest(
  args: readonly string[],
  env: Environment
): Result<CliRequest> {
  const parsed = parseCommandLine(args.slice(1));
  if (!parsed.ok) return parsed;
  if (parsed.value.help) return ok({ kind: 'help' });

  const config = buildConfig(parsed.value, env);
  if (!config.ok) return config;
  return ok({ kind: 'search', config: config.value });
}

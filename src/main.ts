import { resolveCliRequest, USAGE } from './cli.js';
import type { Environment } from './config/types.js';
import {
  EXIT_FAILURE,
  EXIT_SUCCESS,
  EXIT_USAGE,
  resolveMaxFileSize,
} from './lib/constants.js';
import {
  createDetailedError,
  formatDetailedError,
  type LineFindError,
  isNodeError,
  toLineFindError,
} from './lib/errors.js';
import { configureLogger, logger } from './lib/logger.js';
import { type OutputWriter, run } from './run.js';

export interface ProcessIo {
  stdout: OutputWriter;
  stderr: OutputWriter;
}

const defaultIo: ProcessIo = {
  stdout: process.stdout,
  stderr: process.stderr,
};

function report(error: LineFindError, stderr: OutputWriter): number {
  stderr.write(`${formatDetailedError(createDetailedError(error))}\n`);
  return error.kind === 'config' ? EXIT_USAGE : EXIT_FAILURE;
}

async function execute(
  args: readonly string[],
  env: Environment,
  io: ProcessIo
): Promise<number> {
  const request = resolveCliRequest(args, env);
  if (!request.ok) return report(request.error, io.stderr);

  const cliRequest = request.value;
  if (cliRequest.kind === 'help') {
    io.stdout.write(`${USAGE}\n`);
    return EXIT_SUCCESS;
  }

  const result = await run(cliRequest.config, {
    output: io.stdout,
    maxFileSize: resolveMaxFileSize(env),
    env,
  });
  if (!result.ok) return report(result.error, io.stderr);
  return EXIT_SUCCESS;
}

/**
 * Runs one invocation and resolves to the process exit code: 0 on success
 * (zero matches included), 1 on I/O failure, 2 on bad arguments.
 */
export async function main(
  args: readonly string[],
  env: Environment = process.env,
  io: ProcessIo = defaultIo
): Promise<number> {
  configureLogger(env);
  try {
    return await execute(args, env, io);
  } catch (error: unknown) {
    const failure = toLineFindError(error);
    logger.debug(failure.stack ?? failure.message, 'main');
    return report(failure, io.stderr);
  }
}

export interface ErrorEmitter {
  on(event: 'error', listener: (error: Error) => void): unknown;
}

/**
 * Exit code for a failed write to standard output. A closed pipe
 * (`linefind x file | head -1`) ends the run quietly with 0.
 */
export function handleOutputError(
  error: unknown,
  stderr: OutputWriter
): number {
  if (isNodeError(error) && error.code === 'EPIPE') return EXIT_SUCCESS;

  const failure = toLineFindError(error);
  logger.debug(failure.stack ?? failure.message, 'main');
  return report(failure, stderr);
}

export function exitOnOutputError(
  stdout: ErrorEmitter,
  stderr: OutputWriter,
  exit: (code: number) => void
): void {
  stdout.on('error', (error: Error) => {
    exit(handleOutputError(error, stderr));
  });
}

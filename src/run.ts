import type { Config, Environment, RunSummary } from './config/types.js';
import { toLineFindError } from './lib/errors.js';
import { readTextFile } from './lib/fs-helpers.js';
import { logger } from './lib/logger.js';
import { withSearchDiagnostics } from './lib/observability/diagnostics.js';
import { err, ok, type Result } from './lib/result.js';
import { searchLines } from './lib/search.js';

export interface OutputWriter {
  write(chunk: string): unknown;
}

export interface RunOptions {
  output?: OutputWriter;
  maxFileSize?: number;
  env?: Environment;
}

const LOGGER_NAME = 'run';

async function searchFile(
  config: Config,
  output: OutputWriter,
  maxFileSize: number | undefined
): Promise<Result<RunSummary>> {
  let contents: string;
  try {
    contents = await readTextFile(config.filePath, { maxSize: maxFileSize });
  } catch (error: unknown) {
    return err(toLineFindError(error, config.filePath));
  }
  logger.debug(
    `read ${contents.length} characters from ${config.filePath}`,
    LOGGER_NAME
  );

  let matchCount = 0;
  for (const line of searchLines(
    config.query,
    contents,
    config.caseInsensitive
  )) {
    output.write(`${line}\n`);
    matchCount++;
  }

  logger.debug(`${matchCount} matching line(s)`, LOGGER_NAME);
  return ok({ matchCount });
}

/**
 * Reads the configured file and writes every matching line to `output`
 * (standard output by default). Failures are returned, never thrown.
 */
export async function run(
  config: Config,
  options: RunOptions = {}
): Promise<Result<RunSummary>> {
  const output = options.output ?? process.stdout;
  return await withSearchDiagnostics(
    'search',
    () => searchFile(config, output, options.maxFileSize),
    { path: config.filePath, env: options.env }
  );
}

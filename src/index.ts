#!/usr/bin/env node
/**
 * linefind
 *
 * Prints every line of a UTF-8 text file that contains a search term.
 *
 * Usage:
 *   linefind <query> <file_path>
 *   CASE_INSENSITIVE=1 linefind <query> <file_path>
 */
import { exitOnOutputError, main } from './main.js';

// Writes after a closed pipe fail asynchronously; stop at the first one.
exitOnOutputError(process.stdout, process.stderr, (code) => {
  process.exit(code);
});

main(process.argv.slice(1))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });

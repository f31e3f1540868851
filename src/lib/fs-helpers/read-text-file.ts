import type { Stats } from 'node:fs';
import * as fsp from 'node:fs/promises';

import { DEFAULT_MAX_TEXT_FILE_SIZE } from '../constants.js';
import { classifyError, ErrorCode, LineFindError } from '../errors.js';

export interface ReadTextFileOptions {
  maxSize?: number;
}

function assertRegularFile(stats: Stats, filePath: string): void {
  if (stats.isFile()) return;
  throw new LineFindError(
    ErrorCode.E_NOT_FILE,
    `Not a file: ${filePath}`,
    filePath
  );
}

function assertWithinMaxSize(
  stats: Stats,
  maxSize: number,
  filePath: string
): void {
  if (stats.size <= maxSize) return;
  throw new LineFindError(
    ErrorCode.E_TOO_LARGE,
    `File too large: ${stats.size} bytes (max: ${maxSize} bytes)`,
    filePath,
    { size: stats.size, maxSize }
  );
}

export function decodeUtf8(buffer: Uint8Array, filePath: string): string {
  // fatal: reject malformed sequences instead of substituting U+FFFD
  const decoder = new TextDecoder('utf-8', { fatal: true });
  try {
    return decoder.decode(buffer);
  } catch (error: unknown) {
    throw LineFindError.fromError(
      ErrorCode.E_INVALID_ENCODING,
      `File is not valid UTF-8 text: ${filePath}`,
      error,
      filePath
    );
  }
}

function describeReadFailure(
  code: ErrorCode,
  filePath: string,
  error: unknown
): string {
  switch (code) {
    case ErrorCode.E_NOT_FOUND:
      return `File not found: ${filePath}`;
    case ErrorCode.E_PERMISSION_DENIED:
      return `Permission denied: ${filePath}`;
    case ErrorCode.E_NOT_FILE:
      return `Not a file: ${filePath}`;
    default:
      return `Cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`;
  }
}

function toReadError(error: unknown, filePath: string): LineFindError {
  if (error instanceof LineFindError) return error;
  const code = classifyError(error);
  return LineFindError.fromError(
    code,
    describeReadFailure(code, filePath, error),
    error,
    filePath
  );
}

/**
 * Reads `filePath` into a single string. Every failure surfaces as a
 * {@link LineFindError} of kind `io`.
 */
export async function readTextFile(
  filePath: string,
  options: ReadTextFileOptions = {}
): Promise<string> {
  const maxSize = options.maxSize ?? DEFAULT_MAX_TEXT_FILE_SIZE;

  let handle: fsp.FileHandle | undefined;
  try {
    handle = await fsp.open(filePath, 'r');
    const stats = await handle.stat();
    assertRegularFile(stats, filePath);
    assertWithinMaxSize(stats, maxSize, filePath);

    const buffer = await handle.readFile();
    return decodeUtf8(buffer, filePath);
  } catch (error: unknown) {
    throw toReadError(error, filePath);
  } finally {
    await handle?.close();
  }
}

import { createHash } from 'node:crypto';
import { channel } from 'node:diagnostics_channel';

type DiagnosticsDetail = 0 | 1 | 2;

type DiagnosticsEnv = Readonly<Record<string, string | undefined>>;

export interface SearchDiagnosticsEvent {
  phase: 'start' | 'end';
  operation: string;
  durationMs?: number;
  ok?: boolean;
  error?: string;
  path?: string;
  matchCount?: number;
}

export const SEARCH_CHANNEL_NAME = 'linefind:search';

const SEARCH_CHANNEL = channel(SEARCH_CHANNEL_NAME);

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function resolveDiagnosticsOk(result: unknown): boolean | undefined {
  if (!isObject(result)) return undefined;
  return typeof result.ok === 'boolean' ? result.ok : undefined;
}

function resolveMatchCount(result: unknown): number | undefined {
  if (!isObject(result)) return undefined;
  const { value } = result;
  if (!isObject(value)) return undefined;
  return typeof value.matchCount === 'number' ? value.matchCount : undefined;
}

function resolveResultError(result: unknown): string | undefined {
  if (!isObject(result) || result.ok !== false) return undefined;
  return resolveDiagnosticsErrorMessage(result.error);
}

function parseDiagnosticsEnabled(env: DiagnosticsEnv): boolean {
  const raw = env.LINEFIND_DIAGNOSTICS;
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === '1' || normalized === 'true' || normalized === 'yes';
}

function parseDiagnosticsDetail(env: DiagnosticsEnv): DiagnosticsDetail {
  const raw = env.LINEFIND_DIAGNOSTICS_DETAIL;
  if (!raw) return 0;
  const normalized = raw.trim();
  if (normalized === '2') return 2;
  if (normalized === '1') return 1;
  return 0;
}

export function hashPath(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16);
}

function normalizePathForDiagnostics(
  path: string,
  env: DiagnosticsEnv
): string | undefined {
  const detail = parseDiagnosticsDetail(env);
  if (detail === 0) return undefined;
  if (detail === 2) return path;
  return hashPath(path);
}

function resolveDurationMs(startNs: bigint): number {
  const endNs = process.hrtime.bigint();
  return Number(endNs - startNs) / 1_000_000;
}

function resolveDiagnosticsErrorMessage(error?: unknown): string | undefined {
  if (!error) return undefined;
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

export interface SearchDiagnosticsOptions {
  path?: string;
  env?: DiagnosticsEnv;
}

export async function withSearchDiagnostics<T>(
  operation: string,
  run: () => Promise<T>,
  options: SearchDiagnosticsOptions = {}
): Promise<T> {
  const env = options.env ?? process.env;
  if (!parseDiagnosticsEnabled(env) || !SEARCH_CHANNEL.hasSubscribers) {
    return await run();
  }

  const startNs = process.hrtime.bigint();
  SEARCH_CHANNEL.publish({
    phase: 'start',
    operation,
    path: options.path
      ? normalizePathForDiagnostics(options.path, env)
      : undefined,
  } satisfies SearchDiagnosticsEvent);

  try {
    const result = await run();
    SEARCH_CHANNEL.publish({
      phase: 'end',
      operation,
      ok: resolveDiagnosticsOk(result) ?? true,
      error: resolveResultError(result),
      matchCount: resolveMatchCount(result),
      durationMs: resolveDurationMs(startNs),
    } satisfies SearchDiagnosticsEvent);
    return result;
  } catch (error: unknown) {
    SEARCH_CHANNEL.publish({
      phase: 'end',
      operation,
      ok: false,
      error: resolveDiagnosticsErrorMessage(error),
      durationMs: resolveDurationMs(startNs),
    } satisfies SearchDiagnosticsEvent);
    throw error;
  }
}

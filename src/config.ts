/**
 * Runtime configuration
 *
 * Explicit options win over environment variables:
 * - TYPST_RSX_BIN         typst executable (default `typst`)
 * - TYPST_RSX_TIMEOUT_MS  compile timeout in milliseconds (default none)
 *
 * TYPST_RSX_DEBUG (`1`/`true`) is read by the logger directly.
 */

export interface ConvertConfig {
  typstBin: string;
  /** Milliseconds, or null for no limit. */
  timeoutMs: number | null;
}

export type ConfigOverrides = Partial<ConvertConfig>;

type Env = Record<string, string | undefined>;

export const DEFAULT_TYPST_BIN = 'typst';

function parseTimeout(raw: string | undefined, source: string): number | null {
  if (raw === undefined || raw.trim() === '') return null;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new TypeError(
      `${source} must be a positive integer number of milliseconds, got ${JSON.stringify(raw)}`
    );
  }
  return value;
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: Env = process.env
): ConvertConfig {
  const timeoutMs =
    overrides.timeoutMs !== undefined
      ? overrides.timeoutMs
      : parseTimeout(env.TYPST_RSX_TIMEOUT_MS, 'TYPST_RSX_TIMEOUT_MS');

  if (timeoutMs !== null && (!Number.isInteger(timeoutMs) || timeoutMs <= 0)) {
    throw new TypeError(
      `timeoutMs must be a positive integer, got ${String(timeoutMs)}`
    );
  }

  return {
    typstBin: overrides.typstBin || env.TYPST_RSX_BIN || DEFAULT_TYPST_BIN,
    timeoutMs,
  };
}

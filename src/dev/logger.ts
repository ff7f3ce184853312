/**
 * Centralized logger
 * - debug/info only speak when TYPST_RSX_DEBUG is set
 * - warn is silent in production builds
 * - Writes go to stderr so converted output on stdout stays clean
 */

/** For callers whose debug message is costly to build. */
export function isDebugEnabled(): boolean {
  const flag = process.env.TYPST_RSX_DEBUG;
  return flag === '1' || flag === 'true';
}

function callConsole(
  method: 'debug' | 'info' | 'warn' | 'error',
  args: unknown[]
): void {
  const c = typeof console !== 'undefined' ? console : undefined;
  if (!c) return;
  try {
    // console.debug/info go to stdout in Node; route them to stderr instead.
    if (method === 'debug' || method === 'info') c.error(...args);
    else c[method](...args);
  } catch {
    // ignore logging errors
  }
}

export const logger = {
  debug: (...args: unknown[]) => {
    if (!isDebugEnabled()) return;
    callConsole('debug', ['[typst-rsx]', ...args]);
  },

  info: (...args: unknown[]) => {
    if (!isDebugEnabled()) return;
    callConsole('info', ['[typst-rsx]', ...args]);
  },

  warn: (...args: unknown[]) => {
    if (process.env.NODE_ENV === 'production') return;
    callConsole('warn', ['[typst-rsx]', ...args]);
  },

  error: (...args: unknown[]) => {
    callConsole('error', ['[typst-rsx]', ...args]);
  },
};

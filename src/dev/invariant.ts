/**
 * Invariant assertions
 *
 * Internal consistency checks. A failure is a bug in this package, not a
 * problem with the input, so it throws a plain Error rather than a
 * ConvertError.
 */

/**
 * Assert a condition; throw with context if false
 * @internal
 */
export function invariant(
  condition: boolean,
  message: string,
  context?: Record<string, unknown>
): asserts condition {
  if (!condition) {
    const contextStr = context ? '\n' + JSON.stringify(context, null, 2) : '';
    throw new Error(`[typst-rsx invariant] ${message}${contextStr}`);
  }
}

/**
 * Exhaustiveness guard for discriminated unions. The type checker proves
 * the call is dead; reaching it at run time means a variant was added
 * without a handler.
 * @internal
 */
export function unreachable(value: never, what: string): never {
  throw new Error(
    `[typst-rsx invariant] Unhandled ${what}: ${JSON.stringify(value)}`
  );
}

/**
 * Validation mode switch.
 *
 * Contract:
 * - One process-wide stack of {@link ValidationConfig} frames.
 * - `h()` reads the active frame once per element and passes it down
 *   explicitly; nothing below that call consults this module again.
 * - Scoped overrides ({@link withStrictMode}, {@link withConfig}) restore
 *   the previous frame on exit, including when the callback throws.
 */
export interface ValidationConfig {
  /**
   * Strict (development) mode: prop values are type- and choice-checked at
   * instantiation. Non-strict mode skips those checks.
   */
  strict: boolean;
  /**
   * Reject undeclared prop names even in non-strict mode. When `false`,
   * non-strict mode drops unknown names silently. Strict mode always rejects.
   */
  rejectUnknownProps: boolean;
}

export const DEFAULT_CONFIG: Readonly<ValidationConfig> = Object.freeze({
  strict: true,
  rejectUnknownProps: true
});

const frames: Readonly<ValidationConfig>[] = [DEFAULT_CONFIG];

/** The active configuration frame. */
export function getConfig(): Readonly<ValidationConfig> {
  return frames[frames.length - 1] ?? DEFAULT_CONFIG;
}

export function isStrictMode(): boolean {
  return getConfig().strict;
}

/**
 * Replaces the active frame's strict flag until changed again.
 * Scoped callers should prefer {@link withStrictMode}.
 */
export function setStrictMode(strict: boolean): void {
  frames[frames.length - 1] = Object.freeze({ ...getConfig(), strict });
}

/**
 * Runs `fn` with `overrides` merged over the active frame.
 *
 * @returns Whatever `fn` returns.
 */
export function withConfig<T>(
  overrides: Partial<ValidationConfig>,
  fn: () => T
): T {
  frames.push(Object.freeze({ ...getConfig(), ...overrides }));
  try {
    return fn();
  } finally {
    frames.pop();
  }
}

/** Runs `fn` in strict (`true`) or non-strict (`false`) mode. */
export function withStrictMode<T>(strict: boolean, fn: () => T): T {
  return withConfig({ strict }, fn);
}

/**
 * Resolves the configuration for one operation: explicit overrides win,
 * otherwise the active frame is used.
 */
export function resolveConfig(
  overrides?: Partial<ValidationConfig>
): Readonly<ValidationConfig> {
  return overrides ? { ...getConfig(), ...overrides } : getConfig();
}

/**
 * Duration strings used by configuration ("250ms", "10s", "2m", "1h").
 */

const DURATION_REGEX = /^(\d+)(ms|s|m|h)$/;

const MULTIPLIERS: Record<string, number> = {
  ms: 1,
  s: 1000,
  m: 60 * 1000,
  h: 60 * 60 * 1000,
};

/**
 * Parses a duration string into milliseconds.
 *
 * @throws Error if format is invalid
 *
 * @example
 * parseDuration("250ms") // 250
 * parseDuration("10s")   // 10000
 */
export function parseDuration(duration: string): number {
  const match = DURATION_REGEX.exec(duration);
  if (!match) {
    throw new Error(
      `Invalid duration format: "${duration}". Expected format: {number}{unit} where unit is ms|s|m|h`,
    );
  }

  const value = Number.parseInt(match[1], 10);
  return value * MULTIPLIERS[match[2]];
}

export function isValidDuration(duration: string): boolean {
  return DURATION_REGEX.test(duration);
}

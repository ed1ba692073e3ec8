export function parseNumberWithDefault(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = Number(value);

  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric value: "${value}" (must be a non-negative finite number)`);
  }

  if (!Number.isInteger(parsed)) {
    throw new Error(`Invalid numeric value: "${value}" (must be an integer)`);
  }

  return parsed;
}

/**
 * Like {@link parseNumberWithDefault}, but an unset value stays unset.
 */
export function parseOptionalNumber(value: string | undefined): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  return parseNumberWithDefault(value, 0);
}

/**
 * Parses a string environment variable with a default value.
 *
 * Returns the provided value if present, otherwise returns the default.
 * Used for optional string configuration values.
 *
 * @param value - The string value to parse
 * @param defaultValue - The default value to return if not provided
 * @returns The value or default
 */
export function parseStringWithDefault(value: string | undefined, defaultValue: string): string {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value;
}

/**
 * Checks if input is an object and not null.
 */
export const isARealObject = (value: unknown): value is Record<string, unknown> => {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
};

/**
 * Parses a string flag value as boolean.
 * Recognises 'true', '1', 'yes', 'on' (case-insensitive, trimmed).
 */
export function parseBooleanFlag(raw: string | undefined): boolean {
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on';
}

/**
 * Returns the first argument that is a non-blank string, trimmed.
 */
export function firstNonBlank(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    if (value !== undefined && value.trim() !== '') {
      return value.trim();
    }
  }
  return undefined;
}

/**
 * Formats a Date as YYYY-MM-DD in UTC.
 */
export function toIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

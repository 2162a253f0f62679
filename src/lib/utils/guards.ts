/**
 * Narrow a stored string to one of a fixed set of literals.
 * Unknown values fall back to `fallback`; the schema CHECK constraints
 * keep that from happening for engine-written rows.
 */
export function oneOf<T extends string>(values: readonly T[], value: string, fallback: T): T {
  return values.find((candidate) => candidate === value) ?? fallback;
}

export function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

/**
 * Parse a JSON array column, keeping only the allowed members
 */
export function parseJsonList<T extends string>(raw: string | null, values: readonly T[]): T[] {
  if (!raw) return [];
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(parsed)) return [];
  return parsed.filter((item): item is T => typeof item === 'string' && isOneOf(values, item));
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size));
  }
  return chunks;
}

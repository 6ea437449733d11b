const stripWrapping = (value: string): string =>
  value
    .trim()
    .replace(/^['"(]+/, '')
    .replace(/['")]+$/, '')
    .trim();

/**
 * Loose boolean parsing for env values such as `'true'`, `(1)` or `false)`.
 * Anything unrecognised is returned untouched so zod can report it.
 */
export const booleanFromEnv = (value: unknown): unknown => {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return value;
  const normalized = stripWrapping(value).toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  return value;
};

export const numberFromEnv = (value: unknown): unknown => {
  if (typeof value === 'number') return value;
  if (value === undefined || value === null) return undefined;
  const normalized = stripWrapping(String(value));
  if (!normalized) return undefined;
  const parsed = Number(normalized);
  return Number.isFinite(parsed) ? parsed : value;
};

export const csvFromEnv = (value: unknown): unknown => {
  if (Array.isArray(value)) return value.map(String);
  if (value === undefined || value === null) return undefined;
  const normalized = String(value).trim();
  if (!normalized) return undefined;
  return normalized
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
};

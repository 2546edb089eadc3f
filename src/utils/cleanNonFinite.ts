/**
 * JSON has no NaN or Infinity. Vector scores occasionally come back as either,
 * so responses are cleaned before serialization.
 */
export function cleanNonFiniteNumbers(value: unknown): unknown {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (Array.isArray(value)) {
    return value.map(cleanNonFiniteNumbers);
  }
  if (value !== null && typeof value === 'object' && !(value instanceof Date)) {
    return Object.fromEntries(
      Object.entries(value).map(([key, entry]) => [key, cleanNonFiniteNumbers(entry)])
    );
  }
  return value;
}

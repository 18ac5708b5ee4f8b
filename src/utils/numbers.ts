/**
 * Parses a spreadsheet cell as a number. Thousands separators and
 * surrounding whitespace are accepted; anything else yields null.
 */
export const parseNumeric = (value: unknown): number | null => {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value !== 'string') return null;
  const cleaned = value.trim().replace(/,/g, '');
  if (cleaned === '') return null;
  const num = Number(cleaned);
  return Number.isFinite(num) ? num : null;
};

export const sum = (values: readonly number[]): number => values.reduce((acc, value) => acc + value, 0);

/**
 * Sample (n - 1) standard deviation; 0 for fewer than two values.
 */
export const sampleStandardDeviation = (values: readonly number[]): number => {
  if (values.length < 2) return 0;
  // the mean of equal floats can differ from them in the last bit
  if (values.every((value) => value === values[0])) return 0;
  const mean = sum(values) / values.length;
  const squared = values.reduce((acc, value) => acc + (value - mean) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
};

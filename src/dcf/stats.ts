export function mean(values: ReadonlyArray<number>): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Sample standard deviation (n - 1 denominator). */
export function sampleStdDev(values: ReadonlyArray<number>): number | null {
  const avg = mean(values);
  if (avg === null || values.length < 2) return null;
  const squared = values.reduce((sum, v) => sum + (v - avg) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

/** stdev / mean; null when the mean is not positive. */
export function coefficientOfVariation(values: ReadonlyArray<number>): number | null {
  const avg = mean(values);
  const sd = sampleStdDev(values);
  if (avg === null || sd === null || avg <= 0) return null;
  return sd / avg;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/** Numeric and label formatting shared by the scorers and reports. */

export function round(value: number, digits = 4): number {
  const f = 10 ** digits;
  return Math.round(value * f) / f;
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

/** 1-based DDX position → `P3`. */
export function positionLabel(position: number): string {
  return `P${position}`;
}

export function ratio(part: number, total: number, digits = 4): number {
  return total > 0 ? round(part / total, digits) : 0;
}

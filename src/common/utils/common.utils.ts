import Decimal from 'decimal.js';

export const logger = {
  log: (message: string) => {
    process.stdout.write(message + '\n');
  },
  warn: (message: string) => {
    process.stdout.write(message + '\n');
  },
  error: (message: string) => {
    process.stderr.write(message + '\n');
  },
};

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Round half away from zero to the nearest multiple of `increment`. */
export function roundToIncrement(value: number, increment: number): number {
  return new Decimal(value)
    .div(increment)
    .toDecimalPlaces(0, Decimal.ROUND_HALF_UP)
    .mul(increment)
    .toNumber();
}

export function roundToCents(value: number): number {
  return new Decimal(value).toDecimalPlaces(2, Decimal.ROUND_HALF_UP).toNumber();
}

export function mean(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

/** Standard deviation; `ddof` 1 gives the sample estimate, 0 the population one. */
export function standardDeviation(values: number[], ddof: 0 | 1 = 1): number {
  if (values.length - ddof <= 0) return 0;
  const avg = mean(values);
  const variance =
    values.reduce((sum, v) => sum + Math.pow(v - avg, 2), 0) /
    (values.length - ddof);
  return Math.sqrt(variance);
}

// Price grids can exceed the call-argument limit, so no spread into Math.min/max
export function minOf(values: number[]): number {
  return values.reduce((min, v) => (v < min ? v : min), Infinity);
}

export function maxOf(values: number[]): number {
  return values.reduce((max, v) => (v > max ? v : max), -Infinity);
}

export function median(values: number[]): number {
  return percentile(values, 50);
}

/** Percentile with linear interpolation between closest ranks. */
export function percentile(values: number[], pct: number): number {
  if (values.length === 0) return 0;
  const sorted = [...values].sort((a, b) => a - b);
  const rank = (pct / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

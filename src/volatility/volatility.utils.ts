import { InsufficientDataError, InvalidInputError } from '../common/errors';
import { OhlcBar } from '../common/types';
import { mean, standardDeviation } from '../common/utils/common.utils';
import {
  VOLATILITY_METHODS,
  VolatilityEstimate,
  VolatilityMethod,
  VolatilitySurfacePoint,
} from './types';

export const TRADING_DAYS_PER_YEAR = 252;
export const EWMA_LAMBDA = 0.94;
export const DEFAULT_VOLATILITY_PERIODS = [10, 20, 30, 60, 90, 252];

export function sortBarsByDate(bars: OhlcBar[]): OhlcBar[] {
  return [...bars].sort((a, b) => a.date.localeCompare(b.date));
}

export function calculateLogReturns(prices: number[]): number[] {
  const returns: number[] = [];
  for (let i = 1; i < prices.length; i++) {
    returns.push(Math.log(prices[i] / prices[i - 1]));
  }
  return returns;
}

function assertPeriod(periodDays: number): void {
  if (!Number.isInteger(periodDays) || periodDays < 1) {
    throw new InvalidInputError(`Volatility period must be a positive integer, got ${periodDays}`);
  }
}

/** Sorted bars, after checking that `periodDays + 1` of them exist. */
function requireHistory(bars: OhlcBar[], periodDays: number, method: VolatilityMethod): OhlcBar[] {
  assertPeriod(periodDays);
  if (bars.length < periodDays + 1) {
    throw new InsufficientDataError(
      `Not enough price history for ${periodDays}-day ${method} volatility`,
      periodDays + 1,
      bars.length,
    );
  }
  return sortBarsByDate(bars);
}

function closeToCloseReturns(window: OhlcBar[]): number[] {
  const returns = calculateLogReturns(window.map((bar) => bar.close));
  if (returns.length < 2) {
    throw new InsufficientDataError('At least two returns are needed', 2, returns.length);
  }
  return returns;
}

function buildEstimate(
  method: VolatilityMethod,
  periodDays: number,
  volatility: number,
  window: OhlcBar[],
  observationCount: number,
): VolatilityEstimate {
  return {
    method,
    periodDays,
    volatility,
    windowStart: window[0].date,
    windowEnd: window[window.length - 1].date,
    observationCount,
  };
}

export function calculateSimpleVolatility(bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate {
  const window = requireHistory(bars, periodDays, 'simple').slice(-(periodDays + 1));
  const returns = closeToCloseReturns(window);

  const volatility = standardDeviation(returns) * Math.sqrt(TRADING_DAYS_PER_YEAR);
  return buildEstimate('simple', periodDays, volatility, window, returns.length);
}

/** Exponentially weighted volatility; the newest return carries weight 1 before normalization. */
export function calculateEwmaVolatility(
  bars: OhlcBar[],
  periodDays: number = 30,
  lambda: number = EWMA_LAMBDA,
): VolatilityEstimate {
  const window = requireHistory(bars, periodDays, 'ewma').slice(-(periodDays + 1));
  const returns = closeToCloseReturns(window);

  const rawWeights = returns.map((_, i) => Math.pow(lambda, returns.length - 1 - i));
  const weightSum = rawWeights.reduce((sum, w) => sum + w, 0);
  const weights = rawWeights.map((w) => w / weightSum);

  const weightedMean = returns.reduce((sum, r, i) => sum + weights[i] * r, 0);
  const weightedVariance = returns.reduce(
    (sum, r, i) => sum + weights[i] * Math.pow(r - weightedMean, 2),
    0,
  );

  const volatility = Math.sqrt(weightedVariance * TRADING_DAYS_PER_YEAR);
  return buildEstimate('ewma', periodDays, volatility, window, returns.length);
}

interface RangeBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
}

function isPositive(value: number | undefined): value is number {
  return value !== undefined && Number.isFinite(value) && value > 0;
}

function requireRangeBars(
  window: OhlcBar[],
  method: VolatilityMethod,
  needsOpen: boolean,
): RangeBar[] {
  const rangeBars: RangeBar[] = [];
  for (const bar of window) {
    const { open, high, low } = bar;
    if (isPositive(high) && isPositive(low) && (!needsOpen || isPositive(open))) {
      rangeBars.push({ date: bar.date, open: open ?? bar.close, high, low, close: bar.close });
    }
  }
  if (rangeBars.length < window.length) {
    const fields = needsOpen ? 'open/high/low/close' : 'high/low';
    throw new InsufficientDataError(
      `${method} volatility needs ${fields} on every bar`,
      window.length,
      rangeBars.length,
    );
  }
  return rangeBars;
}

/** Parkinson high/low range estimator: σ² = mean(ln(H/L)²) / (4·ln 2). */
export function calculateParkinsonVolatility(bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate {
  const window = requireHistory(bars, periodDays, 'parkinson').slice(-periodDays);
  const rangeBars = requireRangeBars(window, 'parkinson', false);

  const squaredRanges = rangeBars.map((bar) => Math.pow(Math.log(bar.high / bar.low), 2));
  const variance = mean(squaredRanges) / (4 * Math.log(2));

  const volatility = Math.sqrt(variance * TRADING_DAYS_PER_YEAR);
  return buildEstimate('parkinson', periodDays, volatility, window, rangeBars.length);
}

/**
 * Garman-Klass OHLC estimator: σ² = mean(½·ln(H/L)² − (2·ln 2 − 1)·ln(C/O)²).
 * A negative mean variance is reported as zero volatility.
 */
export function calculateGarmanKlassVolatility(bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate {
  const window = requireHistory(bars, periodDays, 'garman-klass').slice(-periodDays);
  const rangeBars = requireRangeBars(window, 'garman-klass', true);

  const terms = rangeBars.map((bar) => {
    const hlTerm = 0.5 * Math.pow(Math.log(bar.high / bar.low), 2);
    const ocTerm = (2 * Math.log(2) - 1) * Math.pow(Math.log(bar.close / bar.open), 2);
    return hlTerm - ocTerm;
  });
  const variance = Math.max(mean(terms), 0);

  const volatility = Math.sqrt(variance * TRADING_DAYS_PER_YEAR);
  return buildEstimate('garman-klass', periodDays, volatility, window, rangeBars.length);
}

export function estimateVolatility(
  method: VolatilityMethod,
  bars: OhlcBar[],
  periodDays: number,
): VolatilityEstimate {
  switch (method) {
    case 'simple':
      return calculateSimpleVolatility(bars, periodDays);
    case 'ewma':
      return calculateEwmaVolatility(bars, periodDays);
    case 'parkinson':
      return calculateParkinsonVolatility(bars, periodDays);
    case 'garman-klass':
      return calculateGarmanKlassVolatility(bars, periodDays);
    default: {
      const unknownMethod: never = method;
      throw new InvalidInputError(`Unknown volatility method: ${String(unknownMethod)}`);
    }
  }
}

/** One estimate per period, in the given order; periods without enough data are left out. */
export function calculateMultiPeriodVolatility(
  bars: OhlcBar[],
  periods: number[] = DEFAULT_VOLATILITY_PERIODS,
  method: VolatilityMethod = 'simple',
): VolatilityEstimate[] {
  const results: VolatilityEstimate[] = [];
  for (const period of periods) {
    try {
      results.push(estimateVolatility(method, bars, period));
    } catch (error) {
      if (!(error instanceof InsufficientDataError)) {
        throw error;
      }
    }
  }
  return results;
}

/**
 * Where `currentVolatility` sits (0-100) among the rolling `windowDays`
 * simple volatilities of the trailing `lookbackDays`. Returns `null` when
 * the history is shorter than `lookbackDays + windowDays`.
 */
export function calculateVolatilityPercentile(
  currentVolatility: number,
  bars: OhlcBar[],
  lookbackDays: number = 252,
  windowDays: number = 30,
): number | null {
  if (bars.length < lookbackDays + windowDays) {
    return null;
  }

  const history = sortBarsByDate(bars).slice(-(lookbackDays + windowDays));
  const rollingVolatilities: number[] = [];

  for (let i = windowDays; i < history.length; i++) {
    const subset = history.slice(i - windowDays, i + 1);
    try {
      rollingVolatilities.push(calculateSimpleVolatility(subset, windowDays).volatility);
    } catch (error) {
      if (!(error instanceof InsufficientDataError)) {
        throw error;
      }
    }
  }

  if (rollingVolatilities.length === 0) {
    return null;
  }

  const below = rollingVolatilities.filter((vol) => vol < currentVolatility).length;
  return (below / rollingVolatilities.length) * 100;
}

/** Every method across every period, skipping combinations the data cannot support. */
export function buildVolatilitySurface(
  bars: OhlcBar[],
  periods: number[] = [10, 20, 30, 60, 90, 180, 252],
): VolatilitySurfacePoint[] {
  return VOLATILITY_METHODS.flatMap((method) =>
    calculateMultiPeriodVolatility(bars, periods, method).map((estimate) => ({
      ...estimate,
      annualizedVolPct: estimate.volatility * 100,
    })),
  );
}

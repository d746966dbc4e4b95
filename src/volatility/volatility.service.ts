import { Injectable, Logger } from '@nestjs/common';
import { InsufficientDataError } from '../common/errors';
import { OhlcBar } from '../common/types';
import {
  VolatilityEstimate,
  VolatilityMethod,
  VolatilityMetrics,
  VolatilitySurfacePoint,
} from './types';
import {
  DEFAULT_VOLATILITY_PERIODS,
  buildVolatilitySurface,
  calculateMultiPeriodVolatility,
  calculateVolatilityPercentile,
  estimateVolatility,
} from './volatility.utils';

@Injectable()
export class VolatilityService {
  private readonly logger = new Logger(VolatilityService.name);

  /**
   * Runs one estimator and returns `null` (with a warning) when the series
   * is too short or lacks the columns the estimator needs.
   */
  estimate(method: VolatilityMethod, bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate | null {
    try {
      return estimateVolatility(method, bars, periodDays);
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        this.logger.warn(`Skipping ${method} volatility: ${error.message}`);
        return null;
      }
      throw error;
    }
  }

  simple(bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate | null {
    return this.estimate('simple', bars, periodDays);
  }

  ewma(bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate | null {
    return this.estimate('ewma', bars, periodDays);
  }

  parkinson(bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate | null {
    return this.estimate('parkinson', bars, periodDays);
  }

  garmanKlass(bars: OhlcBar[], periodDays: number = 30): VolatilityEstimate | null {
    return this.estimate('garman-klass', bars, periodDays);
  }

  multiPeriod(
    bars: OhlcBar[],
    periods: number[] = DEFAULT_VOLATILITY_PERIODS,
    method: VolatilityMethod = 'simple',
  ): VolatilityEstimate[] {
    return calculateMultiPeriodVolatility(bars, periods, method);
  }

  percentileRank(
    currentVolatility: number,
    bars: OhlcBar[],
    lookbackDays: number = 252,
    windowDays: number = 30,
  ): number | null {
    const percentile = calculateVolatilityPercentile(currentVolatility, bars, lookbackDays, windowDays);
    if (percentile === null) {
      this.logger.warn(
        `Volatility percentile unavailable: ${bars.length} bars, need ${lookbackDays + windowDays}`,
      );
    }
    return percentile;
  }

  surface(bars: OhlcBar[], periods?: number[]): VolatilitySurfacePoint[] {
    return buildVolatilitySurface(bars, periods);
  }

  /** Simple volatility at the standard periods plus the 30-day percentile. */
  metrics(bars: OhlcBar[]): VolatilityMetrics {
    const byPeriod: Record<number, number> = {};
    for (const estimate of calculateMultiPeriodVolatility(bars, DEFAULT_VOLATILITY_PERIODS)) {
      byPeriod[estimate.periodDays] = estimate.volatility;
    }

    const hv30 = byPeriod[30];
    const hvPercentile =
      hv30 !== undefined ? calculateVolatilityPercentile(hv30, bars, 252, 30) : null;

    return { byPeriod, hvPercentile };
  }
}

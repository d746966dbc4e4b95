import { InsufficientDataError } from '../common/errors';
import { OhlcBar } from '../common/types';
import { addDays } from '../common/utils/date.utils';
import {
  buildVolatilitySurface,
  calculateEwmaVolatility,
  calculateGarmanKlassVolatility,
  calculateLogReturns,
  calculateMultiPeriodVolatility,
  calculateParkinsonVolatility,
  calculateSimpleVolatility,
  calculateVolatilityPercentile,
  estimateVolatility,
} from './volatility.utils';

function closeBars(closes: number[], startDate = '2024-01-01'): OhlcBar[] {
  return closes.map((close, i) => ({ date: addDays(startDate, i), close }));
}

// open, high, low, close
const OHLC: [number, number, number, number][] = [
  [100, 101, 99, 100],
  [100, 103, 99.5, 102],
  [102, 102.5, 98, 99],
  [99, 101.5, 98.5, 101],
  [101, 104.5, 100.5, 104],
  [104, 104.2, 102, 103],
];

const OHLC_BARS: OhlcBar[] = OHLC.map(([open, high, low, close], i) => ({
  date: addDays('2024-01-01', i),
  open,
  high,
  low,
  close,
}));

describe('volatility.utils', () => {
  describe('calculateLogReturns', () => {
    it('should return one log return per consecutive pair', () => {
      const returns = calculateLogReturns([100, 110, 99]);
      expect(returns).toHaveLength(2);
      expect(returns[0]).toBeCloseTo(Math.log(1.1), 12);
      expect(returns[1]).toBeCloseTo(Math.log(0.9), 12);
    });
  });

  describe('calculateSimpleVolatility', () => {
    it('should annualize the sample deviation of the last period returns', () => {
      const estimate = calculateSimpleVolatility(OHLC_BARS, 5);

      expect(estimate.volatility).toBeCloseTo(0.3935736301, 9);
      expect(estimate).toMatchObject({
        method: 'simple',
        periodDays: 5,
        windowStart: '2024-01-01',
        windowEnd: '2024-01-06',
        observationCount: 5,
      });
    });

    it('should ignore bars older than the window and sort by date', () => {
      const older = closeBars([50, 80, 60], '2023-12-01');
      const shuffled = [...OHLC_BARS].reverse();

      expect(calculateSimpleVolatility([...older, ...shuffled], 5).volatility).toBeCloseTo(
        0.3935736301,
        9,
      );
    });

    it('should require period + 1 bars', () => {
      expect(() => calculateSimpleVolatility(OHLC_BARS.slice(1), 5)).toThrow(InsufficientDataError);

      try {
        calculateSimpleVolatility(OHLC_BARS.slice(1), 5);
      } catch (error) {
        expect(error).toBeInstanceOf(InsufficientDataError);
        if (error instanceof InsufficientDataError) {
          expect(error.required).toBe(6);
          expect(error.available).toBe(5);
        }
      }
    });

    it('should need at least two returns', () => {
      expect(() => calculateSimpleVolatility(closeBars([100, 101]), 1)).toThrow(InsufficientDataError);
    });
  });

  describe('calculateEwmaVolatility', () => {
    it('should weight recent returns more heavily', () => {
      expect(calculateEwmaVolatility(OHLC_BARS, 5).volatility).toBeCloseTo(0.3490255281, 9);
    });

    it('should be zero for a flat series', () => {
      expect(calculateEwmaVolatility(closeBars([100, 100, 100, 100]), 3).volatility).toBe(0);
    });
  });

  describe('range estimators', () => {
    it('should compute Parkinson volatility over the last period bars', () => {
      const estimate = calculateParkinsonVolatility(OHLC_BARS, 5);

      expect(estimate.volatility).toBeCloseTo(0.3327096922, 9);
      expect(estimate.windowStart).toBe('2024-01-02');
      expect(estimate.observationCount).toBe(5);
    });

    it('should compute Garman-Klass volatility over the last period bars', () => {
      expect(calculateGarmanKlassVolatility(OHLC_BARS, 5).volatility).toBeCloseTo(0.3196640055, 9);
    });

    it('should floor a negative Garman-Klass variance at zero', () => {
      const inconsistent: OhlcBar[] = [0, 1, 2].map((i) => ({
        date: addDays('2024-01-01', i),
        open: 90,
        high: 100.1,
        low: 100,
        close: 100,
      }));

      expect(calculateGarmanKlassVolatility(inconsistent, 2).volatility).toBe(0);
    });

    it('should fail when high or low is missing in the window', () => {
      const bars = OHLC_BARS.map((bar, i) => (i === 4 ? { date: bar.date, close: bar.close } : bar));

      expect(() => calculateParkinsonVolatility(bars, 5)).toThrow(InsufficientDataError);
      expect(() => calculateGarmanKlassVolatility(bars, 5)).toThrow(InsufficientDataError);
    });

    it('should require period + 1 bars like the close-to-close estimators', () => {
      expect(() => calculateParkinsonVolatility(OHLC_BARS, 6)).toThrow(InsufficientDataError);
    });
  });

  describe('estimateVolatility', () => {
    it('should dispatch on the method name', () => {
      expect(estimateVolatility('simple', OHLC_BARS, 5).method).toBe('simple');
      expect(estimateVolatility('ewma', OHLC_BARS, 5).method).toBe('ewma');
      expect(estimateVolatility('parkinson', OHLC_BARS, 5).method).toBe('parkinson');
      expect(estimateVolatility('garman-klass', OHLC_BARS, 5).method).toBe('garman-klass');
    });
  });

  describe('calculateMultiPeriodVolatility', () => {
    it('should keep the requested order and omit periods without enough data', () => {
      const bars = closeBars(Array.from({ length: 25 }, (_, i) => 100 + (i % 3)));

      const estimates = calculateMultiPeriodVolatility(bars, [20, 5, 30, 10]);

      expect(estimates.map((estimate) => estimate.periodDays)).toEqual([20, 5, 10]);
    });
  });

  describe('calculateVolatilityPercentile', () => {
    const bars = closeBars([100, 101, 103, 102, 105, 104, 106, 103, 107]);

    it('should rank against the rolling window volatilities', () => {
      // rolling 3-day volatilities: 0.3209, 0.3542, 0.3178, 0.3815, 0.5464
      expect(calculateVolatilityPercentile(0.35, bars, 5, 3)).toBe(40);
      expect(calculateVolatilityPercentile(0.6, bars, 5, 3)).toBe(100);
      expect(calculateVolatilityPercentile(0.1, bars, 5, 3)).toBe(0);
    });

    it('should return null when the history is too short', () => {
      expect(calculateVolatilityPercentile(0.35, bars.slice(2), 5, 3)).toBeNull();
    });
  });

  describe('buildVolatilitySurface', () => {
    it('should include every method and period the data supports', () => {
      const surface = buildVolatilitySurface(OHLC_BARS, [3, 5, 10]);

      expect(surface).toHaveLength(8);
      expect(surface.filter((row) => row.periodDays === 10)).toHaveLength(0);
      const simple5 = surface.find((row) => row.method === 'simple' && row.periodDays === 5);
      expect(simple5?.annualizedVolPct).toBeCloseTo(39.35736301, 7);
    });
  });
});

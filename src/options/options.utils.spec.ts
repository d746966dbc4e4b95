import {
  InvalidInputError,
  InvalidOptionTypeError,
  UndeterminableVolatilityError,
} from '../common/errors';
import { OptionPricingParams } from './types';
import {
  calculateBlackScholesPrice,
  calculateDelta,
  calculateGreeks,
  calculateImpliedVolatility,
  calculateIntrinsicValue,
  calculateTimeValue,
  calculateVega,
  findRootBrent,
  normalCDF,
  parseOptionType,
  timeToExpiration,
} from './options.utils';

const ATM_CALL: OptionPricingParams = {
  spotPrice: 100,
  strikePrice: 100,
  timeToExpiry: 30 / 365,
  riskFreeRate: 0.05,
  volatility: 0.2,
  optionType: 'call',
};

describe('options.utils', () => {
  describe('normalCDF', () => {
    it('should be symmetric around zero', () => {
      expect(normalCDF(0)).toBeCloseTo(0.5, 7);
      expect(normalCDF(1.3) + normalCDF(-1.3)).toBeCloseTo(1, 12);
      expect(normalCDF(1.96)).toBeCloseTo(0.975, 3);
    });
  });

  describe('calculateBlackScholesPrice', () => {
    it('should price the 30-day at-the-money call and put', () => {
      expect(calculateBlackScholesPrice(ATM_CALL)).toBeCloseTo(2.4934, 4);
      expect(calculateBlackScholesPrice({ ...ATM_CALL, optionType: 'put' })).toBeCloseTo(2.0833, 4);
    });

    it('should satisfy put-call parity', () => {
      const cases: OptionPricingParams[] = [
        ATM_CALL,
        { ...ATM_CALL, spotPrice: 90, strikePrice: 95, timeToExpiry: 0.5, volatility: 0.35 },
        { ...ATM_CALL, spotPrice: 120, strikePrice: 110, timeToExpiry: 1, dividendYield: 0.02 },
      ];

      for (const params of cases) {
        const { spotPrice, strikePrice, timeToExpiry, riskFreeRate } = params;
        const dividendYield = params.dividendYield ?? 0;
        const call = calculateBlackScholesPrice({ ...params, optionType: 'call' });
        const put = calculateBlackScholesPrice({ ...params, optionType: 'put' });

        expect(call - put).toBeCloseTo(
          spotPrice * Math.exp(-dividendYield * timeToExpiry) -
            strikePrice * Math.exp(-riskFreeRate * timeToExpiry),
          8,
        );
      }
    });

    it('should return intrinsic value at expiry', () => {
      const expired = { ...ATM_CALL, spotPrice: 110, timeToExpiry: 0 };
      expect(calculateBlackScholesPrice(expired)).toBe(10);
      expect(calculateBlackScholesPrice({ ...expired, optionType: 'put' })).toBe(0);
    });

    it('should return zero for zero volatility with time remaining', () => {
      expect(calculateBlackScholesPrice({ ...ATM_CALL, spotPrice: 110, volatility: 0 })).toBe(0);
    });

    it('should reject invalid inputs', () => {
      expect(() => calculateBlackScholesPrice({ ...ATM_CALL, spotPrice: 0 })).toThrow(InvalidInputError);
      expect(() => calculateBlackScholesPrice({ ...ATM_CALL, strikePrice: -5 })).toThrow(InvalidInputError);
      expect(() => calculateBlackScholesPrice({ ...ATM_CALL, timeToExpiry: -0.1 })).toThrow(InvalidInputError);
      expect(() => calculateBlackScholesPrice({ ...ATM_CALL, volatility: Number.NaN })).toThrow(
        InvalidInputError,
      );
    });
  });

  describe('calculateGreeks', () => {
    it('should compute all Greeks for the at-the-money call', () => {
      const greeks = calculateGreeks(ATM_CALL);

      expect(greeks.price).toBeCloseTo(2.4934, 4);
      expect(greeks.delta).toBeCloseTo(0.54, 2);
      expect(greeks.gamma).toBeCloseTo(0.06923, 4);
      expect(greeks.theta).toBeCloseTo(-0.04499, 4);
      expect(greeks.vega).toBeCloseTo(0.1138, 4);
      expect(greeks.rho).toBeCloseTo(0.04233, 4);
    });

    it('should keep delta within bounds and vega non-negative', () => {
      for (const spotPrice of [50, 80, 100, 120, 200]) {
        for (const volatility of [0.05, 0.3, 1.5]) {
          const params = { ...ATM_CALL, spotPrice, volatility, timeToExpiry: 0.25 };
          const callDelta = calculateDelta(params);
          const putDelta = calculateDelta({ ...params, optionType: 'put' });

          expect(callDelta).toBeGreaterThanOrEqual(0);
          expect(callDelta).toBeLessThanOrEqual(1);
          expect(putDelta).toBeGreaterThanOrEqual(-1);
          expect(putDelta).toBeLessThanOrEqual(0);
          expect(calculateVega(params)).toBeGreaterThanOrEqual(0);
        }
      }
    });

    it('should collapse delta to moneyness when expired or volatility is zero', () => {
      expect(calculateDelta({ ...ATM_CALL, spotPrice: 105, timeToExpiry: 0 })).toBe(1);
      expect(calculateDelta({ ...ATM_CALL, spotPrice: 95, timeToExpiry: 0 })).toBe(0);
      expect(calculateDelta({ ...ATM_CALL, spotPrice: 95, volatility: 0, optionType: 'put' })).toBe(-1);
      expect(calculateDelta({ ...ATM_CALL, spotPrice: 100, volatility: 0, optionType: 'put' })).toBe(0);

      const expiredGreeks = calculateGreeks({ ...ATM_CALL, timeToExpiry: 0 });
      expect(expiredGreeks.gamma).toBe(0);
      expect(expiredGreeks.theta).toBe(0);
      expect(expiredGreeks.vega).toBe(0);
      expect(expiredGreeks.rho).toBe(0);
    });
  });

  describe('intrinsic and time value', () => {
    it('should split an in-the-money call into intrinsic and time value', () => {
      const params = { ...ATM_CALL, spotPrice: 110 };
      expect(calculateIntrinsicValue(110, 100, 'call')).toBe(10);
      expect(calculateIntrinsicValue(90, 100, 'put')).toBe(10);
      expect(calculateTimeValue(params)).toBeCloseTo(calculateBlackScholesPrice(params) - 10, 10);
      expect(calculateTimeValue(params)).toBeGreaterThan(0);
    });
  });

  describe('parseOptionType', () => {
    it('should accept long and short forms in any case', () => {
      expect(parseOptionType('C')).toBe('call');
      expect(parseOptionType(' Put ')).toBe('put');
      expect(parseOptionType('p')).toBe('put');
    });

    it('should reject anything else', () => {
      expect(() => parseOptionType('straddle')).toThrow(InvalidOptionTypeError);
      expect(() => parseOptionType(42)).toThrow(InvalidOptionTypeError);
    });
  });

  describe('calculateImpliedVolatility', () => {
    it('should recover the volatility used to price the option', () => {
      const base = { ...ATM_CALL, timeToExpiry: 0.5 };
      for (const volatility of [0.05, 0.2, 0.5, 1.0, 2.0]) {
        for (const optionType of ['call', 'put'] as const) {
          const marketPrice = calculateBlackScholesPrice({ ...base, volatility, optionType });
          expect(calculateImpliedVolatility(marketPrice, { ...base, optionType })).toBeCloseTo(volatility, 4);
        }
      }
    });

    it('should fail when the volatility cannot be determined', () => {
      expect(() => calculateImpliedVolatility(2.5, { ...ATM_CALL, timeToExpiry: 0 })).toThrow(
        UndeterminableVolatilityError,
      );
      expect(() => calculateImpliedVolatility(0, ATM_CALL)).toThrow(UndeterminableVolatilityError);
      expect(() => calculateImpliedVolatility(15, { ...ATM_CALL, spotPrice: 120 })).toThrow(
        UndeterminableVolatilityError,
      );
      expect(() => calculateImpliedVolatility(99, { ...ATM_CALL, timeToExpiry: 0.5 })).toThrow(
        UndeterminableVolatilityError,
      );
    });
  });

  describe('findRootBrent', () => {
    it('should find a bracketed root', () => {
      const root = findRootBrent((x) => x * x - 2, 0, 2);
      expect(root).not.toBeNull();
      expect(root ?? 0).toBeCloseTo(Math.SQRT2, 10);
    });

    it('should return null without a sign change', () => {
      expect(findRootBrent((x) => x * x - 2, 2, 3)).toBeNull();
    });
  });

  describe('timeToExpiration', () => {
    it('should count calendar days in years and floor at zero', () => {
      expect(timeToExpiration('2024-12-20', '2024-11-20')).toBeCloseTo(30 / 365, 12);
      expect(timeToExpiration('2024-12-20', '2024-12-20')).toBe(0);
      expect(timeToExpiration('2024-12-20', '2025-01-10')).toBe(0);
    });
  });
});

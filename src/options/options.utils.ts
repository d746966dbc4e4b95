import {
  InvalidInputError,
  InvalidOptionTypeError,
  UndeterminableVolatilityError,
} from '../common/errors';
import { IsoDate } from '../common/types';
import { daysBetween } from '../common/utils/date.utils';
import {
  GreeksResult,
  ImpliedVolatilityParams,
  OptionPricingParams,
  OptionType,
} from './types';

export const IMPLIED_VOLATILITY_LOWER_BOUND = 0.001;
export const IMPLIED_VOLATILITY_UPPER_BOUND = 5.0;
export const IMPLIED_VOLATILITY_MAX_ITERATIONS = 100;

export function normalCDF(x: number): number {
  const a1 = 0.254829592;
  const a2 = -0.284496736;
  const a3 = 1.421413741;
  const a4 = -1.453152027;
  const a5 = 1.061405429;
  const p = 0.3275911;

  const sign = x < 0 ? -1 : 1;
  x = Math.abs(x) / Math.sqrt(2.0);

  const t = 1.0 / (1.0 + p * x);
  const y = 1.0 - (((((a5 * t + a4) * t) + a3) * t + a2) * t + a1) * t * Math.exp(-x * x);

  return 0.5 * (1.0 + sign * y);
}

export function normalPDF(x: number): number {
  return Math.exp(-0.5 * x * x) / Math.sqrt(2 * Math.PI);
}

export function parseOptionType(value: unknown): OptionType {
  if (typeof value === 'string') {
    switch (value.trim().toLowerCase()) {
      case 'call':
      case 'c':
        return 'call';
      case 'put':
      case 'p':
        return 'put';
    }
  }
  throw new InvalidOptionTypeError(value);
}

export function validatePricingParams(params: OptionPricingParams): void {
  const { spotPrice, strikePrice, timeToExpiry, riskFreeRate, volatility } = params;
  const dividendYield = params.dividendYield ?? 0;

  for (const [name, value] of Object.entries({
    spotPrice,
    strikePrice,
    timeToExpiry,
    riskFreeRate,
    volatility,
    dividendYield,
  })) {
    if (!Number.isFinite(value)) {
      throw new InvalidInputError(`${name} must be a finite number, got ${value}`);
    }
  }
  if (spotPrice <= 0) {
    throw new InvalidInputError(`spotPrice must be positive, got ${spotPrice}`);
  }
  if (strikePrice <= 0) {
    throw new InvalidInputError(`strikePrice must be positive, got ${strikePrice}`);
  }
  if (timeToExpiry < 0) {
    throw new InvalidInputError(`timeToExpiry must not be negative, got ${timeToExpiry}`);
  }
  if (volatility < 0) {
    throw new InvalidInputError(`volatility must not be negative, got ${volatility}`);
  }
  if (dividendYield < 0) {
    throw new InvalidInputError(`dividendYield must not be negative, got ${dividendYield}`);
  }
  if (params.optionType !== 'call' && params.optionType !== 'put') {
    throw new InvalidOptionTypeError(params.optionType);
  }
}

function isDegenerate(params: OptionPricingParams): boolean {
  return params.timeToExpiry <= 0 || params.volatility <= 0;
}

function calculateD1(params: OptionPricingParams): number {
  const { spotPrice, strikePrice, timeToExpiry, riskFreeRate, volatility } = params;
  const dividendYield = params.dividendYield ?? 0;

  return (
    (Math.log(spotPrice / strikePrice) +
      (riskFreeRate - dividendYield + 0.5 * volatility * volatility) * timeToExpiry) /
    (volatility * Math.sqrt(timeToExpiry))
  );
}

function calculateD2(params: OptionPricingParams): number {
  const d1 = calculateD1(params);
  return d1 - params.volatility * Math.sqrt(params.timeToExpiry);
}

export function calculateIntrinsicValue(
  spotPrice: number,
  strikePrice: number,
  optionType: OptionType,
): number {
  switch (optionType) {
    case 'call':
      return Math.max(0, spotPrice - strikePrice);
    case 'put':
      return Math.max(0, strikePrice - spotPrice);
    default:
      throw new InvalidOptionTypeError(optionType);
  }
}

/**
 * Black-Scholes-Merton price with continuous dividend yield.
 *
 * At or past expiry the intrinsic value is returned. With zero volatility
 * and time remaining the price is 0, not the discounted intrinsic value.
 */
export function calculateBlackScholesPrice(params: OptionPricingParams): number {
  validatePricingParams(params);
  const { spotPrice, strikePrice, timeToExpiry, riskFreeRate, optionType } = params;

  if (timeToExpiry <= 0) {
    return calculateIntrinsicValue(spotPrice, strikePrice, optionType);
  }
  if (params.volatility <= 0) {
    return 0;
  }

  const d1 = calculateD1(params);
  const d2 = calculateD2(params);
  const dividendDiscount = Math.exp(-(params.dividendYield ?? 0) * timeToExpiry);
  const rateDiscount = Math.exp(-riskFreeRate * timeToExpiry);

  let price: number;
  switch (optionType) {
    case 'call':
      price =
        spotPrice * dividendDiscount * normalCDF(d1) -
        strikePrice * rateDiscount * normalCDF(d2);
      break;
    case 'put':
      price =
        strikePrice * rateDiscount * normalCDF(-d2) -
        spotPrice * dividendDiscount * normalCDF(-d1);
      break;
    default:
      throw new InvalidOptionTypeError(optionType);
  }

  return Math.max(price, 0);
}

export function calculateTimeValue(params: OptionPricingParams): number {
  const totalValue = calculateBlackScholesPrice(params);
  const intrinsicValue = calculateIntrinsicValue(params.spotPrice, params.strikePrice, params.optionType);
  return Math.max(0, totalValue - intrinsicValue);
}

export function calculateDelta(params: OptionPricingParams): number {
  validatePricingParams(params);

  if (isDegenerate(params)) {
    if (params.optionType === 'call') {
      return params.spotPrice > params.strikePrice ? 1 : 0;
    } else {
      return params.spotPrice < params.strikePrice ? -1 : 0;
    }
  }

  const d1 = calculateD1(params);
  const dividendDiscount = Math.exp(-(params.dividendYield ?? 0) * params.timeToExpiry);

  if (params.optionType === 'call') {
    return dividendDiscount * normalCDF(d1);
  } else {
    return -dividendDiscount * normalCDF(-d1);
  }
}

export function calculateGamma(params: OptionPricingParams): number {
  validatePricingParams(params);
  if (isDegenerate(params)) {
    return 0;
  }

  const d1 = calculateD1(params);
  const dividendDiscount = Math.exp(-(params.dividendYield ?? 0) * params.timeToExpiry);
  return (
    (dividendDiscount * normalPDF(d1)) /
    (params.spotPrice * params.volatility * Math.sqrt(params.timeToExpiry))
  );
}

/** Theta per calendar day (annual theta / 365). */
export function calculateTheta(params: OptionPricingParams): number {
  validatePricingParams(params);
  if (isDegenerate(params)) {
    return 0;
  }

  const { spotPrice, strikePrice, timeToExpiry, riskFreeRate, volatility, optionType } = params;
  const dividendYield = params.dividendYield ?? 0;
  const d1 = calculateD1(params);
  const d2 = calculateD2(params);
  const dividendDiscount = Math.exp(-dividendYield * timeToExpiry);
  const rateDiscount = Math.exp(-riskFreeRate * timeToExpiry);

  const term1 = -(spotPrice * dividendDiscount * normalPDF(d1) * volatility) / (2 * Math.sqrt(timeToExpiry));

  if (optionType === 'call') {
    const term2 = -riskFreeRate * strikePrice * rateDiscount * normalCDF(d2);
    const term3 = dividendYield * spotPrice * dividendDiscount * normalCDF(d1);
    return (term1 + term2 + term3) / 365;
  } else {
    const term2 = riskFreeRate * strikePrice * rateDiscount * normalCDF(-d2);
    const term3 = -dividendYield * spotPrice * dividendDiscount * normalCDF(-d1);
    return (term1 + term2 + term3) / 365;
  }
}

/** Price change for a 0.01 absolute move in volatility. */
export function calculateVega(params: OptionPricingParams): number {
  validatePricingParams(params);
  if (isDegenerate(params)) {
    return 0;
  }

  const d1 = calculateD1(params);
  const dividendDiscount = Math.exp(-(params.dividendYield ?? 0) * params.timeToExpiry);
  return (params.spotPrice * dividendDiscount * normalPDF(d1) * Math.sqrt(params.timeToExpiry)) / 100;
}

/** Price change for a 0.01 absolute move in the risk-free rate. */
export function calculateRho(params: OptionPricingParams): number {
  validatePricingParams(params);
  if (isDegenerate(params)) {
    return 0;
  }

  const { strikePrice, timeToExpiry, riskFreeRate } = params;
  const d2 = calculateD2(params);
  const rateDiscount = Math.exp(-riskFreeRate * timeToExpiry);

  if (params.optionType === 'call') {
    return (strikePrice * timeToExpiry * rateDiscount * normalCDF(d2)) / 100;
  } else {
    return (-strikePrice * timeToExpiry * rateDiscount * normalCDF(-d2)) / 100;
  }
}

export function calculateGreeks(params: OptionPricingParams): GreeksResult {
  return {
    price: calculateBlackScholesPrice(params),
    delta: calculateDelta(params),
    gamma: calculateGamma(params),
    theta: calculateTheta(params),
    vega: calculateVega(params),
    rho: calculateRho(params),
  };
}

/**
 * Brent's method. Returns `null` when `[lower, upper]` does not bracket a
 * root or the iteration budget runs out.
 */
export function findRootBrent(
  fn: (x: number) => number,
  lower: number,
  upper: number,
  maxIterations: number = 100,
  tolerance: number = 2e-12,
): number | null {
  let a = lower;
  let b = upper;
  let fa = fn(a);
  let fb = fn(b);

  if (fa === 0) return a;
  if (fb === 0) return b;
  if (!Number.isFinite(fa) || !Number.isFinite(fb) || fa * fb > 0) return null;

  let c = b;
  let fc = fb;
  let d = b - a;
  let e = d;

  for (let i = 0; i < maxIterations; i++) {
    if ((fb > 0 && fc > 0) || (fb < 0 && fc < 0)) {
      c = a;
      fc = fa;
      d = b - a;
      e = d;
    }
    if (Math.abs(fc) < Math.abs(fb)) {
      a = b;
      b = c;
      c = a;
      fa = fb;
      fb = fc;
      fc = fa;
    }

    const tol1 = 2 * Number.EPSILON * Math.abs(b) + 0.5 * tolerance;
    const xm = 0.5 * (c - b);
    if (Math.abs(xm) <= tol1 || fb === 0) {
      return b;
    }

    if (Math.abs(e) >= tol1 && Math.abs(fa) > Math.abs(fb)) {
      // inverse quadratic interpolation, or secant when only two points
      const s = fb / fa;
      let p: number;
      let q: number;
      if (a === c) {
        p = 2 * xm * s;
        q = 1 - s;
      } else {
        const qa = fa / fc;
        const r = fb / fc;
        p = s * (2 * xm * qa * (qa - r) - (b - a) * (r - 1));
        q = (qa - 1) * (r - 1) * (s - 1);
      }
      if (p > 0) q = -q;
      p = Math.abs(p);
      const min1 = 3 * xm * q - Math.abs(tol1 * q);
      const min2 = Math.abs(e * q);
      if (2 * p < Math.min(min1, min2)) {
        e = d;
        d = p / q;
      } else {
        d = xm;
        e = d;
      }
    } else {
      d = xm;
      e = d;
    }

    a = b;
    fa = fb;
    b += Math.abs(d) > tol1 ? d : xm >= 0 ? tol1 : -tol1;
    fb = fn(b);
  }

  return null;
}

/**
 * Volatility that reproduces `marketPrice` under Black-Scholes, searched in
 * [0.001, 5.0].
 *
 * @throws UndeterminableVolatilityError when the inversion has no answer
 */
export function calculateImpliedVolatility(
  marketPrice: number,
  params: ImpliedVolatilityParams,
): number {
  const { spotPrice, strikePrice, timeToExpiry, optionType } = params;

  if (timeToExpiry <= 0) {
    throw new UndeterminableVolatilityError('Option has expired');
  }
  if (!(marketPrice > 0)) {
    throw new UndeterminableVolatilityError(`Market price must be positive, got ${marketPrice}`);
  }

  const intrinsic = calculateIntrinsicValue(spotPrice, strikePrice, optionType);
  if (marketPrice < intrinsic) {
    throw new UndeterminableVolatilityError(
      `Market price ${marketPrice} is below intrinsic value ${intrinsic}`,
    );
  }

  const objective = (volatility: number) =>
    calculateBlackScholesPrice({ ...params, volatility }) - marketPrice;

  const iv = findRootBrent(
    objective,
    IMPLIED_VOLATILITY_LOWER_BOUND,
    IMPLIED_VOLATILITY_UPPER_BOUND,
    IMPLIED_VOLATILITY_MAX_ITERATIONS,
  );

  if (iv === null) {
    throw new UndeterminableVolatilityError(
      `No implied volatility in [${IMPLIED_VOLATILITY_LOWER_BOUND}, ${IMPLIED_VOLATILITY_UPPER_BOUND}] for price ${marketPrice}`,
    );
  }
  if (iv < IMPLIED_VOLATILITY_LOWER_BOUND || iv > IMPLIED_VOLATILITY_UPPER_BOUND) {
    throw new UndeterminableVolatilityError(`Implied volatility ${iv} is outside the search bracket`);
  }

  return iv;
}

export function daysToYears(days: number): number {
  return days / 365;
}

/** Calendar days from `asOf` to `expiration`, in years, floored at 0. */
export function timeToExpiration(expiration: IsoDate, asOf: IsoDate): number {
  return Math.max(daysToYears(daysBetween(asOf, expiration)), 0);
}

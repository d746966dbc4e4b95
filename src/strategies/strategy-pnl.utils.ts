import { InvalidInputError } from '../common/errors';
import { maxOf, minOf, roundToCents } from '../common/utils/common.utils';
import { PositionSide } from '../options/types';
import {
  calculateBlackScholesPrice,
  calculateGreeks,
  calculateIntrinsicValue,
} from '../options/options.utils';
import {
  OptionLeg,
  StockLeg,
  StrategyDefinition,
  StrategyGreeks,
  StrategyPnLResult,
} from './types';

export const CONTRACT_MULTIPLIER = 100;
export const BREAKEVEN_TOLERANCE = 0.01;
const MIN_SLOPE = 1e-10;

export function positionSign(position: PositionSide): 1 | -1 {
  switch (position) {
    case 'long':
      return 1;
    case 'short':
      return -1;
  }
}

/**
 * P&L of one option leg across `priceGrid`. Intrinsic value is used at or
 * past expiry, Black-Scholes otherwise. A missing premium counts as 0.
 */
export function calculateOptionLegPnl(
  leg: OptionLeg,
  priceGrid: number[],
  timeToExpiry: number,
  volatility: number,
  riskFreeRate: number = 0.05,
  dividendYield: number = 0,
): number[] {
  const premium = leg.premium ?? 0;
  const multiplier = leg.quantity * CONTRACT_MULTIPLIER;

  return priceGrid.map((spotPrice) => {
    const optionValue =
      timeToExpiry <= 0
        ? calculateIntrinsicValue(spotPrice, leg.strike, leg.optionType)
        : calculateBlackScholesPrice({
            spotPrice,
            strikePrice: leg.strike,
            timeToExpiry,
            riskFreeRate,
            volatility,
            dividendYield,
            optionType: leg.optionType,
          });

    switch (leg.position) {
      case 'long':
        return (optionValue - premium) * multiplier;
      case 'short':
        return (premium - optionValue) * multiplier;
    }
  });
}

export function calculateStockLegPnl(leg: StockLeg, priceGrid: number[]): number[] {
  const sign = positionSign(leg.position);
  return priceGrid.map((price) => sign * (price - leg.entryPrice) * leg.quantity);
}

/**
 * Underlying prices where the P&L curve crosses zero, linearly interpolated
 * between grid points, rounded to cents, unique and ascending.
 */
export function findBreakevenPoints(
  prices: number[],
  pnl: number[],
  tolerance: number = BREAKEVEN_TOLERANCE,
): number[] {
  const breakevens = new Set<number>();

  for (let i = 0; i < pnl.length - 1; i++) {
    const current = pnl[i];
    const next = pnl[i + 1];
    const crossesUp = current <= tolerance && next >= -tolerance;
    const crossesDown = current >= -tolerance && next <= tolerance;
    if (!crossesUp && !crossesDown) continue;

    const slope = next - current;
    if (Math.abs(slope) <= MIN_SLOPE) continue;

    const ratio = -current / slope;
    breakevens.add(roundToCents(prices[i] + ratio * (prices[i + 1] - prices[i])));
  }

  return [...breakevens].sort((a, b) => a - b);
}

export function calculateStrategyPnl(
  strategy: StrategyDefinition,
  priceGrid: number[],
  timeToExpiry: number,
  volatility: number,
  riskFreeRate: number = 0.05,
  dividendYield: number = 0,
): StrategyPnLResult {
  if (priceGrid.length === 0) {
    throw new InvalidInputError('Price grid must not be empty');
  }

  const pnlValues = priceGrid.map(() => 0);
  const addLeg = (legPnl: number[]) => {
    legPnl.forEach((value, i) => {
      pnlValues[i] += value;
    });
  };

  for (const leg of strategy.optionLegs) {
    addLeg(calculateOptionLegPnl(leg, priceGrid, timeToExpiry, volatility, riskFreeRate, dividendYield));
  }
  for (const leg of strategy.stockLegs) {
    addLeg(calculateStockLegPnl(leg, priceGrid));
  }

  return {
    priceGrid: [...priceGrid],
    pnlValues,
    maxProfit: maxOf(pnlValues),
    maxLoss: minOf(pnlValues),
    breakevenPoints: findBreakevenPoints(priceGrid, pnlValues),
  };
}

/** Net position Greeks: option Greeks × (±1) × quantity × 100, plus ±shares of delta per stock leg. */
export function calculateStrategyGreeks(
  strategy: StrategyDefinition,
  spotPrice: number,
  timeToExpiry: number,
  volatility: number,
  riskFreeRate: number = 0.05,
  dividendYield: number = 0,
): StrategyGreeks {
  const total: StrategyGreeks = { delta: 0, gamma: 0, theta: 0, vega: 0, rho: 0 };

  for (const leg of strategy.optionLegs) {
    const multiplier = positionSign(leg.position) * leg.quantity * CONTRACT_MULTIPLIER;
    const greeks = calculateGreeks({
      spotPrice,
      strikePrice: leg.strike,
      timeToExpiry,
      riskFreeRate,
      volatility,
      dividendYield,
      optionType: leg.optionType,
    });

    total.delta += greeks.delta * multiplier;
    total.gamma += greeks.gamma * multiplier;
    total.theta += greeks.theta * multiplier;
    total.vega += greeks.vega * multiplier;
    total.rho += greeks.rho * multiplier;
  }

  for (const leg of strategy.stockLegs) {
    total.delta += positionSign(leg.position) * leg.quantity;
  }

  return total;
}

/**
 * Signed model value of the option legs: what it costs to open the position
 * at these inputs (positive for a net debit, negative for a net credit).
 */
export function calculateStrategyValue(
  strategy: StrategyDefinition,
  spotPrice: number,
  timeToExpiry: number,
  volatility: number,
  riskFreeRate: number = 0.05,
  dividendYield: number = 0,
): number {
  return strategy.optionLegs.reduce((total, leg) => {
    const optionPrice = calculateBlackScholesPrice({
      spotPrice,
      strikePrice: leg.strike,
      timeToExpiry,
      riskFreeRate,
      volatility,
      dividendYield,
      optionType: leg.optionType,
    });
    return total + positionSign(leg.position) * optionPrice * leg.quantity * CONTRACT_MULTIPLIER;
  }, 0);
}

/** Evenly spaced prices covering `center ± rangeFraction`. */
export function buildPriceGrid(
  center: number,
  rangeFraction: number = 0.3,
  points: number = 121,
): number[] {
  if (!(center > 0)) {
    throw new InvalidInputError(`Grid center must be positive, got ${center}`);
  }
  if (!(rangeFraction > 0 && rangeFraction < 1)) {
    throw new InvalidInputError(`Grid range must be in (0, 1), got ${rangeFraction}`);
  }
  if (!Number.isInteger(points) || points < 2) {
    throw new InvalidInputError(`Grid needs at least 2 points, got ${points}`);
  }

  const low = center * (1 - rangeFraction);
  const high = center * (1 + rangeFraction);
  const step = (high - low) / (points - 1);
  return Array.from({ length: points }, (_, i) => low + i * step);
}

/** Lowest and highest grid price with positive P&L, or `null` if none. */
export function calculateProfitRange(result: StrategyPnLResult): [number, number] | null {
  const profitable = result.priceGrid.filter((_, i) => result.pnlValues[i] > 0);
  if (profitable.length === 0) {
    return null;
  }
  return [minOf(profitable), maxOf(profitable)];
}

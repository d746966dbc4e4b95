import { IsoDate } from '../common/types';
import { OptionType, PositionSide } from '../options/types';

export const STRATEGY_TYPES = [
  'long_call',
  'long_put',
  'covered_call',
  'straddle',
  'strangle',
  'bull_call_spread',
  'bear_put_spread',
  'iron_condor',
  'butterfly_spread',
] as const;

export type StrategyType = (typeof STRATEGY_TYPES)[number];

export interface OptionLeg {
  readonly kind: 'option';
  readonly optionType: OptionType;
  readonly position: PositionSide;
  readonly strike: number;
  readonly expiration: IsoDate;
  readonly quantity: number; // contracts of 100 units
  readonly premium?: number; // per unit
}

export interface StockLeg {
  readonly kind: 'stock';
  readonly position: PositionSide;
  readonly quantity: number; // shares
  readonly entryPrice: number;
}

export type StrategyLeg = OptionLeg | StockLeg;

export interface StrategyDefinition {
  readonly name: string;
  readonly strategyType: StrategyType;
  readonly optionLegs: readonly OptionLeg[];
  readonly stockLegs: readonly StockLeg[];
  readonly description: string;
  readonly createdDate: IsoDate;
}

export interface StrategyPnLResult {
  priceGrid: number[];
  pnlValues: number[];
  maxProfit: number;
  maxLoss: number;
  breakevenPoints: number[];
}

export interface StrategyGreeks {
  delta: number;
  gamma: number;
  theta: number;
  vega: number;
  rho: number;
}

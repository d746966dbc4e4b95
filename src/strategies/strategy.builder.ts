import { InvalidInputError } from '../common/errors';
import { IsoDate } from '../common/types';
import { parseIsoDate, today } from '../common/utils/date.utils';
import { OptionType, PositionSide } from '../options/types';
import {
  OptionLeg,
  StockLeg,
  StrategyDefinition,
  StrategyType,
} from './types';

interface BaseStrategyParams {
  expiration: IsoDate;
  createdDate?: IsoDate;
}

function assertQuantity(quantity: number, label: string): void {
  if (!Number.isInteger(quantity) || quantity === 0) {
    throw new InvalidInputError(`${label} quantity must be a nonzero integer, got ${quantity}`);
  }
}

function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${label} must be positive, got ${value}`);
  }
}

export function createOptionLeg(leg: Omit<OptionLeg, 'kind' | 'quantity'> & { quantity?: number }): OptionLeg {
  const quantity = leg.quantity ?? 1;
  assertPositive(leg.strike, 'Strike');
  assertQuantity(quantity, 'Option leg');
  parseIsoDate(leg.expiration);
  if (leg.premium !== undefined && (!Number.isFinite(leg.premium) || leg.premium < 0)) {
    throw new InvalidInputError(`Premium must not be negative, got ${leg.premium}`);
  }

  const optionLeg: OptionLeg = {
    kind: 'option',
    optionType: leg.optionType,
    position: leg.position,
    strike: leg.strike,
    expiration: leg.expiration,
    quantity,
    ...(leg.premium !== undefined ? { premium: leg.premium } : {}),
  };
  return Object.freeze(optionLeg);
}

export function createStockLeg(leg: Omit<StockLeg, 'kind'>): StockLeg {
  assertQuantity(leg.quantity, 'Stock leg');
  assertPositive(leg.entryPrice, 'Stock entry price');

  const stockLeg: StockLeg = {
    kind: 'stock',
    position: leg.position,
    quantity: leg.quantity,
    entryPrice: leg.entryPrice,
  };
  return Object.freeze(stockLeg);
}

export function createStrategy(definition: {
  name: string;
  strategyType: StrategyType;
  optionLegs: OptionLeg[];
  stockLegs?: StockLeg[];
  description?: string;
  createdDate?: IsoDate;
}): StrategyDefinition {
  const strategy: StrategyDefinition = {
    name: definition.name,
    strategyType: definition.strategyType,
    optionLegs: Object.freeze([...definition.optionLegs]),
    stockLegs: Object.freeze([...(definition.stockLegs ?? [])]),
    description: definition.description ?? '',
    createdDate: definition.createdDate ?? today(),
  };
  return Object.freeze(strategy);
}

function positionLabel(position: PositionSide): string {
  switch (position) {
    case 'long':
      return 'Long';
    case 'short':
      return 'Short';
  }
}

export function longCall(params: BaseStrategyParams & {
  strike: number;
  premium?: number;
  quantity?: number;
}): StrategyDefinition {
  const leg = createOptionLeg({
    optionType: 'call',
    position: 'long',
    strike: params.strike,
    expiration: params.expiration,
    quantity: params.quantity,
    premium: params.premium,
  });
  return createStrategy({
    name: `Long Call $${params.strike}`,
    strategyType: 'long_call',
    optionLegs: [leg],
    description: `Long call with $${params.strike} strike, expires ${params.expiration}`,
    createdDate: params.createdDate,
  });
}

export function longPut(params: BaseStrategyParams & {
  strike: number;
  premium?: number;
  quantity?: number;
}): StrategyDefinition {
  const leg = createOptionLeg({
    optionType: 'put',
    position: 'long',
    strike: params.strike,
    expiration: params.expiration,
    quantity: params.quantity,
    premium: params.premium,
  });
  return createStrategy({
    name: `Long Put $${params.strike}`,
    strategyType: 'long_put',
    optionLegs: [leg],
    description: `Long put with $${params.strike} strike, expires ${params.expiration}`,
    createdDate: params.createdDate,
  });
}

/** Long stock plus one short call per 100 shares. */
export function coveredCall(params: BaseStrategyParams & {
  stockPrice: number;
  callStrike: number;
  stockQuantity?: number;
  callPremium?: number;
}): StrategyDefinition {
  const stockQuantity = params.stockQuantity ?? 100;
  const stockLeg = createStockLeg({
    position: 'long',
    quantity: stockQuantity,
    entryPrice: params.stockPrice,
  });
  const callLeg = createOptionLeg({
    optionType: 'call',
    position: 'short',
    strike: params.callStrike,
    expiration: params.expiration,
    quantity: Math.floor(stockQuantity / 100),
    premium: params.callPremium,
  });
  return createStrategy({
    name: `Covered Call $${params.callStrike}`,
    strategyType: 'covered_call',
    optionLegs: [callLeg],
    stockLegs: [stockLeg],
    description: `Long ${stockQuantity} shares, short call $${params.callStrike}`,
    createdDate: params.createdDate,
  });
}

export function straddle(params: BaseStrategyParams & {
  strike: number;
  callPremium?: number;
  putPremium?: number;
  position?: PositionSide;
  quantity?: number;
}): StrategyDefinition {
  const position = params.position ?? 'long';
  const callLeg = createOptionLeg({
    optionType: 'call',
    position,
    strike: params.strike,
    expiration: params.expiration,
    quantity: params.quantity,
    premium: params.callPremium,
  });
  const putLeg = createOptionLeg({
    optionType: 'put',
    position,
    strike: params.strike,
    expiration: params.expiration,
    quantity: params.quantity,
    premium: params.putPremium,
  });
  return createStrategy({
    name: `${positionLabel(position)} Straddle $${params.strike}`,
    strategyType: 'straddle',
    optionLegs: [callLeg, putLeg],
    description: `${positionLabel(position)} straddle at $${params.strike} strike`,
    createdDate: params.createdDate,
  });
}

export function strangle(params: BaseStrategyParams & {
  callStrike: number;
  putStrike: number;
  callPremium?: number;
  putPremium?: number;
  position?: PositionSide;
  quantity?: number;
}): StrategyDefinition {
  const position = params.position ?? 'long';
  const callLeg = createOptionLeg({
    optionType: 'call',
    position,
    strike: params.callStrike,
    expiration: params.expiration,
    quantity: params.quantity,
    premium: params.callPremium,
  });
  const putLeg = createOptionLeg({
    optionType: 'put',
    position,
    strike: params.putStrike,
    expiration: params.expiration,
    quantity: params.quantity,
    premium: params.putPremium,
  });
  return createStrategy({
    name: `${positionLabel(position)} Strangle $${params.putStrike}/$${params.callStrike}`,
    strategyType: 'strangle',
    optionLegs: [callLeg, putLeg],
    description: `${positionLabel(position)} strangle: $${params.putStrike} put / $${params.callStrike} call`,
    createdDate: params.createdDate,
  });
}

export function bullCallSpread(params: BaseStrategyParams & {
  longStrike: number;
  shortStrike: number;
  longPremium?: number;
  shortPremium?: number;
}): StrategyDefinition {
  const longLeg = createOptionLeg({
    optionType: 'call',
    position: 'long',
    strike: params.longStrike,
    expiration: params.expiration,
    premium: params.longPremium,
  });
  const shortLeg = createOptionLeg({
    optionType: 'call',
    position: 'short',
    strike: params.shortStrike,
    expiration: params.expiration,
    premium: params.shortPremium,
  });
  return createStrategy({
    name: `Bull Call Spread $${params.longStrike}/$${params.shortStrike}`,
    strategyType: 'bull_call_spread',
    optionLegs: [longLeg, shortLeg],
    description: `Long $${params.longStrike} call, short $${params.shortStrike} call`,
    createdDate: params.createdDate,
  });
}

export function bearPutSpread(params: BaseStrategyParams & {
  longStrike: number;
  shortStrike: number;
  longPremium?: number;
  shortPremium?: number;
}): StrategyDefinition {
  const longLeg = createOptionLeg({
    optionType: 'put',
    position: 'long',
    strike: params.longStrike,
    expiration: params.expiration,
    premium: params.longPremium,
  });
  const shortLeg = createOptionLeg({
    optionType: 'put',
    position: 'short',
    strike: params.shortStrike,
    expiration: params.expiration,
    premium: params.shortPremium,
  });
  return createStrategy({
    name: `Bear Put Spread $${params.longStrike}/$${params.shortStrike}`,
    strategyType: 'bear_put_spread',
    optionLegs: [longLeg, shortLeg],
    description: `Long $${params.longStrike} put, short $${params.shortStrike} put`,
    createdDate: params.createdDate,
  });
}

export function ironCondor(params: BaseStrategyParams & {
  putLongStrike: number;
  putShortStrike: number;
  callShortStrike: number;
  callLongStrike: number;
  putLongPremium?: number;
  putShortPremium?: number;
  callShortPremium?: number;
  callLongPremium?: number;
}): StrategyDefinition {
  const { expiration } = params;
  const strikes = `${params.putLongStrike}/${params.putShortStrike}/${params.callShortStrike}/${params.callLongStrike}`;
  return createStrategy({
    name: `Iron Condor $${params.putLongStrike}/$${params.putShortStrike}/$${params.callShortStrike}/$${params.callLongStrike}`,
    strategyType: 'iron_condor',
    optionLegs: [
      createOptionLeg({ optionType: 'put', position: 'long', strike: params.putLongStrike, expiration, premium: params.putLongPremium }),
      createOptionLeg({ optionType: 'put', position: 'short', strike: params.putShortStrike, expiration, premium: params.putShortPremium }),
      createOptionLeg({ optionType: 'call', position: 'short', strike: params.callShortStrike, expiration, premium: params.callShortPremium }),
      createOptionLeg({ optionType: 'call', position: 'long', strike: params.callLongStrike, expiration, premium: params.callLongPremium }),
    ],
    description: `Iron condor with strikes ${strikes}`,
    createdDate: params.createdDate,
  });
}

/** Long one lower wing, short two at the center, long one upper wing. */
export function butterflySpread(params: BaseStrategyParams & {
  centerStrike: number;
  wingWidth: number;
  optionType?: OptionType;
}): StrategyDefinition {
  const optionType = params.optionType ?? 'call';
  const { expiration, centerStrike } = params;
  assertPositive(params.wingWidth, 'Wing width');
  const lowerStrike = centerStrike - params.wingWidth;
  const upperStrike = centerStrike + params.wingWidth;
  const label = optionType === 'call' ? 'Call' : 'Put';

  return createStrategy({
    name: `${label} Butterfly $${lowerStrike}/$${centerStrike}/$${upperStrike}`,
    strategyType: 'butterfly_spread',
    optionLegs: [
      createOptionLeg({ optionType, position: 'long', strike: lowerStrike, expiration }),
      createOptionLeg({ optionType, position: 'short', strike: centerStrike, expiration, quantity: 2 }),
      createOptionLeg({ optionType, position: 'long', strike: upperStrike, expiration }),
    ],
    description: `${label} butterfly centered at $${centerStrike} with $${params.wingWidth} wings`,
    createdDate: params.createdDate,
  });
}

const STRIKE_COUNTS: Record<StrategyType, number> = {
  long_call: 1,
  long_put: 1,
  covered_call: 1,
  straddle: 1,
  strangle: 2,
  bull_call_spread: 2,
  bear_put_spread: 2,
  iron_condor: 4,
  butterfly_spread: 2,
};

/**
 * Builds a strategy from its type and an ordered strike list:
 * strangle `[put, call]`, spreads `[long, short]`, iron condor
 * `[putLong, putShort, callShort, callLong]`, butterfly `[center, wingWidth]`.
 */
export function createStrategyFromStrikes(
  strategyType: StrategyType,
  strikes: number[],
  expiration: IsoDate,
  options: {
    position?: PositionSide;
    optionType?: OptionType;
    stockPrice?: number;
    createdDate?: IsoDate;
  } = {},
): StrategyDefinition {
  const expected = STRIKE_COUNTS[strategyType];
  if (strikes.length !== expected) {
    throw new InvalidInputError(
      `${strategyType} needs ${expected} strike value(s), got ${strikes.length}`,
    );
  }
  const base = { expiration, createdDate: options.createdDate };

  switch (strategyType) {
    case 'long_call':
      return longCall({ ...base, strike: strikes[0] });
    case 'long_put':
      return longPut({ ...base, strike: strikes[0] });
    case 'covered_call':
      return coveredCall({ ...base, callStrike: strikes[0], stockPrice: options.stockPrice ?? strikes[0] });
    case 'straddle':
      return straddle({ ...base, strike: strikes[0], position: options.position });
    case 'strangle':
      return strangle({ ...base, putStrike: strikes[0], callStrike: strikes[1], position: options.position });
    case 'bull_call_spread':
      return bullCallSpread({ ...base, longStrike: strikes[0], shortStrike: strikes[1] });
    case 'bear_put_spread':
      return bearPutSpread({ ...base, longStrike: strikes[0], shortStrike: strikes[1] });
    case 'iron_condor':
      return ironCondor({
        ...base,
        putLongStrike: strikes[0],
        putShortStrike: strikes[1],
        callShortStrike: strikes[2],
        callLongStrike: strikes[3],
      });
    case 'butterfly_spread':
      return butterflySpread({
        ...base,
        centerStrike: strikes[0],
        wingWidth: strikes[1],
        optionType: options.optionType,
      });
  }
}

import { IsoDate } from '../common/types';

export type OptionType = 'call' | 'put';

export type PositionSide = 'long' | 'short';

export interface OptionPricingParams {
  spotPrice: number;
  strikePrice: number;
  timeToExpiry: number; // years
  riskFreeRate: number;
  volatility: number; // annualized
  dividendYield?: number;
  optionType: OptionType;
}

export type ImpliedVolatilityParams = Omit<OptionPricingParams, 'volatility'>;

export interface GreeksResult {
  price: number;
  delta: number;
  gamma: number;
  theta: number; // per calendar day
  vega: number; // per 1% volatility move
  rho: number; // per 1% rate move
}

export interface OptionQuote {
  strike: number;
  optionType: OptionType;
  expiration: IsoDate;
  bid?: number;
  ask?: number;
  last?: number;
  delta?: number;
  gamma?: number;
  theta?: number;
  vega?: number;
  impliedVolatility?: number;
}

export interface OptionQuoteWithIv extends OptionQuote {
  timeToExpiry: number;
  ivBid: number | null;
  ivAsk: number | null;
  ivMid: number | null;
}

export interface IvTermStructurePoint {
  expiration: IsoDate;
  iv: number;
}

export interface IvSurfacePoint {
  strike: number;
  timeToExpiry: number;
  expiration: IsoDate;
  iv: number;
  optionType: OptionType;
  moneyness: number; // strike / spot
  logMoneyness: number;
}

export interface IvSkew {
  callIvAvg: number | null;
  putIvAvg: number | null;
  atmIv: number | null;
  otmPutIv: number | null;
  otmCallIv: number | null;
  putCallSkew: number | null;
  smileSkew: number | null;
}

export interface IvRankData {
  currentIv: number;
  ivHigh: number;
  ivLow: number;
  ivRank: number;
  ivPercentile: number;
}

export interface IvHvComparison {
  currentIv: number;
  historicalVolatility: number;
  ivHvRatio: number;
  ivHvSpread: number;
  relativeValue: 'expensive' | 'cheap' | 'fair';
}

export interface IvSummary {
  mean: number;
  median: number;
  std: number;
  min: number;
  max: number;
  count: number;
}

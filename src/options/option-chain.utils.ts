import { InvalidInputError, UndeterminableVolatilityError } from '../common/errors';
import { IsoDate } from '../common/types';
import { maxOf, mean, median, minOf, standardDeviation } from '../common/utils/common.utils';
import { calculateImpliedVolatility, timeToExpiration } from './options.utils';
import {
  IvHvComparison,
  IvRankData,
  IvSkew,
  IvSummary,
  IvSurfacePoint,
  IvTermStructurePoint,
  OptionQuote,
  OptionQuoteWithIv,
} from './types';

const MIN_IV_RANK_OBSERVATIONS = 20;

function impliedVolatilityOrNull(
  marketPrice: number,
  quote: OptionQuote,
  spotPrice: number,
  timeToExpiry: number,
  riskFreeRate: number,
): number | null {
  try {
    return calculateImpliedVolatility(marketPrice, {
      spotPrice,
      strikePrice: quote.strike,
      timeToExpiry,
      riskFreeRate,
      optionType: quote.optionType,
    });
  } catch (error) {
    if (error instanceof UndeterminableVolatilityError) {
      return null;
    }
    throw error;
  }
}

/**
 * Adds bid, ask and mid implied volatility to every quote of a chain snapshot.
 * Expired quotes and sides without a usable price get `null`.
 */
export function calculateChainImpliedVolatility(
  chain: OptionQuote[],
  spotPrice: number,
  asOf: IsoDate,
  riskFreeRate: number = 0.05,
): OptionQuoteWithIv[] {
  return chain.map((quote) => {
    const timeToExpiry = timeToExpiration(quote.expiration, asOf);
    const result: OptionQuoteWithIv = {
      ...quote,
      timeToExpiry,
      ivBid: null,
      ivAsk: null,
      ivMid: null,
    };

    if (timeToExpiry <= 0) {
      return result;
    }

    if (quote.bid !== undefined && quote.bid > 0) {
      result.ivBid = impliedVolatilityOrNull(quote.bid, quote, spotPrice, timeToExpiry, riskFreeRate);
    }
    if (quote.ask !== undefined && quote.ask > 0) {
      result.ivAsk = impliedVolatilityOrNull(quote.ask, quote, spotPrice, timeToExpiry, riskFreeRate);
    }
    if (quote.bid !== undefined && quote.ask !== undefined && quote.ask > quote.bid) {
      const midPrice = (quote.bid + quote.ask) / 2;
      result.ivMid = impliedVolatilityOrNull(midPrice, quote, spotPrice, timeToExpiry, riskFreeRate);
    }

    return result;
  });
}

function midIvs(quotes: OptionQuoteWithIv[]): number[] {
  return quotes
    .map((quote) => quote.ivMid)
    .filter((iv): iv is number => iv !== null);
}

function meanOrNull(values: number[]): number | null {
  return values.length > 0 ? mean(values) : null;
}

export function calculateIvTermStructure(chainWithIv: OptionQuoteWithIv[]): IvTermStructurePoint[] {
  const byExpiration = new Map<IsoDate, OptionQuoteWithIv[]>();
  for (const quote of chainWithIv) {
    const group = byExpiration.get(quote.expiration) ?? [];
    group.push(quote);
    byExpiration.set(quote.expiration, group);
  }

  const points: IvTermStructurePoint[] = [];
  for (const [expiration, quotes] of byExpiration) {
    const ivs = midIvs(quotes);
    if (ivs.length > 0) {
      points.push({ expiration, iv: mean(ivs) });
    }
  }

  return points.sort((a, b) => a.expiration.localeCompare(b.expiration));
}

/** One point per quote with a mid IV, for plotting IV against strike and expiry. */
export function buildIvSurface(chainWithIv: OptionQuoteWithIv[], spotPrice: number): IvSurfacePoint[] {
  if (!(spotPrice > 0)) {
    throw new InvalidInputError(`Spot price must be positive, got ${spotPrice}`);
  }

  const points: IvSurfacePoint[] = [];
  for (const quote of chainWithIv) {
    if (quote.ivMid === null) continue;
    const moneyness = quote.strike / spotPrice;
    points.push({
      strike: quote.strike,
      timeToExpiry: quote.timeToExpiry,
      expiration: quote.expiration,
      iv: quote.ivMid,
      optionType: quote.optionType,
      moneyness,
      logMoneyness: Math.log(moneyness),
    });
  }
  return points;
}

/**
 * Put/call skew for one expiration (or the whole chain). OTM means strikes
 * below spot for puts and above spot for calls.
 */
export function analyzeIvSkew(
  chainWithIv: OptionQuoteWithIv[],
  spotPrice: number,
  expiration?: IsoDate,
): IvSkew {
  const quotes = expiration
    ? chainWithIv.filter((quote) => quote.expiration === expiration)
    : chainWithIv;

  const calls = quotes.filter((quote) => quote.optionType === 'call');
  const puts = quotes.filter((quote) => quote.optionType === 'put');

  const callIvAvg = meanOrNull(midIvs(calls));
  const putIvAvg = meanOrNull(midIvs(puts));

  let atmIv: number | null = null;
  const withIv = quotes.filter((quote) => quote.ivMid !== null);
  if (withIv.length > 0) {
    const closest = withIv.reduce((best, quote) =>
      Math.abs(quote.strike - spotPrice) < Math.abs(best.strike - spotPrice) ? quote : best,
    );
    atmIv = closest.ivMid;
  }

  const otmPutIv = meanOrNull(midIvs(puts.filter((quote) => quote.strike < spotPrice)));
  const otmCallIv = meanOrNull(midIvs(calls.filter((quote) => quote.strike > spotPrice)));

  return {
    callIvAvg,
    putIvAvg,
    atmIv,
    otmPutIv,
    otmCallIv,
    putCallSkew: putIvAvg !== null && callIvAvg !== null ? putIvAvg - callIvAvg : null,
    smileSkew: otmPutIv !== null && otmCallIv !== null ? otmPutIv - otmCallIv : null,
  };
}

/**
 * IV rank and IV percentile of `currentIv` against the most recent
 * `lookback` observations. Needs at least 20 observations.
 */
export function calculateIvRank(
  history: number[],
  currentIv: number,
  lookback: number = 252,
): IvRankData | null {
  if (!Number.isFinite(currentIv)) {
    return null;
  }

  const recent = history.slice(-lookback).filter((iv) => Number.isFinite(iv));
  if (recent.length < MIN_IV_RANK_OBSERVATIONS) {
    return null;
  }

  const ivHigh = maxOf(recent);
  const ivLow = minOf(recent);
  const ivRank = ivHigh !== ivLow ? ((currentIv - ivLow) / (ivHigh - ivLow)) * 100 : 50;
  const ivPercentile = (recent.filter((iv) => iv < currentIv).length / recent.length) * 100;

  return {
    currentIv,
    ivHigh,
    ivLow,
    ivRank: Math.max(0, Math.min(100, ivRank)),
    ivPercentile: Math.max(0, Math.min(100, ivPercentile)),
  };
}

export function compareIvToHv(currentIv: number, historicalVolatility: number): IvHvComparison | null {
  if (!Number.isFinite(currentIv) || !Number.isFinite(historicalVolatility) || historicalVolatility <= 0) {
    return null;
  }

  const ivHvRatio = currentIv / historicalVolatility;
  let relativeValue: IvHvComparison['relativeValue'] = 'fair';
  if (ivHvRatio > 1.2) {
    relativeValue = 'expensive';
  } else if (ivHvRatio < 0.8) {
    relativeValue = 'cheap';
  }

  return {
    currentIv,
    historicalVolatility,
    ivHvRatio,
    ivHvSpread: currentIv - historicalVolatility,
    relativeValue,
  };
}

export function summarizeChainIv(chainWithIv: OptionQuoteWithIv[]): IvSummary | null {
  const ivs = midIvs(chainWithIv);
  if (ivs.length === 0) {
    return null;
  }

  return {
    mean: mean(ivs),
    median: median(ivs),
    std: standardDeviation(ivs),
    min: minOf(ivs),
    max: maxOf(ivs),
    count: ivs.length,
  };
}

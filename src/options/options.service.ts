import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from '../config/configuration';
import { UndeterminableVolatilityError } from '../common/errors';
import { IsoDate } from '../common/types';
import { PricingCache, hashPricingInputs } from '../cache/pricing-cache';
import {
  GreeksResult,
  ImpliedVolatilityParams,
  OptionPricingParams,
  OptionQuote,
  OptionQuoteWithIv,
  OptionType,
} from './types';
import {
  calculateBlackScholesPrice,
  calculateGreeks,
  calculateImpliedVolatility,
  calculateIntrinsicValue,
  calculateTimeValue,
  daysToYears,
  timeToExpiration,
} from './options.utils';
import { calculateChainImpliedVolatility } from './option-chain.utils';

type PricingRequest = Omit<OptionPricingParams, 'riskFreeRate' | 'dividendYield'> &
  Partial<Pick<OptionPricingParams, 'riskFreeRate' | 'dividendYield'>>;

@Injectable()
export class OptionsService {
  private readonly logger = new Logger(OptionsService.name);
  private readonly riskFreeRate: number;
  private readonly dividendYield: number;

  constructor(private readonly configService: ConfigService<Config, true>) {
    const pricing = this.configService.get('pricing', { infer: true });
    this.riskFreeRate = pricing.riskFreeRate;
    this.dividendYield = pricing.dividendYield;
  }

  private withDefaults(request: PricingRequest): OptionPricingParams {
    return {
      ...request,
      riskFreeRate: request.riskFreeRate ?? this.riskFreeRate,
      dividendYield: request.dividendYield ?? this.dividendYield,
    };
  }

  price(request: PricingRequest): number {
    return calculateBlackScholesPrice(this.withDefaults(request));
  }

  /**
   * Price and Greeks. When a cache is supplied, results are looked up and
   * stored under a hash of the normalized inputs.
   */
  greeks(request: PricingRequest, cache?: PricingCache<GreeksResult>): GreeksResult {
    const params = this.withDefaults(request);
    if (!cache) {
      return calculateGreeks(params);
    }

    const key = hashPricingInputs(params);
    const cached = cache.get(key);
    if (cached) {
      return cached;
    }
    const greeks = calculateGreeks(params);
    cache.set(key, greeks);
    return greeks;
  }

  /** Implied volatility, or `null` when it cannot be determined. */
  impliedVolatility(
    marketPrice: number,
    request: Omit<PricingRequest, 'volatility'>,
  ): number | null {
    const params: ImpliedVolatilityParams = {
      ...request,
      riskFreeRate: request.riskFreeRate ?? this.riskFreeRate,
      dividendYield: request.dividendYield ?? this.dividendYield,
    };
    try {
      return calculateImpliedVolatility(marketPrice, params);
    } catch (error) {
      if (error instanceof UndeterminableVolatilityError) {
        this.logger.debug(
          `IV undeterminable for ${params.optionType} K=${params.strikePrice}: ${error.message}`,
        );
        return null;
      }
      throw error;
    }
  }

  chainImpliedVolatility(
    chain: OptionQuote[],
    spotPrice: number,
    asOf: IsoDate,
    riskFreeRate: number = this.riskFreeRate,
  ): OptionQuoteWithIv[] {
    const result = calculateChainImpliedVolatility(chain, spotPrice, asOf, riskFreeRate);
    const resolved = result.filter((quote) => quote.ivMid !== null).length;
    this.logger.log(`Chain IV computed for ${chain.length} quotes (${resolved} with mid IV)`);
    return result;
  }

  estimateOptionPremium(
    spotPrice: number,
    strikePrice: number,
    daysToExpiry: number,
    optionType: OptionType,
    volatility: number,
    riskFreeRate?: number,
  ): {
    premium: number;
    delta: number;
    theta: number;
    intrinsicValue: number;
    timeValue: number;
  } {
    const pricingParams = this.withDefaults({
      spotPrice,
      strikePrice,
      timeToExpiry: daysToYears(daysToExpiry),
      riskFreeRate,
      volatility,
      optionType,
    });
    const greeks = calculateGreeks(pricingParams);
    return {
      premium: greeks.price,
      delta: greeks.delta,
      theta: greeks.theta,
      intrinsicValue: calculateIntrinsicValue(spotPrice, strikePrice, optionType),
      timeValue: calculateTimeValue(pricingParams),
    };
  }

  timeToExpiration(expiration: IsoDate, asOf: IsoDate): number {
    return timeToExpiration(expiration, asOf);
  }
}

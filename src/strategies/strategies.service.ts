import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from '../config/configuration';
import { IsoDate } from '../common/types';
import { OptionType, PositionSide } from '../options/types';
import { StrategyDefinition, StrategyGreeks, StrategyPnLResult, StrategyType } from './types';
import { createStrategyFromStrikes } from './strategy.builder';
import {
  buildPriceGrid,
  calculateProfitRange,
  calculateStrategyGreeks,
  calculateStrategyPnl,
  calculateStrategyValue,
} from './strategy-pnl.utils';

export interface StrategyAnalysisParams {
  spotPrice: number;
  timeToExpiry: number;
  volatility: number;
  riskFreeRate?: number;
  priceGrid?: number[];
}

export interface StrategyAnalysis {
  strategy: StrategyDefinition;
  pnl: StrategyPnLResult;
  greeks: StrategyGreeks;
  netValue: number;
  profitRange: [number, number] | null;
}

@Injectable()
export class StrategiesService {
  private readonly logger = new Logger(StrategiesService.name);
  private readonly riskFreeRate: number;
  private readonly dividendYield: number;

  constructor(private readonly configService: ConfigService<Config, true>) {
    const pricing = this.configService.get('pricing', { infer: true });
    this.riskFreeRate = pricing.riskFreeRate;
    this.dividendYield = pricing.dividendYield;
  }

  build(
    strategyType: StrategyType,
    strikes: number[],
    expiration: IsoDate,
    options: { position?: PositionSide; optionType?: OptionType; stockPrice?: number } = {},
  ): StrategyDefinition {
    const strategy = createStrategyFromStrikes(strategyType, strikes, expiration, options);
    this.logger.debug(`Built ${strategy.name} (${strategy.optionLegs.length} option legs)`);
    return strategy;
  }

  pnl(strategy: StrategyDefinition, params: StrategyAnalysisParams): StrategyPnLResult {
    const grid = params.priceGrid ?? buildPriceGrid(params.spotPrice);
    return calculateStrategyPnl(
      strategy,
      grid,
      params.timeToExpiry,
      params.volatility,
      params.riskFreeRate ?? this.riskFreeRate,
      this.dividendYield,
    );
  }

  greeks(strategy: StrategyDefinition, params: StrategyAnalysisParams): StrategyGreeks {
    return calculateStrategyGreeks(
      strategy,
      params.spotPrice,
      params.timeToExpiry,
      params.volatility,
      params.riskFreeRate ?? this.riskFreeRate,
      this.dividendYield,
    );
  }

  value(strategy: StrategyDefinition, params: StrategyAnalysisParams): number {
    return calculateStrategyValue(
      strategy,
      params.spotPrice,
      params.timeToExpiry,
      params.volatility,
      params.riskFreeRate ?? this.riskFreeRate,
      this.dividendYield,
    );
  }

  /** P&L curve, Greeks, net value and profitable range in one pass. */
  analyze(strategy: StrategyDefinition, params: StrategyAnalysisParams): StrategyAnalysis {
    const pnl = this.pnl(strategy, params);
    const analysis: StrategyAnalysis = {
      strategy,
      pnl,
      greeks: this.greeks(strategy, params),
      netValue: this.value(strategy, params),
      profitRange: calculateProfitRange(pnl),
    };

    this.logger.log(
      `${strategy.name}: max profit ${pnl.maxProfit.toFixed(2)}, max loss ${pnl.maxLoss.toFixed(2)}, ` +
        `breakevens [${pnl.breakevenPoints.join(', ')}]`,
    );
    return analysis;
  }
}

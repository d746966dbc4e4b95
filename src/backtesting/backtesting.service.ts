import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from '../config/configuration';
import { InsufficientDataError, InvalidInputError } from '../common/errors';
import { IsoDate, OhlcBar } from '../common/types';
import { addDays } from '../common/utils/date.utils';
import { timeToExpiration } from '../options/options.utils';
import { StrategyDefinition } from '../strategies/types';
import { calculateSimpleVolatility, sortBarsByDate } from '../volatility/volatility.utils';
import { BacktestConfig, BacktestResult, TradeDistribution, TradeResult } from './types';
import {
  analyzeTradeDistribution,
  calculateBacktestMetrics,
  calculateCommission,
  findEntryBarIndex,
  nearestExpiration,
  resolveStrategyForEntry,
  validateBacktestConfig,
} from './backtest.utils';
import { StrategyTrade } from './strategy-trade.position';

@Injectable()
export class BacktestingService {
  private readonly logger = new Logger(BacktestingService.name);

  constructor(private readonly configService: ConfigService<Config, true>) {}

  /** Backtest parameters from the `backtest` and `pricing` config sections. */
  getConfiguredBacktestConfig(): BacktestConfig {
    const settings = this.configService.get('backtest', { infer: true });
    const pricing = this.configService.get('pricing', { infer: true });
    return {
      startDate: settings.startDate,
      endDate: settings.endDate,
      entryFrequencyDays: settings.entryFrequencyDays,
      profitTarget: settings.profitTarget,
      stopLoss: settings.stopLoss,
      minDaysToExpiry: settings.minDaysToExpiry,
      riskFreeRate: pricing.riskFreeRate,
      volatilityLookbackDays: settings.volatilityLookbackDays,
      commissionPerContract: settings.commissionPerContract,
    };
  }

  /**
   * Walks forward from `startDate`, opening one trade every
   * `entryFrequencyDays` and holding it until an exit rule fires or the
   * nearest leg expires.
   */
  run(priceData: OhlcBar[], template: StrategyDefinition, config: BacktestConfig): BacktestResult {
    validateBacktestConfig(config);
    if (template.optionLegs.length === 0) {
      throw new InvalidInputError(`Strategy ${template.name} has no option legs to backtest`);
    }

    const bars = sortBarsByDate(priceData);
    this.logger.log(
      `Backtesting ${template.name} from ${config.startDate} to ${config.endDate} over ${bars.length} bars`,
    );

    const trades: TradeResult[] = [];
    let candidateDate = config.startDate;
    while (candidateDate <= config.endDate) {
      const trade = this.simulateTrade(bars, template, candidateDate, config);
      if (trade) {
        trades.push(trade);
      }
      candidateDate = addDays(candidateDate, config.entryFrequencyDays);
    }

    const metrics = calculateBacktestMetrics(trades);
    this.logger.log(
      `Backtest complete: ${metrics.totalTrades} trades, win rate ${(metrics.winRate * 100).toFixed(1)}%, ` +
        `total return ${metrics.totalReturn.toFixed(2)}%`,
    );

    return { config, trades, ...metrics };
  }

  distribution(result: BacktestResult): TradeDistribution | null {
    return analyzeTradeDistribution(result.trades);
  }

  private simulateTrade(
    bars: OhlcBar[],
    template: StrategyDefinition,
    candidateDate: IsoDate,
    config: BacktestConfig,
  ): TradeResult | null {
    const entryIndex = findEntryBarIndex(bars, candidateDate, config.endDate);
    if (entryIndex === -1) {
      return null;
    }
    const entryBar = bars[entryIndex];

    let entryVolatility: number;
    try {
      entryVolatility = calculateSimpleVolatility(
        bars.slice(0, entryIndex + 1),
        config.volatilityLookbackDays,
      ).volatility;
    } catch (error) {
      if (error instanceof InsufficientDataError) {
        this.logger.debug(`Skipping entry ${entryBar.date}: ${error.message}`);
        return null;
      }
      throw error;
    }

    const strategy = resolveStrategyForEntry(template, entryBar.close, entryBar.date);
    const expiration = nearestExpiration(strategy);
    if (expiration === null || timeToExpiration(expiration, entryBar.date) <= 0) {
      this.logger.debug(`Skipping entry ${entryBar.date}: strategy already expired`);
      return null;
    }

    const trade = new StrategyTrade(
      strategy,
      expiration,
      entryBar.date,
      entryBar.close,
      entryVolatility,
      config.riskFreeRate,
    );
    const commission = calculateCommission(strategy, config.commissionPerContract);

    for (let i = entryIndex + 1; i < bars.length && bars[i].date <= expiration; i++) {
      trade.updateDaily(bars[i]);
      const exitReason = trade.checkExit(config);
      if (exitReason) {
        return this.closeTrade(trade, exitReason, commission);
      }
    }

    return this.closeTrade(trade, 'expiration', commission);
  }

  private closeTrade(
    trade: StrategyTrade,
    exitReason: TradeResult['exitReason'],
    commission: number,
  ): TradeResult {
    const result = trade.close(exitReason, commission);
    this.logger.debug(
      `Trade ${result.entryDate} -> ${result.exitDate} (${exitReason}): pnl ${result.pnl.toFixed(2)}`,
    );
    return result;
  }
}

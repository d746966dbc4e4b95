import { IsoDate, OhlcBar } from '../common/types';
import { daysBetween } from '../common/utils/date.utils';
import { timeToExpiration } from '../options/options.utils';
import { StrategyDefinition, StrategyGreeks } from '../strategies/types';
import {
  calculateStrategyGreeks,
  calculateStrategyPnl,
  calculateStrategyValue,
} from '../strategies/strategy-pnl.utils';
import { BacktestConfig, ExitReason, TradeResult } from './types';
import { calculateCapitalAtRisk } from './backtest.utils';

/**
 * State of one open strategy during a backtest. Entry cost (the option legs'
 * net debit) and Greeks are fixed on construction; each `updateDaily` marks
 * every leg, stock included, at the day's close with the entry volatility.
 */
export class StrategyTrade {
  readonly entryCost: number;
  readonly entryGreeks: StrategyGreeks;

  private currentDate: IsoDate;
  private currentPrice: number;
  private currentTimeToExpiry: number;
  private currentPnl = 0;
  private maxFavorable = 0;
  private maxAdverse = 0;

  constructor(
    private readonly strategy: StrategyDefinition,
    private readonly expiration: IsoDate,
    readonly entryDate: IsoDate,
    readonly entryPrice: number,
    readonly entryVolatility: number,
    private readonly riskFreeRate: number,
  ) {
    this.currentDate = entryDate;
    this.currentPrice = entryPrice;
    this.currentTimeToExpiry = timeToExpiration(expiration, entryDate);

    this.entryCost = calculateStrategyValue(
      strategy,
      entryPrice,
      this.currentTimeToExpiry,
      entryVolatility,
      riskFreeRate,
    );
    this.entryGreeks = calculateStrategyGreeks(
      strategy,
      entryPrice,
      this.currentTimeToExpiry,
      entryVolatility,
      riskFreeRate,
    );
  }

  /** Marks the position to the bar's close and returns the pre-commission P&L. */
  updateDaily(bar: OhlcBar): number {
    this.currentDate = bar.date;
    this.currentPrice = bar.close;
    this.currentTimeToExpiry = timeToExpiration(this.expiration, bar.date);

    // Resolved option legs carry no premium, so their leg P&L is their value
    const { pnlValues } = calculateStrategyPnl(
      this.strategy,
      [bar.close],
      this.currentTimeToExpiry,
      this.entryVolatility,
      this.riskFreeRate,
    );
    this.currentPnl = pnlValues[0] - this.entryCost;
    this.maxFavorable = Math.max(this.maxFavorable, this.currentPnl);
    this.maxAdverse = Math.min(this.maxAdverse, this.currentPnl);
    return this.currentPnl;
  }

  /** First exit rule that fires for the current mark, checked in priority order. */
  checkExit(config: BacktestConfig): ExitReason | null {
    const costBasis = Math.abs(this.entryCost);
    if (
      config.profitTarget !== undefined &&
      this.currentPnl > 0 &&
      this.currentPnl >= costBasis * config.profitTarget
    ) {
      return 'profit_target';
    }
    if (
      config.stopLoss !== undefined &&
      this.currentPnl < 0 &&
      this.currentPnl <= -costBasis * config.stopLoss
    ) {
      return 'stop_loss';
    }
    if (this.currentTimeToExpiry <= config.minDaysToExpiry / 365) {
      return 'days_to_expiry';
    }
    return null;
  }

  close(exitReason: ExitReason, commission: number): TradeResult {
    const pnl = this.currentPnl - commission;
    return {
      entryDate: this.entryDate,
      exitDate: this.currentDate,
      entryPrice: this.entryPrice,
      exitPrice: this.currentPrice,
      strategyCost: this.entryCost,
      pnl,
      pnlPercent: (pnl / calculateCapitalAtRisk(this.entryCost)) * 100,
      daysHeld: daysBetween(this.entryDate, this.currentDate),
      exitReason,
      maxFavorableExcursion: this.maxFavorable,
      maxAdverseExcursion: this.maxAdverse,
      entryVolatility: this.entryVolatility,
      entryDelta: this.entryGreeks.delta,
      entryTheta: this.entryGreeks.theta,
      commission,
    };
  }
}

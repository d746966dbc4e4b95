import { InvalidInputError } from '../common/errors';
import { OhlcBar, IsoDate } from '../common/types';
import {
  maxOf,
  mean,
  median,
  minOf,
  percentile,
  roundToIncrement,
  standardDeviation,
} from '../common/utils/common.utils';
import { parseIsoDate } from '../common/utils/date.utils';
import { createOptionLeg, createStockLeg, createStrategy } from '../strategies/strategy.builder';
import { StrategyDefinition } from '../strategies/types';
import { BacktestConfig, BacktestMetrics, TradeDistribution, TradeResult } from './types';

export const RELATIVE_STRIKE_THRESHOLD = 10;
export const STRIKE_INCREMENT = 0.5;
export const MIN_CREDIT_CAPITAL_AT_RISK = 1000;
const DAYS_PER_YEAR = 365;

export const DEFAULT_BACKTEST_CONFIG: Omit<BacktestConfig, 'startDate' | 'endDate'> = {
  entryFrequencyDays: 30,
  minDaysToExpiry: 5,
  riskFreeRate: 0.05,
  volatilityLookbackDays: 30,
  commissionPerContract: 1.0,
};

export function createBacktestConfig(
  config: Pick<BacktestConfig, 'startDate' | 'endDate'> & Partial<BacktestConfig>,
): BacktestConfig {
  return { ...DEFAULT_BACKTEST_CONFIG, ...config };
}

export function validateBacktestConfig(config: BacktestConfig): void {
  const start = parseIsoDate(config.startDate);
  const end = parseIsoDate(config.endDate);
  if (end.isBefore(start)) {
    throw new InvalidInputError(`End date ${config.endDate} is before start date ${config.startDate}`);
  }
  if (!Number.isInteger(config.entryFrequencyDays) || config.entryFrequencyDays < 1) {
    throw new InvalidInputError(
      `Entry frequency must be a positive number of days, got ${config.entryFrequencyDays}`,
    );
  }
  if (!Number.isInteger(config.volatilityLookbackDays) || config.volatilityLookbackDays < 2) {
    throw new InvalidInputError(
      `Volatility lookback must be at least 2 days, got ${config.volatilityLookbackDays}`,
    );
  }
  if (config.minDaysToExpiry < 0 || config.commissionPerContract < 0) {
    throw new InvalidInputError('Minimum days to expiry and commission must not be negative');
  }
  for (const [label, value] of [
    ['Profit target', config.profitTarget],
    ['Stop loss', config.stopLoss],
  ] as const) {
    if (value !== undefined && !(value > 0)) {
      throw new InvalidInputError(`${label} must be positive when set, got ${value}`);
    }
  }
}

/**
 * Template strikes up to 10 are multipliers of spot (1.0 = at the money),
 * larger ones are absolute. Either way the result is rounded to $0.50.
 */
export function resolveStrike(strike: number, spotPrice: number): number {
  const absolute = strike <= RELATIVE_STRIKE_THRESHOLD ? spotPrice * strike : strike;
  return roundToIncrement(absolute, STRIKE_INCREMENT);
}

/** Concrete strategy for one entry; the template is left untouched. */
export function resolveStrategyForEntry(
  template: StrategyDefinition,
  spotPrice: number,
  entryDate: IsoDate,
): StrategyDefinition {
  return createStrategy({
    name: template.name,
    strategyType: template.strategyType,
    description: template.description,
    createdDate: entryDate,
    optionLegs: template.optionLegs.map((leg) =>
      createOptionLeg({
        optionType: leg.optionType,
        position: leg.position,
        strike: resolveStrike(leg.strike, spotPrice),
        expiration: leg.expiration,
        quantity: leg.quantity,
      }),
    ),
    stockLegs: template.stockLegs.map((leg) =>
      createStockLeg({
        position: leg.position,
        quantity: leg.quantity,
        entryPrice: spotPrice,
      }),
    ),
  });
}

/** Index of the first bar dated on/after `candidateDate` and not after `endDate`, or -1. */
export function findEntryBarIndex(bars: OhlcBar[], candidateDate: IsoDate, endDate: IsoDate): number {
  const index = bars.findIndex((bar) => bar.date >= candidateDate);
  if (index === -1 || bars[index].date > endDate) {
    return -1;
  }
  return index;
}

export function nearestExpiration(strategy: StrategyDefinition): IsoDate | null {
  if (strategy.optionLegs.length === 0) {
    return null;
  }
  return strategy.optionLegs
    .map((leg) => leg.expiration)
    .reduce((nearest, expiration) => (expiration < nearest ? expiration : nearest));
}

/** Round-trip commission: every contract pays once to open and once to close. */
export function calculateCommission(strategy: StrategyDefinition, commissionPerContract: number): number {
  const contracts = strategy.optionLegs.reduce((sum, leg) => sum + Math.abs(leg.quantity), 0);
  return commissionPerContract * contracts * 2;
}

export function calculateCapitalAtRisk(strategyCost: number): number {
  return strategyCost > 0
    ? Math.abs(strategyCost)
    : Math.max(Math.abs(strategyCost), MIN_CREDIT_CAPITAL_AT_RISK);
}

/** Deepest fall of cumulative P&L below its running peak (0 or negative). */
export function calculateMaxDrawdown(pnls: number[]): number {
  let cumulative = 0;
  let peak = -Infinity;
  let maxDrawdown = 0;
  for (const pnl of pnls) {
    cumulative += pnl;
    peak = Math.max(peak, cumulative);
    maxDrawdown = Math.min(maxDrawdown, cumulative - peak);
  }
  return maxDrawdown;
}

/** Per-trade Sharpe on `pnlPercent`, annualized by the mean holding period. */
export function calculateSharpeRatio(trades: TradeResult[]): number {
  if (trades.length < 2) return 0;

  const returns = trades.map((trade) => trade.pnlPercent);
  const stdReturn = standardDeviation(returns, 0);
  const avgDaysHeld = mean(trades.map((trade) => trade.daysHeld));
  if (stdReturn === 0 || avgDaysHeld <= 0) return 0;

  const tradesPerYear = DAYS_PER_YEAR / avgDaysHeld;
  return (mean(returns) * Math.sqrt(tradesPerYear)) / stdReturn;
}

export function calculateProfitFactor(trades: TradeResult[]): number {
  const grossWins = trades.filter((t) => t.pnl > 0).reduce((sum, t) => sum + t.pnl, 0);
  const grossLosses = Math.abs(trades.filter((t) => t.pnl < 0).reduce((sum, t) => sum + t.pnl, 0));
  return grossLosses > 0 ? grossWins / grossLosses : Infinity;
}

export function calculateBacktestMetrics(trades: TradeResult[]): BacktestMetrics {
  if (trades.length === 0) {
    return {
      totalReturn: 0,
      winRate: 0,
      avgWin: 0,
      avgLoss: 0,
      maxDrawdown: 0,
      sharpeRatio: 0,
      profitFactor: 0,
      totalCommissions: 0,
      totalTrades: 0,
      winningTrades: 0,
      losingTrades: 0,
    };
  }

  const pnls = trades.map((trade) => trade.pnl);
  const wins = pnls.filter((pnl) => pnl > 0);
  const losses = pnls.filter((pnl) => pnl < 0);
  const totalPnl = pnls.reduce((sum, pnl) => sum + pnl, 0);
  const avgCapital = mean(trades.map((trade) => Math.abs(trade.strategyCost)));

  return {
    totalReturn: avgCapital > 0 ? (totalPnl / avgCapital) * 100 : 0,
    winRate: wins.length / trades.length,
    avgWin: mean(wins),
    avgLoss: mean(losses),
    maxDrawdown: calculateMaxDrawdown(pnls),
    sharpeRatio: calculateSharpeRatio(trades),
    profitFactor: calculateProfitFactor(trades),
    totalCommissions: trades.reduce((sum, trade) => sum + trade.commission, 0),
    totalTrades: trades.length,
    winningTrades: wins.length,
    losingTrades: losses.length,
  };
}

/** Bias-adjusted sample skewness; 0 below three values or with no spread. */
function sampleSkewness(values: number[]): number {
  const n = values.length;
  const std = standardDeviation(values);
  if (n < 3 || std === 0) return 0;
  const avg = mean(values);
  const sumCubes = values.reduce((sum, v) => sum + Math.pow((v - avg) / std, 3), 0);
  return (n / ((n - 1) * (n - 2))) * sumCubes;
}

/** Bias-adjusted sample excess kurtosis; 0 below four values or with no spread. */
function sampleExcessKurtosis(values: number[]): number {
  const n = values.length;
  const std = standardDeviation(values);
  if (n < 4 || std === 0) return 0;
  const avg = mean(values);
  const sumFourths = values.reduce((sum, v) => sum + Math.pow((v - avg) / std, 4), 0);
  return (
    ((n * (n + 1)) / ((n - 1) * (n - 2) * (n - 3))) * sumFourths -
    (3 * Math.pow(n - 1, 2)) / ((n - 2) * (n - 3))
  );
}

export function analyzeTradeDistribution(trades: TradeResult[]): TradeDistribution | null {
  if (trades.length === 0) {
    return null;
  }
  const pnls = trades.map((trade) => trade.pnl);
  return {
    totalTrades: trades.length,
    meanPnl: mean(pnls),
    medianPnl: median(pnls),
    stdPnl: standardDeviation(pnls, 0),
    minPnl: minOf(pnls),
    maxPnl: maxOf(pnls),
    percentile25: percentile(pnls, 25),
    percentile75: percentile(pnls, 75),
    skewness: sampleSkewness(pnls),
    kurtosis: sampleExcessKurtosis(pnls),
  };
}

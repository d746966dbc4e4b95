import { IsoDate } from '../common/types';

export interface BacktestConfig {
  startDate: IsoDate;
  endDate: IsoDate;
  entryFrequencyDays: number;
  profitTarget?: number; // fraction of |cost|, e.g. 0.5 = 50%
  stopLoss?: number; // fraction of |cost|
  minDaysToExpiry: number;
  riskFreeRate: number;
  volatilityLookbackDays: number;
  commissionPerContract: number;
}

export type ExitReason = 'profit_target' | 'stop_loss' | 'days_to_expiry' | 'expiration';

export interface TradeResult {
  entryDate: IsoDate;
  exitDate: IsoDate;
  entryPrice: number; // underlying
  exitPrice: number; // underlying
  strategyCost: number; // net debit (+) or credit (-)
  pnl: number; // after commission
  pnlPercent: number;
  daysHeld: number;
  exitReason: ExitReason;
  maxFavorableExcursion: number;
  maxAdverseExcursion: number;
  entryVolatility: number;
  entryDelta: number;
  entryTheta: number;
  commission: number;
}

export interface BacktestMetrics {
  totalReturn: number;
  winRate: number;
  avgWin: number;
  avgLoss: number;
  maxDrawdown: number;
  sharpeRatio: number;
  profitFactor: number;
  totalCommissions: number;
  totalTrades: number;
  winningTrades: number;
  losingTrades: number;
}

export interface BacktestResult extends BacktestMetrics {
  config: BacktestConfig;
  trades: TradeResult[];
}

export interface TradeDistribution {
  totalTrades: number;
  meanPnl: number;
  medianPnl: number;
  stdPnl: number;
  minPnl: number;
  maxPnl: number;
  percentile25: number;
  percentile75: number;
  skewness: number;
  kurtosis: number;
}

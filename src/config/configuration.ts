import 'dotenv/config';
import { OptionType, PositionSide } from '../options/types';
import { STRATEGY_TYPES, StrategyType } from '../strategies/types';

function getBooleanEnv(key: string, defaultValue: boolean): boolean {
  return typeof process.env[key] === 'string'
  ? process.env[key] === 'true'
  : defaultValue;
}

function getNumberEnv(key: string, defaultValue: number): number {
  const value = process.env[key];
  return value !== undefined && value !== '' ? parseFloat(value) : defaultValue;
}

function getChoiceEnv<T extends string>(key: string, choices: readonly T[], defaultValue: T): T {
  const value = process.env[key];
  return choices.find((choice) => choice === value) ?? defaultValue;
}

function getOptionalNumberEnv(key: string): number | undefined {
  const value = process.env[key];
  return value !== undefined && value !== '' ? parseFloat(value) : undefined;
}

export interface BacktestSettings {
  priceDataPath: string;
  symbol: string;
  strategyType: StrategyType;
  strikes: number[];
  position: PositionSide;
  butterflyOptionType: OptionType;
  expiration: string;
  startDate: string;
  endDate: string;
  entryFrequencyDays: number;
  profitTarget?: number;
  stopLoss?: number;
  minDaysToExpiry: number;
  volatilityLookbackDays: number;
  commissionPerContract: number;
}

export interface Config {
  pricing: {
    riskFreeRate: number;
    dividendYield: number;
    cacheTtlSeconds: number;
    cacheMaxEntries: number;
  };
  backtest: BacktestSettings;
  exports: {
    enabled: boolean;
    path: string;
  };
}

export default (): Config => ({
  pricing: {
    riskFreeRate: getNumberEnv('RISK_FREE_RATE', 0.05),
    dividendYield: getNumberEnv('DIVIDEND_YIELD', 0),
    cacheTtlSeconds: getNumberEnv('PRICING_CACHE_TTL_SECONDS', 300),
    cacheMaxEntries: getNumberEnv('PRICING_CACHE_MAX_ENTRIES', 500),
  },
  backtest: {
    priceDataPath: process.env.BACKTEST_PRICE_DATA_PATH || 'data/sample-prices.csv',
    symbol: process.env.BACKTEST_SYMBOL || 'SAMPLE',
    strategyType: getChoiceEnv<StrategyType>('BACKTEST_STRATEGY', STRATEGY_TYPES, 'straddle'),
    strikes: (process.env.BACKTEST_STRIKES || '1.0')
      .split(',')
      .filter((strike) => strike.trim() !== '')
      .map((strike) => parseFloat(strike)),
    position: getChoiceEnv<PositionSide>('BACKTEST_POSITION', ['long', 'short'], 'long'),
    butterflyOptionType: getChoiceEnv<OptionType>('BACKTEST_BUTTERFLY_OPTION_TYPE', ['call', 'put'], 'call'),
    expiration: process.env.BACKTEST_EXPIRATION || '2024-12-20',
    startDate: process.env.BACKTEST_START_DATE || '2024-03-01',
    endDate: process.env.BACKTEST_END_DATE || '2024-11-29',
    entryFrequencyDays: getNumberEnv('BACKTEST_ENTRY_FREQUENCY_DAYS', 30),
    profitTarget: getOptionalNumberEnv('BACKTEST_PROFIT_TARGET'),
    stopLoss: getOptionalNumberEnv('BACKTEST_STOP_LOSS'),
    minDaysToExpiry: getNumberEnv('BACKTEST_MIN_DAYS_TO_EXPIRY', 5),
    volatilityLookbackDays: getNumberEnv('BACKTEST_VOLATILITY_LOOKBACK_DAYS', 30),
    commissionPerContract: getNumberEnv('BACKTEST_COMMISSION_PER_CONTRACT', 1.0),
  },
  exports: {
    enabled: getBooleanEnv('EXPORTS_ENABLED', false),
    path: process.env.EXPORTS_PATH || 'exports',
  },
});

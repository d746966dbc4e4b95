import * as Joi from 'joi';
import { STRATEGY_TYPES } from '../strategies/types';

export const validationSchema = Joi.object({
  RISK_FREE_RATE: Joi.number().default(0.05),
  DIVIDEND_YIELD: Joi.number().min(0).default(0),
  PRICING_CACHE_TTL_SECONDS: Joi.number().integer().min(0).default(300),
  PRICING_CACHE_MAX_ENTRIES: Joi.number().integer().min(1).default(500),
  BACKTEST_PRICE_DATA_PATH: Joi.string(),
  BACKTEST_SYMBOL: Joi.string(),
  BACKTEST_STRATEGY: Joi.string().valid(...STRATEGY_TYPES).default('straddle'),
  BACKTEST_STRIKES: Joi.string().pattern(/^\s*\d+(\.\d+)?(\s*,\s*\d+(\.\d+)?)*\s*$/),
  BACKTEST_POSITION: Joi.string().valid('long', 'short').default('long'),
  BACKTEST_BUTTERFLY_OPTION_TYPE: Joi.string().valid('call', 'put').default('call'),
  BACKTEST_EXPIRATION: Joi.string().isoDate(),
  BACKTEST_START_DATE: Joi.string().isoDate(),
  BACKTEST_END_DATE: Joi.string().isoDate(),
  BACKTEST_ENTRY_FREQUENCY_DAYS: Joi.number().integer().min(1).default(30),
  BACKTEST_PROFIT_TARGET: Joi.number().positive().empty(''),
  BACKTEST_STOP_LOSS: Joi.number().positive().empty(''),
  BACKTEST_MIN_DAYS_TO_EXPIRY: Joi.number().integer().min(0).default(5),
  BACKTEST_VOLATILITY_LOOKBACK_DAYS: Joi.number().integer().min(2).default(30),
  BACKTEST_COMMISSION_PER_CONTRACT: Joi.number().min(0).default(1),
  EXPORTS_ENABLED: Joi.boolean().default(false),
  EXPORTS_PATH: Joi.string(),
});

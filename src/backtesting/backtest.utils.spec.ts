import { InvalidInputError } from '../common/errors';
import { OhlcBar } from '../common/types';
import { butterflySpread, createOptionLeg, createStrategy, createStrategyFromStrikes } from '../strategies/strategy.builder';
import { TradeResult } from './types';
import {
  analyzeTradeDistribution,
  calculateBacktestMetrics,
  calculateCapitalAtRisk,
  calculateCommission,
  calculateMaxDrawdown,
  createBacktestConfig,
  findEntryBarIndex,
  nearestExpiration,
  resolveStrategyForEntry,
  resolveStrike,
  validateBacktestConfig,
} from './backtest.utils';

function makeTrade(overrides: Partial<TradeResult>): TradeResult {
  return {
    entryDate: '2024-03-01',
    exitDate: '2024-03-31',
    entryPrice: 100,
    exitPrice: 100,
    strategyCost: 1000,
    pnl: 0,
    pnlPercent: 0,
    daysHeld: 30,
    exitReason: 'expiration',
    maxFavorableExcursion: 0,
    maxAdverseExcursion: 0,
    entryVolatility: 0.2,
    entryDelta: 0,
    entryTheta: 0,
    commission: 4,
    ...overrides,
  };
}

const TRADES: TradeResult[] = [
  makeTrade({ pnl: 100, pnlPercent: 10 }),
  makeTrade({ pnl: -50, pnlPercent: -5 }),
  makeTrade({ pnl: 200, pnlPercent: 20 }),
  makeTrade({ pnl: -100, pnlPercent: -10 }),
];

describe('backtest.utils', () => {
  describe('resolveStrike', () => {
    it('should treat small strikes as multipliers of spot', () => {
      expect(resolveStrike(1.0, 101.3)).toBe(101.5);
      expect(resolveStrike(1.05, 100)).toBe(105);
      expect(resolveStrike(0.95, 101.3)).toBe(96);
      expect(resolveStrike(1.0, 100.25)).toBe(100.5);
    });

    it('should keep absolute strikes, rounded to fifty cents', () => {
      expect(resolveStrike(150, 101.3)).toBe(150);
      expect(resolveStrike(152.3, 101.3)).toBe(152.5);
    });
  });

  describe('resolveStrategyForEntry', () => {
    it('should resolve strikes and stock entry price without touching the template', () => {
      const template = createStrategyFromStrikes('covered_call', [1.0], '2024-12-20');

      const strategy = resolveStrategyForEntry(template, 101.3, '2024-03-01');

      expect(strategy.optionLegs[0].strike).toBe(101.5);
      expect(strategy.stockLegs[0].entryPrice).toBe(101.3);
      expect(strategy.createdDate).toBe('2024-03-01');
      expect(template.optionLegs[0].strike).toBe(1.0);
      expect(template.stockLegs[0].entryPrice).toBe(1.0);
    });
  });

  describe('findEntryBarIndex', () => {
    const bars: OhlcBar[] = [
      { date: '2024-01-02', close: 100 },
      { date: '2024-01-03', close: 101 },
      { date: '2024-01-05', close: 102 },
    ];

    it('should pick the first bar on or after the candidate date', () => {
      expect(findEntryBarIndex(bars, '2024-01-03', '2024-01-31')).toBe(1);
      expect(findEntryBarIndex(bars, '2024-01-04', '2024-01-31')).toBe(2);
    });

    it('should not enter after the end date or past the data', () => {
      expect(findEntryBarIndex(bars, '2024-01-04', '2024-01-04')).toBe(-1);
      expect(findEntryBarIndex(bars, '2024-02-01', '2024-02-28')).toBe(-1);
    });
  });

  describe('nearestExpiration and calculateCommission', () => {
    it('should use the earliest leg expiration', () => {
      const calendar = createStrategy({
        name: 'Calendar',
        strategyType: 'long_call',
        optionLegs: [
          createOptionLeg({ optionType: 'call', position: 'long', strike: 100, expiration: '2024-12-20' }),
          createOptionLeg({ optionType: 'call', position: 'short', strike: 100, expiration: '2024-11-15' }),
        ],
      });

      expect(nearestExpiration(calendar)).toBe('2024-11-15');
      expect(nearestExpiration(createStrategy({ name: 'Empty', strategyType: 'long_call', optionLegs: [] }))).toBeNull();
    });

    it('should charge every contract on entry and exit', () => {
      const fly = butterflySpread({ centerStrike: 100, wingWidth: 5, expiration: '2024-12-20' });

      expect(calculateCommission(fly, 1)).toBe(8);
      expect(calculateCommission(fly, 0.65)).toBeCloseTo(5.2, 10);
    });
  });

  describe('calculateCapitalAtRisk', () => {
    it('should use the debit, or at least 1000 for credits', () => {
      expect(calculateCapitalAtRisk(500)).toBe(500);
      expect(calculateCapitalAtRisk(-300)).toBe(1000);
      expect(calculateCapitalAtRisk(-2500)).toBe(2500);
      expect(calculateCapitalAtRisk(0)).toBe(1000);
    });
  });

  describe('calculateMaxDrawdown', () => {
    it('should measure the deepest fall below the running peak', () => {
      expect(calculateMaxDrawdown([100, -50, 200, -100])).toBe(-100);
      expect(calculateMaxDrawdown([10, 20, 30])).toBe(0);
      expect(calculateMaxDrawdown([-100])).toBe(0);
    });
  });

  describe('calculateBacktestMetrics', () => {
    it('should aggregate trade results', () => {
      const metrics = calculateBacktestMetrics(TRADES);

      expect(metrics.totalTrades).toBe(4);
      expect(metrics.winningTrades).toBe(2);
      expect(metrics.losingTrades).toBe(2);
      expect(metrics.winRate).toBe(0.5);
      expect(metrics.avgWin).toBe(150);
      expect(metrics.avgLoss).toBe(-75);
      expect(metrics.totalReturn).toBeCloseTo(15, 10);
      expect(metrics.maxDrawdown).toBe(-100);
      expect(metrics.sharpeRatio).toBeCloseTo(1.0969488, 6);
      expect(metrics.profitFactor).toBe(2);
      expect(metrics.totalCommissions).toBe(16);
    });

    it('should return zeros without trades', () => {
      expect(calculateBacktestMetrics([])).toEqual({
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
      });
    });

    it('should report an infinite profit factor without losers', () => {
      const metrics = calculateBacktestMetrics([makeTrade({ pnl: 50 }), makeTrade({ pnl: 25 })]);

      expect(metrics.profitFactor).toBe(Infinity);
      expect(metrics.avgLoss).toBe(0);
    });

    it('should not compute a Sharpe ratio for one trade or zero holding time', () => {
      expect(calculateBacktestMetrics([TRADES[0]]).sharpeRatio).toBe(0);
      expect(calculateBacktestMetrics(TRADES.map((trade) => ({ ...trade, daysHeld: 0 }))).sharpeRatio).toBe(0);
    });
  });

  describe('analyzeTradeDistribution', () => {
    it('should describe the P&L distribution', () => {
      const distribution = analyzeTradeDistribution(TRADES);

      expect(distribution).not.toBeNull();
      expect(distribution?.meanPnl).toBe(37.5);
      expect(distribution?.medianPnl).toBe(25);
      expect(distribution?.stdPnl).toBeCloseTo(119.2424002, 6);
      expect(distribution?.minPnl).toBe(-100);
      expect(distribution?.maxPnl).toBe(200);
      expect(distribution?.percentile25).toBe(-62.5);
      expect(distribution?.percentile75).toBe(125);
      expect(distribution?.skewness).toBeCloseTo(0.3232314, 6);
      expect(distribution?.kurtosis).toBeCloseTo(-3.032967, 5);
    });

    it('should return null without trades', () => {
      expect(analyzeTradeDistribution([])).toBeNull();
    });
  });

  describe('config helpers', () => {
    it('should fill defaults and validate ranges', () => {
      const config = createBacktestConfig({ startDate: '2024-01-01', endDate: '2024-06-30' });

      expect(config.entryFrequencyDays).toBe(30);
      expect(config.commissionPerContract).toBe(1);
      expect(() => validateBacktestConfig(config)).not.toThrow();
      expect(() => validateBacktestConfig({ ...config, endDate: '2023-12-31' })).toThrow(InvalidInputError);
      expect(() => validateBacktestConfig({ ...config, entryFrequencyDays: 0 })).toThrow(InvalidInputError);
      expect(() => validateBacktestConfig({ ...config, stopLoss: 0 })).toThrow(InvalidInputError);
    });
  });
});

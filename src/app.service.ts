import * as path from 'path';
import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Config } from './config/configuration';
import { InvalidInputError } from './common/errors';
import { OhlcBar } from './common/types';
import { ExportUtils } from './common/utils/report-export.utils';
import { TtlPricingCache } from './cache/pricing-cache';
import { GreeksResult } from './options/types';
import { OptionsService } from './options/options.service';
import { VolatilityService } from './volatility/volatility.service';
import { StrategiesService } from './strategies/strategies.service';
import { BacktestingService } from './backtesting/backtesting.service';
import { BacktestResult } from './backtesting/types';
import { resolveStrike } from './backtesting/backtest.utils';
import { loadPriceDataFile, validatePriceBars } from './market-data/price-data.utils';

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);
  private readonly greeksCache: TtlPricingCache<GreeksResult>;

  constructor(
    private readonly optionsService: OptionsService,
    private readonly volatilityService: VolatilityService,
    private readonly strategiesService: StrategiesService,
    private readonly backtestingService: BacktestingService,
    private readonly configService: ConfigService<Config, true>,
  ) {
    const { cacheTtlSeconds, cacheMaxEntries } = this.configService.get('pricing', { infer: true });
    this.greeksCache = new TtlPricingCache<GreeksResult>(
      Math.round(cacheTtlSeconds * 1000),
      cacheMaxEntries,
    );
  }

  loadPriceData(): OhlcBar[] {
    const { priceDataPath } = this.configService.get('backtest', { infer: true });
    const bars = loadPriceDataFile(path.resolve(process.cwd(), priceDataPath));

    const validation = validatePriceBars(bars);
    if (validation.warnings.length > 0) {
      this.logger.warn(
        `${validation.warnings.length} price data warning(s), first: ${validation.warnings[0]}`,
      );
    }
    if (!validation.isValid) {
      throw new InvalidInputError(
        `Invalid price data in ${priceDataPath}: ${validation.errors.slice(0, 5).join('; ')}`,
      );
    }

    this.logger.log(`Loaded ${bars.length} bars from ${priceDataPath}`);
    return bars;
  }

  /**
   * Loads the configured price series, reports its volatility, backtests
   * the configured strategy template and prints (optionally exports) the trades.
   */
  runConfiguredBacktest(): BacktestResult {
    const settings = this.configService.get('backtest', { infer: true });
    const exportsConfig = this.configService.get('exports', { infer: true });
    const bars = this.loadPriceData();

    this.logVolatility(bars);

    const template = this.strategiesService.build(
      settings.strategyType,
      settings.strikes,
      settings.expiration,
      { position: settings.position, optionType: settings.butterflyOptionType },
    );
    const result = this.backtestingService.run(
      bars,
      template,
      this.backtestingService.getConfiguredBacktestConfig(),
    );

    const exportUtils = new ExportUtils(
      'backtests',
      path.resolve(process.cwd(), exportsConfig.path),
    );
    exportUtils.printConsoleTable(result.trades);
    this.logSummary(result);

    if (exportsConfig.enabled && result.trades.length > 0) {
      exportUtils.exportTsv(
        exportUtils.generateTsvFilename([settings.symbol, settings.strategyType]),
        result.trades,
      );
    }

    return result;
  }

  private logVolatility(bars: OhlcBar[]): void {
    const { byPeriod, hvPercentile } = this.volatilityService.metrics(bars);
    const periods = Object.entries(byPeriod)
      .map(([days, vol]) => `${days}d ${(vol * 100).toFixed(1)}%`)
      .join(', ');
    this.logger.log(`Historical volatility: ${periods || 'n/a'}`);
    if (hvPercentile !== null) {
      this.logger.log(`30d volatility percentile: ${hvPercentile.toFixed(1)}`);
    }

    const hv30 = byPeriod[30];
    const lastBar = bars[bars.length - 1];
    const { expiration } = this.configService.get('backtest', { infer: true });
    const timeToExpiry = this.optionsService.timeToExpiration(expiration, lastBar.date);
    if (hv30 === undefined || timeToExpiry <= 0) {
      return;
    }

    const atmGreeks = this.optionsService.greeks(
      {
        spotPrice: lastBar.close,
        strikePrice: resolveStrike(1.0, lastBar.close),
        timeToExpiry,
        volatility: hv30,
        optionType: 'call',
      },
      this.greeksCache,
    );
    this.logger.log(
      `ATM call on ${lastBar.date} (exp ${expiration}): price ${atmGreeks.price.toFixed(2)}, ` +
        `delta ${atmGreeks.delta.toFixed(3)}, theta ${atmGreeks.theta.toFixed(3)}`,
    );
    this.logger.debug(`Greeks cache holds ${this.greeksCache.size} entries`);
  }

  private logSummary(result: BacktestResult): void {
    const distribution = this.backtestingService.distribution(result);
    this.logger.log(`=== BACKTEST SUMMARY ===`);
    this.logger.log(
      `Trades: ${result.totalTrades} (${result.winningTrades} won, ${result.losingTrades} lost)`,
    );
    this.logger.log(`Total return: ${result.totalReturn.toFixed(2)}%`);
    this.logger.log(`Win rate: ${(result.winRate * 100).toFixed(1)}%`);
    this.logger.log(`Avg win / loss: ${result.avgWin.toFixed(2)} / ${result.avgLoss.toFixed(2)}`);
    this.logger.log(`Max drawdown: ${result.maxDrawdown.toFixed(2)}`);
    this.logger.log(`Sharpe ratio: ${result.sharpeRatio.toFixed(2)}`);
    this.logger.log(`Profit factor: ${result.profitFactor.toFixed(2)}`);
    this.logger.log(`Commissions: ${result.totalCommissions.toFixed(2)}`);
    if (distribution) {
      this.logger.log(
        `P&L median ${distribution.medianPnl.toFixed(2)}, IQR ${distribution.percentile25.toFixed(2)} to ` +
          `${distribution.percentile75.toFixed(2)}, skew ${distribution.skewness.toFixed(2)}`,
      );
    }
  }
}

import * as fs from 'fs';
import * as path from 'path';
import { TradeResult } from '../../backtesting/types';
import { logger } from './common.utils';

// Column configuration interface
interface ColumnConfig {
  name: string;
  padEnd: number;
  type: 'number' | 'string';
  fixed?: number;
  headerConsole: string;
}

export class ExportUtils {
  private readonly reportExportsPath: string;

  constructor(
    private readonly reportName: string,
    private readonly exportsPath: string = path.join(process.cwd(), 'exports'),
  ) {
    this.reportExportsPath = path.join(this.exportsPath, reportName);
  }

  private ensureExportsFolder(): void {
    if (!fs.existsSync(this.reportExportsPath)) {
      fs.mkdirSync(this.reportExportsPath, { recursive: true });
    }
  }

  // Centralized column configuration
  private getColumnConfigs(): ColumnConfig[] {
    return [
      { name: 'entry_date', padEnd: 10, type: 'string', headerConsole: 'entry' },
      { name: 'exit_date', padEnd: 10, type: 'string', headerConsole: 'exit' },
      { name: 'entry_price', padEnd: 8, type: 'number', fixed: 2, headerConsole: 'spot_in' },
      { name: 'exit_price', padEnd: 8, type: 'number', fixed: 2, headerConsole: 'spot_out' },
      { name: 'strategy_cost', padEnd: 9, type: 'number', fixed: 2, headerConsole: 'cost' },
      { name: 'pnl', padEnd: 9, type: 'number', fixed: 2, headerConsole: 'pnl' },
      { name: 'pnl_percent', padEnd: 8, type: 'number', fixed: 2, headerConsole: 'pnl%' },
      { name: 'days_held', padEnd: 4, type: 'number', fixed: 0, headerConsole: 'days' },
      { name: 'exit_reason', padEnd: 14, type: 'string', headerConsole: 'reason' },
      { name: 'max_favorable_excursion', padEnd: 8, type: 'number', fixed: 2, headerConsole: 'mfe' },
      { name: 'max_adverse_excursion', padEnd: 8, type: 'number', fixed: 2, headerConsole: 'mae' },
      { name: 'entry_volatility', padEnd: 6, type: 'number', fixed: 4, headerConsole: 'vol' },
      { name: 'entry_delta', padEnd: 7, type: 'number', fixed: 2, headerConsole: 'delta' },
      { name: 'entry_theta', padEnd: 7, type: 'number', fixed: 2, headerConsole: 'theta' },
      { name: 'commission', padEnd: 5, type: 'number', fixed: 2, headerConsole: 'comm' },
    ];
  }

  // Get headers for TSV (full names)
  getOutputHeaders(): string[] {
    return this.getColumnConfigs().map((col) => col.name);
  }

  // Print formatted header for console (short names)
  printConsoleHeader(): void {
    const headerRow = this.getColumnConfigs()
      .map((col) => col.headerConsole.padEnd(col.padEnd))
      .join(' | ');
    logger.log('');
    logger.log(headerRow);
    logger.log('-'.repeat(headerRow.length));
  }

  formatConsoleRow(trade: TradeResult): string {
    const configs = this.getColumnConfigs();
    const values = this.getTradeValues(trade);

    return configs
      .map((col, i) => {
        const value = values[i];
        const text =
          col.type === 'number' && typeof value === 'number' && col.fixed !== undefined
            ? value.toFixed(col.fixed)
            : value.toString();
        return text.padEnd(col.padEnd);
      })
      .join(' | ');
  }

  printConsoleTable(trades: TradeResult[]): void {
    this.printConsoleHeader();
    for (const trade of trades) {
      logger.log(this.formatConsoleRow(trade));
    }
  }

  // Extract values from a trade in column order
  private getTradeValues(trade: TradeResult): (string | number)[] {
    return [
      trade.entryDate,
      trade.exitDate,
      trade.entryPrice,
      trade.exitPrice,
      trade.strategyCost,
      trade.pnl,
      trade.pnlPercent,
      trade.daysHeld,
      trade.exitReason,
      trade.maxFavorableExcursion,
      trade.maxAdverseExcursion,
      trade.entryVolatility,
      trade.entryDelta,
      trade.entryTheta,
      trade.commission,
    ];
  }

  // [reportName]_parameter1_..._parameterN_YYYYMMDD_HHMMSS.tsv
  generateTsvFilename(parameters: string[], now: Date = new Date()): string {
    const timestamp = now
      .toISOString()
      .replace(/[-:]/g, '')
      .replace('T', '_')
      .substring(0, 15);

    const cleanedParameters = parameters.map((param) =>
      param.toLowerCase().replace(/-/g, '').replace(/%/g, 'pct'),
    );
    const parameterString =
      cleanedParameters.length > 0 ? `_${cleanedParameters.join('_')}` : '';
    return `${this.reportName.toLowerCase()}${parameterString}_${timestamp}.tsv`;
  }

  /** Writes one row per trade and returns the file path. */
  exportTsv(filename: string, trades: TradeResult[]): string {
    this.ensureExportsFolder();
    const fullPath = path.join(this.reportExportsPath, filename);
    const configs = this.getColumnConfigs();

    const tsvContent = [
      this.getOutputHeaders().join('\t'),
      ...trades.map((trade) => {
        const values = this.getTradeValues(trade);
        return configs
          .map((col, i) => {
            const value = values[i];
            if (col.type !== 'number' || typeof value !== 'number') {
              return value.toString();
            }
            if (col.fixed === 0) {
              return value.toFixed(0);
            }
            // Full precision for ratios, cents for money
            return col.name.includes('volatility') || col.name.includes('percent')
              ? value.toFixed(6)
              : value.toFixed(2);
          })
          .join('\t');
      }),
    ].join('\n');

    fs.writeFileSync(fullPath, tsvContent, 'utf8');
    logger.log(`Trades exported: ${path.relative(process.cwd(), fullPath)}`);
    return fullPath;
  }
}

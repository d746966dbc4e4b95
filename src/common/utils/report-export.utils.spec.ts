import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { TradeResult } from '../../backtesting/types';
import { ExportUtils } from './report-export.utils';

const TRADE: TradeResult = {
  entryDate: '2024-03-01',
  exitDate: '2024-03-15',
  entryPrice: 100,
  exitPrice: 104.5,
  strategyCost: 457.664,
  pnl: 123.456,
  pnlPercent: 26.9753,
  daysHeld: 14,
  exitReason: 'profit_target',
  maxFavorableExcursion: 130,
  maxAdverseExcursion: -20.5,
  entryVolatility: 0.2,
  entryDelta: 7.9927,
  entryTheta: -7.6334,
  commission: 4,
};

describe('ExportUtils', () => {
  let exportsDir: string;
  let exportUtils: ExportUtils;

  beforeEach(() => {
    jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    exportsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'exports-'));
    exportUtils = new ExportUtils('OptionsBacktest', exportsDir);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    fs.rmSync(exportsDir, { recursive: true, force: true });
  });

  it('should name files by report, parameters and UTC timestamp', () => {
    const filename = exportUtils.generateTsvFilename(
      ['Straddle', 'SAMPLE', 'long', '50%'],
      new Date('2024-03-15T09:05:07Z'),
    );

    expect(filename).toBe('optionsbacktest_straddle_sample_long_50pct_20240315_090507.tsv');
  });

  it('should format a console row with padded columns', () => {
    expect(exportUtils.formatConsoleRow(TRADE)).toBe(
      '2024-03-01 | 2024-03-15 | 100.00   | 104.50   | 457.66    | 123.46    | 26.98    | 14   | ' +
        'profit_target  | 130.00   | -20.50   | 0.2000 | 7.99    | -7.63   | 4.00 ',
    );
  });

  it('should write a header and one line per trade', () => {
    const fullPath = exportUtils.exportTsv('trades.tsv', [TRADE]);

    expect(fullPath).toBe(path.join(exportsDir, 'OptionsBacktest', 'trades.tsv'));
    const lines = fs.readFileSync(fullPath, 'utf8').split('\n');
    expect(lines).toHaveLength(2);
    expect(lines[0].split('\t')).toEqual(exportUtils.getOutputHeaders());
    expect(lines[1]).toBe(
      [
        '2024-03-01',
        '2024-03-15',
        '100.00',
        '104.50',
        '457.66',
        '123.46',
        '26.975300',
        '14',
        'profit_target',
        '130.00',
        '-20.50',
        '0.200000',
        '7.99',
        '-7.63',
        '4.00',
      ].join('\t'),
    );
  });

  it('should print the header and rows to stdout', () => {
    exportUtils.printConsoleTable([TRADE, TRADE]);

    // blank line, header, rule, two rows
    expect(process.stdout.write).toHaveBeenCalledTimes(5);
  });
});

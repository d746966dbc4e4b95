import * as fs from 'fs';
import { InvalidInputError } from '../common/errors';
import { OhlcBar } from '../common/types';
import { isIsoDate } from '../common/utils/date.utils';

export interface PriceDataValidation {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

const REQUIRED_COLUMNS = ['date', 'close'] as const;
const OPTIONAL_COLUMNS = ['open', 'high', 'low', 'volume'] as const;

function parseNumberCell(value: string | undefined, column: string, lineNumber: number): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  const parsed = Number(value.trim());
  if (!Number.isFinite(parsed)) {
    throw new InvalidInputError(`Line ${lineNumber}: ${column} is not a number (${value})`);
  }
  return parsed;
}

/**
 * Parses a daily OHLC CSV with a header row. `date` and `close` are
 * required columns; `open`, `high`, `low` and `volume` are read when present.
 */
export function parsePriceCsv(content: string): OhlcBar[] {
  const lines = content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
  if (lines.length === 0) {
    return [];
  }

  const header = lines[0].split(',').map((column) => column.trim().toLowerCase());
  for (const column of REQUIRED_COLUMNS) {
    if (!header.includes(column)) {
      throw new InvalidInputError(`Price CSV is missing the '${column}' column`);
    }
  }
  const columnIndex = (name: string) => header.indexOf(name);

  return lines.slice(1).map((line, i) => {
    const lineNumber = i + 2;
    const cells = line.split(',');
    const cell = (name: string) => {
      const index = columnIndex(name);
      return index === -1 ? undefined : cells[index];
    };

    const date = (cell('date') ?? '').trim();
    if (!isIsoDate(date)) {
      throw new InvalidInputError(`Line ${lineNumber}: invalid date '${date}'`);
    }
    const close = parseNumberCell(cell('close'), 'close', lineNumber);
    if (close === undefined) {
      throw new InvalidInputError(`Line ${lineNumber}: close is required`);
    }

    const bar: OhlcBar = { date, close };
    for (const column of OPTIONAL_COLUMNS) {
      const value = parseNumberCell(cell(column), column, lineNumber);
      if (value !== undefined) {
        bar[column] = value;
      }
    }
    return bar;
  });
}

/**
 * Structural checks on a price series. Errors make the series unusable;
 * warnings flag data the range estimators cannot use.
 */
export function validatePriceBars(bars: OhlcBar[]): PriceDataValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (bars.length === 0) {
    errors.push('No price data');
  }

  bars.forEach((bar, i) => {
    const prefix = `${bar.date}:`;
    if (!(bar.close > 0)) {
      errors.push(`${prefix} close must be positive`);
    }
    for (const field of ['open', 'high', 'low'] as const) {
      const value = bar[field];
      if (value !== undefined && !(value > 0)) {
        errors.push(`${prefix} ${field} must be positive`);
      }
    }
    if (bar.high !== undefined && bar.low !== undefined) {
      if (bar.high < bar.low) {
        errors.push(`${prefix} high ${bar.high} is below low ${bar.low}`);
      } else if (bar.close > bar.high || bar.close < bar.low) {
        errors.push(`${prefix} close ${bar.close} is outside the ${bar.low}-${bar.high} range`);
      }
    } else {
      warnings.push(`${prefix} missing high/low`);
    }
    if (bar.volume !== undefined && bar.volume < 0) {
      warnings.push(`${prefix} negative volume`);
    }
    if (i > 0 && bar.date <= bars[i - 1].date) {
      errors.push(`${prefix} dates must be strictly increasing (after ${bars[i - 1].date})`);
    }
  });

  return { isValid: errors.length === 0, errors, warnings };
}

export function loadPriceDataFile(filePath: string): OhlcBar[] {
  if (!fs.existsSync(filePath)) {
    throw new InvalidInputError(`Price data file not found: ${filePath}`);
  }
  return parsePriceCsv(fs.readFileSync(filePath, 'utf8'));
}

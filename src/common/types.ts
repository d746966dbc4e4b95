/** Calendar date in `YYYY-MM-DD` form. */
export type IsoDate = string;

/**
 * One row of a daily price series. Only `close` is required; the range
 * volatility estimators need `high`/`low` (and `open` for Garman-Klass).
 */
export interface OhlcBar {
  date: IsoDate;
  open?: number;
  high?: number;
  low?: number;
  close: number;
  volume?: number;
}

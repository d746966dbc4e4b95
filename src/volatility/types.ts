import { IsoDate } from '../common/types';

export const VOLATILITY_METHODS = ['simple', 'ewma', 'parkinson', 'garman-klass'] as const;

export type VolatilityMethod = (typeof VOLATILITY_METHODS)[number];

export interface VolatilityEstimate {
  method: VolatilityMethod;
  periodDays: number;
  volatility: number; // annualized
  windowStart: IsoDate;
  windowEnd: IsoDate;
  observationCount: number;
}

export interface VolatilitySurfacePoint extends VolatilityEstimate {
  annualizedVolPct: number;
}

export interface VolatilityMetrics {
  byPeriod: Record<number, number>;
  hvPercentile: number | null;
}

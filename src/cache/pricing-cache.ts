import { createHash } from 'crypto';
import { LRUCache } from 'lru-cache';
import { OptionPricingParams } from '../options/types';

/**
 * Cache handed to pricing calls by the caller. The analytics code never
 * creates one itself and never keeps one between calls.
 */
export interface PricingCache<T> {
  get(key: string): T | undefined;
  set(key: string, value: T): void;
}

/**
 * Stable key for a set of pricing inputs. Numbers are normalized to 12
 * significant digits so that float noise does not split entries.
 */
export function hashPricingInputs(params: OptionPricingParams): string {
  const normalized = [
    params.optionType,
    params.spotPrice,
    params.strikePrice,
    params.timeToExpiry,
    params.riskFreeRate,
    params.volatility,
    params.dividendYield ?? 0,
  ].map((value) => (typeof value === 'number' ? value.toPrecision(12) : value));

  return createHash('sha256').update(normalized.join('|')).digest('hex');
}

export const DEFAULT_PRICING_CACHE_MAX_ENTRIES = 500;

/** Bounded LRU cache whose entries expire `ttlMs` after they were set. */
export class TtlPricingCache<T extends {}> implements PricingCache<T> {
  private readonly cache: LRUCache<string, T>;

  constructor(ttlMs: number, maxEntries: number = DEFAULT_PRICING_CACHE_MAX_ENTRIES) {
    this.cache = new LRUCache<string, T>({
      max: maxEntries,
      ttl: ttlMs,
      ttlAutopurge: true,
      allowStale: false,
      updateAgeOnGet: false,
    });
  }

  get(key: string): T | undefined {
    return this.cache.get(key);
  }

  set(key: string, value: T): void {
    this.cache.set(key, value);
  }

  get size(): number {
    return this.cache.size;
  }
}

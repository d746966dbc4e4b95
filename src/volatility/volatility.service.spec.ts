import { Test, TestingModule } from '@nestjs/testing';
import { OhlcBar } from '../common/types';
import { addDays } from '../common/utils/date.utils';
import { VolatilityService } from './volatility.service';

function zigzagBars(count: number): OhlcBar[] {
  return Array.from({ length: count }, (_, i) => {
    const close = 100 + (i % 2 === 0 ? 0 : 2) + i * 0.1;
    return { date: addDays('2024-01-01', i), close };
  });
}

describe('VolatilityService', () => {
  let service: VolatilityService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [VolatilityService],
    }).compile();

    service = module.get<VolatilityService>(VolatilityService);
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  it('should return null instead of throwing when data is insufficient', () => {
    const bars = zigzagBars(10);

    expect(service.simple(bars, 30)).toBeNull();
    expect(service.ewma(bars, 30)).toBeNull();
    expect(service.parkinson(bars, 5)).toBeNull();
    expect(service.garmanKlass(bars, 5)).toBeNull();
    expect(service.simple(bars, 5)?.volatility).toBeGreaterThan(0);
  });

  it('should report volatility by standard period', () => {
    const metrics = service.metrics(zigzagBars(61));

    expect(Object.keys(metrics.byPeriod).map(Number)).toEqual([10, 20, 30, 60]);
    expect(metrics.hvPercentile).toBeNull();
  });

  it('should compute the 30-day percentile once a year of history exists', () => {
    const metrics = service.metrics(zigzagBars(300));

    expect(metrics.byPeriod[252]).toBeGreaterThan(0);
    expect(metrics.hvPercentile).not.toBeNull();
    expect(service.percentileRank(metrics.byPeriod[30], zigzagBars(100))).toBeNull();
  });

  it('should build surface rows for close-only data from the close-to-close estimators', () => {
    const surface = service.surface(zigzagBars(40), [10, 30]);

    expect(surface.map((row) => `${row.method}:${row.periodDays}`)).toEqual([
      'simple:10',
      'simple:30',
      'ewma:10',
      'ewma:30',
    ]);
  });
});

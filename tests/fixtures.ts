import { PriceTable } from '../src/core/types';
import { businessDaysFrom } from '../src/core/time';
import { createPriceTable } from '../src/data/priceTable';

export interface SeriesSpec {
  ticker: string;
  start: number;
  drift: number;
  wiggle: number;
  // Row indexes with no print.
  gaps?: (idx: number) => boolean;
}

// Deterministic trend plus a sine wiggle so every column has non-zero volatility.
export const trendingTable = (specs: SeriesSpec[], startDate: string, days: number): PriceTable => {
  const dates = businessDaysFrom(startDate, days);
  const closes: Record<string, Array<number | null>> = {};
  specs.forEach((spec, k) => {
    closes[spec.ticker] = dates.map((_, i) => {
      if (spec.gaps?.(i)) return null;
      return spec.start * Math.pow(1 + spec.drift, i) * (1 + spec.wiggle * Math.sin(i * (0.7 + k * 0.3)));
    });
  });
  return createPriceTable(dates, closes);
};

export const threeAssetTable = (days = 400): PriceTable =>
  trendingTable(
    [
      { ticker: 'AAA', start: 100, drift: 0.0008, wiggle: 0.01 },
      { ticker: 'BBB', start: 50, drift: 0.0003, wiggle: 0.02 },
      { ticker: 'CCC', start: 20, drift: -0.0002, wiggle: 0.015 }
    ],
    '2023-01-02',
    days
  );

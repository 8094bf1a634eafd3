import { PriceTable } from '../core/types';
import { businessDaysFrom } from '../core/time';
import { hashString, mulberry32 } from '../core/utils';
import { createPriceTable, selectColumns, sliceByDate } from './priceTable';
import { PriceDataProvider, PriceQuery } from './priceData.types';

export interface StubPriceOptions {
  tickers: string[];
  startDate: string;
  days: number;
  // Probability that a given ticker has no print on a given day.
  missingRate?: Record<string, number>;
}

const basePriceForTicker = (ticker: string): number => {
  const rng = mulberry32(hashString(ticker));
  return 20 + rng() * 180;
};

// Annualised drift between -5% and +15%, vol between 15% and 45%.
const pathParams = (ticker: string) => {
  const rng = mulberry32(hashString(`${ticker}-path`));
  return { drift: -0.05 + rng() * 0.2, vol: 0.15 + rng() * 0.3 };
};

export const generateStubPriceTable = ({ tickers, startDate, days, missingRate }: StubPriceOptions): PriceTable => {
  const dates = businessDaysFrom(startDate, days);
  const closes: Record<string, Array<number | null>> = {};
  for (const ticker of tickers) {
    const { drift, vol } = pathParams(ticker);
    const rng = mulberry32(hashString(`${ticker}-${startDate}`));
    const gapRng = mulberry32(hashString(`${ticker}-gaps`));
    const gapRate = missingRate?.[ticker] ?? 0;
    let px = basePriceForTicker(ticker);
    closes[ticker] = dates.map(() => {
      // Sum of uniforms approximates a normal shock.
      const shock = (rng() + rng() + rng() + rng() - 2) * Math.sqrt(3);
      px = Math.max(0.5, px * (1 + drift / 252 + (vol / Math.sqrt(252)) * shock));
      return gapRng() < gapRate ? null : Number(px.toFixed(4));
    });
  }
  return createPriceTable(dates, closes);
};

export class StubPriceDataProvider implements PriceDataProvider {
  readonly name = 'stub';
  private table: PriceTable | undefined;

  constructor(private readonly options: StubPriceOptions) {}

  async open(): Promise<void> {
    this.table = generateStubPriceTable(this.options);
  }

  async loadPriceTable(query: PriceQuery = {}): Promise<PriceTable> {
    if (!this.table) {
      throw new Error('Stub price provider is not open');
    }
    let table = query.tickers ? selectColumns(this.table, query.tickers) : this.table;
    if (query.from || query.to) {
      table = sliceByDate(table, query.from ?? '0000-01-01', query.to ?? '9999-12-31');
    }
    return table;
  }

  async close(): Promise<void> {
    this.table = undefined;
  }
}

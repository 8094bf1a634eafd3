import { businessDaysBetween } from '../src/core/time';
import { createPriceTable } from '../src/data/priceTable';
import { filterByCoverage } from '../src/universe/coverageFilter';

describe('coverage filter', () => {
  const dates = businessDaysBetween('2024-01-01', '2024-01-31');
  const full = dates.map((_, i) => 100 + i);

  it('spans 23 business days in January 2024', () => {
    expect(dates).toHaveLength(23);
  });

  it('retains every column of a fully covered table for any threshold up to 1', () => {
    const table = createPriceTable(dates, { AAA: full, BBB: full });
    for (const threshold of [0, 0.5, 0.95, 1]) {
      const { table: kept, report } = filterByCoverage(table, threshold);
      expect(kept.tickers).toEqual(['AAA', 'BBB']);
      expect(report.excluded).toEqual([]);
      expect(report.missingByMonth).toEqual([]);
    }
  });

  it('excludes sparse columns and reports their span and missing days per month', () => {
    const sparse = full.map((v, i) => (i < 10 ? null : v));
    const table = createPriceTable(dates, { AAA: full, BBB: full, CCC: sparse });
    const { table: kept, report } = filterByCoverage(table, 0.95);

    expect(kept.tickers).toEqual(['AAA', 'BBB']);
    expect(kept.closes.CCC).toBeUndefined();
    expect(report.retained).toEqual(['AAA', 'BBB']);
    expect(report.expectedDays).toBe(23);
    expect(report.excluded).toHaveLength(1);
    expect(report.excluded[0]).toMatchObject({
      ticker: 'CCC',
      firstDate: '2024-01-15',
      lastDate: '2024-01-31',
      observations: 13,
      expected: 23
    });
    expect(report.excluded[0].coverage).toBeCloseTo(13 / 23, 12);
    expect(report.missingByMonth).toEqual([{ month: '2024-01', ticker: 'CCC', missingDays: 10 }]);
    expect(report.log[report.log.length - 1]).toBe('1 tickers filtered out');
  });

  it('counts business days missing from the table itself', () => {
    // Only Mondays to Wednesdays are present.
    const partial = dates.filter((d) => [1, 2, 3].includes(new Date(`${d}T00:00:00Z`).getUTCDay()));
    const table = createPriceTable(partial, { AAA: partial.map(() => 10) });
    const { report } = filterByCoverage(table, 0.95);
    expect(report.retained).toEqual([]);
    expect(report.excluded[0].ticker).toBe('AAA');
  });

  it('returns an empty report for an empty table', () => {
    const { table, report } = filterByCoverage(createPriceTable([], {}), 0.95);
    expect(table.tickers).toEqual([]);
    expect(report.expectedDays).toBe(0);
  });
});

import { CoverageReport, ExcludedTicker, MissingDaysRow, PriceTable } from '../core/types';
import { businessDaysBetween, monthKey } from '../core/time';
import { selectColumns } from '../data/priceTable';

export interface CoverageResult {
  table: PriceTable;
  report: CoverageReport;
}

const pct = (ratio: number) => `${(ratio * 100).toFixed(1)}%`;

/**
 * Keeps the columns whose non-missing observations cover at least
 * `threshold` of the business days between the table's first and last date.
 */
export const filterByCoverage = (table: PriceTable, threshold = 0.95): CoverageResult => {
  const log: string[] = [`Filtering tickers with at least ${pct(threshold)} data coverage`];
  if (!table.dates.length) {
    log.push(`0 tickers retained out of ${table.tickers.length}`);
    return {
      table: selectColumns(table, []),
      report: { threshold, expectedDays: 0, retained: [], excluded: [], missingByMonth: [], log }
    };
  }

  const fullRange = businessDaysBetween(table.dates[0], table.dates[table.dates.length - 1]);
  const expected = fullRange.length;
  const retained: string[] = [];
  const excluded: ExcludedTicker[] = [];
  const missingByMonth: MissingDaysRow[] = [];

  for (const ticker of table.tickers) {
    const observed = table.dates.filter((_, i) => table.closes[ticker][i] !== null);
    const coverage = expected > 0 ? observed.length / expected : 0;
    const span = observed.length ? `${observed[0]}–${observed[observed.length - 1]}` : 'no data';
    if (observed.length > 0 && coverage >= threshold) {
      retained.push(ticker);
      log.push(`KEEP ${ticker} | ${span} | ${observed.length}/${expected} (${pct(coverage)})`);
      continue;
    }
    excluded.push({
      ticker,
      firstDate: observed[0] ?? null,
      lastDate: observed[observed.length - 1] ?? null,
      observations: observed.length,
      expected,
      coverage
    });
    log.push(`DROP ${ticker} | ${span} | ${observed.length}/${expected} days (${pct(coverage)})`);

    const observedSet = new Set(observed);
    const perMonth = new Map<string, number>();
    for (const day of fullRange) {
      if (observedSet.has(day)) continue;
      const key = monthKey(day);
      perMonth.set(key, (perMonth.get(key) ?? 0) + 1);
    }
    perMonth.forEach((missingDays, month) => missingByMonth.push({ month, ticker, missingDays }));
  }

  missingByMonth.sort((a, b) => a.month.localeCompare(b.month) || a.ticker.localeCompare(b.ticker));
  log.push(`${retained.length} tickers retained out of ${table.tickers.length}`);
  log.push(`${excluded.length} tickers filtered out`);

  return {
    table: selectColumns(table, retained),
    report: { threshold, expectedDays: expected, retained, excluded, missingByMonth, log }
  };
};

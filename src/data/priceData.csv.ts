import fs from 'fs';
import { PriceTable } from '../core/types';
import { normalizeDate } from '../core/time';
import { PriceObservation, priceTableFromObservations, selectColumns, sliceByDate } from './priceTable';
import { PriceDataProvider, PriceQuery } from './priceData.types';

const parseClose = (cell: string | undefined): number | null => {
  if (cell === undefined) return null;
  const trimmed = cell.trim();
  if (!trimmed.length || trimmed.toLowerCase() === 'nan') return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

/**
 * Accepts either a long layout (`date,ticker,close`) or a wide layout
 * (`date,AAA,BBB,...`, one column per ticker).
 */
export const parsePriceCSV = (content: string): PriceTable => {
  const lines = content
    .split(/\r?\n/)
    .map((l) => l.trim())
    .filter((l) => l.length);
  if (!lines.length) {
    return { dates: [], tickers: [], closes: {} };
  }
  const header = lines[0].split(',').map((h) => h.trim());
  const lower = header.map((h) => h.toLowerCase());
  if (lower[0] !== 'date') {
    throw new Error(`Price CSV must start with a date column, got "${header[0]}"`);
  }
  const observations: PriceObservation[] = [];
  const seen = new Set<string>();
  const isLong = lower.length === 3 && lower[1] === 'ticker' && lower[2] === 'close';
  for (const line of lines.slice(1)) {
    const cells = line.split(',');
    const date = normalizeDate(cells[0]);
    if (isLong) {
      const ticker = cells[1].trim();
      if (seen.has(`${date}|${ticker}`)) throw new Error(`Duplicate row in price CSV: ${date} ${ticker}`);
      seen.add(`${date}|${ticker}`);
      observations.push({ date, ticker, close: parseClose(cells[2]) });
      continue;
    }
    if (seen.has(date)) throw new Error(`Duplicate date in price CSV: ${date}`);
    seen.add(date);
    for (let c = 1; c < header.length; c++) {
      observations.push({ date, ticker: header[c], close: parseClose(cells[c]) });
    }
  }
  return priceTableFromObservations(observations);
};

export class CsvPriceDataProvider implements PriceDataProvider {
  readonly name = 'csv';
  private content: string | undefined;

  constructor(private readonly filePath: string) {}

  async open(): Promise<void> {
    this.content = await fs.promises.readFile(this.filePath, 'utf-8');
  }

  async loadPriceTable(query: PriceQuery = {}): Promise<PriceTable> {
    if (this.content === undefined) {
      throw new Error(`CSV price provider for ${this.filePath} is not open`);
    }
    let table = parsePriceCSV(this.content);
    if (query.tickers) table = selectColumns(table, query.tickers);
    if (query.from || query.to) {
      table = sliceByDate(table, query.from ?? '0000-01-01', query.to ?? '9999-12-31');
    }
    return table;
  }

  async close(): Promise<void> {
    this.content = undefined;
  }
}

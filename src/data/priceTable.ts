import { PriceTable, ReturnMatrix } from '../core/types';

export interface PriceObservation {
  date: string;
  ticker: string;
  close: number | null;
}

const isPrice = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value) && value > 0;

export const createPriceTable = (
  dates: string[],
  closes: Record<string, Array<number | null>>
): PriceTable => {
  for (let i = 1; i < dates.length; i++) {
    if (dates[i] <= dates[i - 1]) {
      throw new Error(`Price table dates must be strictly increasing (${dates[i - 1]} -> ${dates[i]})`);
    }
  }
  const tickers = Object.keys(closes);
  const normalized: Record<string, Array<number | null>> = {};
  for (const ticker of tickers) {
    const column = closes[ticker];
    if (column.length !== dates.length) {
      throw new Error(`Column ${ticker} has ${column.length} rows, expected ${dates.length}`);
    }
    normalized[ticker] = column.map((v) => (isPrice(v) ? v : null));
  }
  return { dates: [...dates], tickers, closes: normalized };
};

export const priceTableFromObservations = (observations: PriceObservation[]): PriceTable => {
  const dates = Array.from(new Set(observations.map((o) => o.date))).sort();
  const tickers = Array.from(new Set(observations.map((o) => o.ticker))).sort();
  const rowOf = new Map(dates.map((d, i) => [d, i]));
  const closes: Record<string, Array<number | null>> = {};
  for (const ticker of tickers) closes[ticker] = new Array<number | null>(dates.length).fill(null);
  for (const obs of observations) {
    const row = rowOf.get(obs.date);
    if (row === undefined) continue;
    closes[obs.ticker][row] = obs.close;
  }
  return createPriceTable(dates, closes);
};

export const selectColumns = (table: PriceTable, tickers: string[]): PriceTable => {
  const keep = tickers.filter((t) => table.closes[t] !== undefined);
  const closes: Record<string, Array<number | null>> = {};
  for (const t of keep) closes[t] = table.closes[t];
  return { dates: table.dates, tickers: keep, closes };
};

export const sliceByDate = (table: PriceTable, from: string, to: string): PriceTable => {
  const idx = table.dates.map((d, i) => ({ d, i })).filter(({ d }) => d >= from && d <= to);
  const first = idx.length ? idx[0].i : 0;
  const last = idx.length ? idx[idx.length - 1].i + 1 : 0;
  const closes: Record<string, Array<number | null>> = {};
  for (const t of table.tickers) closes[t] = table.closes[t].slice(first, last);
  return { dates: table.dates.slice(first, last), tickers: table.tickers, closes };
};

export const observationCount = (table: PriceTable, ticker: string): number =>
  (table.closes[ticker] ?? []).filter((v) => v !== null).length;

// Latest non-missing close on or before `date`.
export const latestPriceOnOrBefore = (table: PriceTable, ticker: string, date: string): number | undefined => {
  const column = table.closes[ticker];
  if (!column) return undefined;
  for (let i = table.dates.length - 1; i >= 0; i--) {
    if (table.dates[i] > date) continue;
    const v = column[i];
    if (v !== null) return v;
  }
  return undefined;
};

/**
 * Simple returns between consecutive available observations of each column.
 * A cell is null when the column has no print that day or no earlier print.
 * Rows where every column is null are dropped.
 */
export const toReturnMatrix = (table: PriceTable): ReturnMatrix => {
  const raw: Record<string, Array<number | null>> = {};
  for (const ticker of table.tickers) {
    const column = table.closes[ticker];
    const out: Array<number | null> = [];
    let prev: number | null = null;
    for (let i = 0; i < column.length; i++) {
      const px = column[i];
      if (i > 0) out.push(px !== null && prev !== null ? px / prev - 1 : null);
      if (px !== null) prev = px;
    }
    raw[ticker] = out;
  }
  const rowDates = table.dates.slice(1);
  const keepRows = rowDates.map((_, i) => table.tickers.some((t) => raw[t][i] !== null));
  const returns: Record<string, Array<number | null>> = {};
  for (const ticker of table.tickers) {
    returns[ticker] = raw[ticker].filter((_, i) => keepRows[i]);
  }
  return {
    dates: rowDates.filter((_, i) => keepRows[i]),
    tickers: [...table.tickers],
    returns
  };
};

export interface ReturnWindow {
  dates: string[];
  tickers: string[];
  // Dense rows, missing cells already set to 0.
  columns: Record<string, number[]>;
}

/**
 * Rows of the return matrix within [from, to]; columns without a single
 * in-window observation are dropped, remaining gaps become 0.
 */
export const sliceReturnWindow = (
  matrix: ReturnMatrix,
  from: string,
  to: string,
  restrictTo?: string[]
): ReturnWindow => {
  const rows: number[] = [];
  matrix.dates.forEach((d, i) => {
    if (d >= from && d <= to) rows.push(i);
  });
  const allowed = restrictTo ? new Set(restrictTo) : undefined;
  const tickers: string[] = [];
  const columns: Record<string, number[]> = {};
  for (const ticker of matrix.tickers) {
    if (allowed && !allowed.has(ticker)) continue;
    const cells = rows.map((r) => matrix.returns[ticker][r]);
    if (!cells.some((c) => c !== null)) continue;
    tickers.push(ticker);
    columns[ticker] = cells.map((c) => (c === null ? 0 : c));
  }
  return { dates: rows.map((r) => matrix.dates[r]), tickers, columns };
};

export const selectWindowColumns = (window: ReturnWindow, tickers: string[]): ReturnWindow => {
  const keep = tickers.filter((t) => window.columns[t] !== undefined);
  const columns: Record<string, number[]> = {};
  for (const t of keep) columns[t] = window.columns[t];
  return { dates: window.dates, tickers: keep, columns };
};

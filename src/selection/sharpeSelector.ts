import { average, stdDev } from '../core/utils';
import { ReturnWindow } from '../data/priceTable';

export interface TickerScore {
  ticker: string;
  sharpe: number;
}

export const trailingSharpe = (returns: number[]): number => {
  const sd = stdDev(returns);
  return sd > 0 ? average(returns) / sd : 0;
};

export const scoreBySharpe = (window: ReturnWindow): TickerScore[] =>
  window.tickers
    .map((ticker) => ({ ticker, sharpe: trailingSharpe(window.columns[ticker]) }))
    .sort((a, b) => b.sharpe - a.sharpe || a.ticker.localeCompare(b.ticker));

export const selectTopSharpeTickers = (window: ReturnWindow, topK: number): string[] =>
  scoreBySharpe(window)
    .slice(0, Math.max(0, topK))
    .map((s) => s.ticker);

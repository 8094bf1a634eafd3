import { CovEstimator } from '../core/types';
import { ReturnWindow } from '../data/priceTable';

export type Matrix = number[][];

const zeros = (n: number): Matrix => Array.from({ length: n }, () => new Array<number>(n).fill(0));

// Columns of the window demeaned, as T x N rows.
const centeredRows = (window: ReturnWindow): Matrix => {
  const cols = window.tickers.map((t) => window.columns[t]);
  const means = cols.map((c) => (c.length ? c.reduce((a, b) => a + b, 0) / c.length : 0));
  return window.dates.map((_, t) => cols.map((c, j) => c[t] - means[j]));
};

export const sampleCovariance = (window: ReturnWindow): Matrix => {
  const n = window.tickers.length;
  const rows = centeredRows(window);
  const cov = zeros(n);
  if (rows.length < 2) return cov;
  for (const row of rows) {
    for (let i = 0; i < n; i++) {
      for (let j = i; j < n; j++) cov[i][j] += row[i] * row[j];
    }
  }
  for (let i = 0; i < n; i++) {
    for (let j = i; j < n; j++) {
      cov[i][j] /= rows.length - 1;
      cov[j][i] = cov[i][j];
    }
  }
  return cov;
};

export interface ShrunkCovariance {
  covariance: Matrix;
  shrinkage: number;
}

/**
 * Ledoit & Wolf (2004) shrinkage of the empirical covariance towards a
 * scaled identity.
 */
export const ledoitWolfCovariance = (window: ReturnWindow): ShrunkCovariance => {
  const n = window.tickers.length;
  const rows = centeredRows(window);
  const t = rows.length;
  if (!n || !t) return { covariance: zeros(n), shrinkage: 0 };

  const s = zeros(n);
  for (const row of rows) {
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) s[i][j] += (row[i] * row[j]) / t;
    }
  }
  let mu = 0;
  for (let i = 0; i < n; i++) mu += s[i][i];
  mu /= n;

  let d2 = 0;
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) d2 += (s[i][j] - (i === j ? mu : 0)) ** 2;
  }
  d2 /= n;

  let bBar2 = 0;
  for (const row of rows) {
    for (let i = 0; i < n; i++) {
      for (let j = 0; j < n; j++) bBar2 += (row[i] * row[j] - s[i][j]) ** 2;
    }
  }
  bBar2 /= n * t * t;

  const b2 = Math.min(bBar2, d2);
  const shrinkage = d2 > 0 ? b2 / d2 : 0;
  const covariance = s.map((r, i) => r.map((v, j) => shrinkage * (i === j ? mu : 0) + (1 - shrinkage) * v));
  return { covariance, shrinkage };
};

export const estimateCovariance = (window: ReturnWindow, estimator: CovEstimator): Matrix => {
  if (estimator === 'ledoit-wolf') return ledoitWolfCovariance(window).covariance;
  return sampleCovariance(window);
};

export const portfolioVariance = (cov: Matrix, w: number[]): number => {
  let total = 0;
  for (let i = 0; i < w.length; i++) {
    for (let j = 0; j < w.length; j++) total += w[i] * cov[i][j] * w[j];
  }
  return total;
};

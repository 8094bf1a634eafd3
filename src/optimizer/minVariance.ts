import { Matrix, estimateCovariance, ledoitWolfCovariance } from './covariance';
import { projectToBounds } from './bounds';
import { OptimizerInput, PortfolioOptimizer, Weights } from './optimizer.types';

const MAX_ITERATIONS = 2000;
const TOLERANCE = 1e-12;

/**
 * Long-only minimum variance under per-name bounds, solved by projected
 * gradient descent. Works on singular covariance matrices.
 */
export const solveMinVariance = (cov: Matrix, minWeight: number, maxWeight: number): number[] => {
  const n = cov.length;
  if (!n) return [];
  let w = projectToBounds(new Array<number>(n).fill(1 / n), minWeight, maxWeight);
  // Gershgorin bound on the largest eigenvalue of 2 * cov.
  const lipschitz = 2 * Math.max(...cov.map((row) => row.reduce((acc, v) => acc + Math.abs(v), 0)));
  if (!(lipschitz > 0)) return w;
  const step = 1 / lipschitz;
  for (let iter = 0; iter < MAX_ITERATIONS; iter++) {
    const grad = cov.map((row) => 2 * row.reduce((acc, v, j) => acc + v * w[j], 0));
    const next = projectToBounds(
      w.map((wi, i) => wi - step * grad[i]),
      minWeight,
      maxWeight
    );
    const moved = next.reduce((acc, v, i) => acc + (v - w[i]) ** 2, 0);
    w = next;
    if (moved < TOLERANCE) break;
  }
  return w;
};

const toWeights = (tickers: string[], values: number[]): Weights =>
  Object.fromEntries(tickers.map((t, i) => [t, values[i]]));

export const minVarianceOptimizer: PortfolioOptimizer = {
  method: 'minvar',
  optimize: ({ window, covEstimator, minWeight, maxWeight }: OptimizerInput): Weights =>
    toWeights(window.tickers, solveMinVariance(estimateCovariance(window, covEstimator), minWeight, maxWeight))
};

// Minimum variance on the shrunk covariance whatever estimator is configured.
export const ledoitWolfOptimizer: PortfolioOptimizer = {
  method: 'ledoit-wolf',
  optimize: ({ window, minWeight, maxWeight }: OptimizerInput): Weights =>
    toWeights(window.tickers, solveMinVariance(ledoitWolfCovariance(window).covariance, minWeight, maxWeight))
};

import { OptimizerMethod } from '../core/types';
import { ReturnWindow } from '../data/priceTable';
import { hrpOptimizer } from './hrp';
import { ledoitWolfOptimizer, minVarianceOptimizer } from './minVariance';
import { OptimizeOptions, PortfolioOptimizer, Weights } from './optimizer.types';

const registry: Record<OptimizerMethod, PortfolioOptimizer> = {
  'ledoit-wolf': ledoitWolfOptimizer,
  minvar: minVarianceOptimizer,
  hrp: hrpOptimizer
};

export const getOptimizer = (method: OptimizerMethod): PortfolioOptimizer => {
  const optimizer = registry[method];
  if (!optimizer) {
    throw new Error(`Unknown optimizer method: ${String(method)}`);
  }
  return optimizer;
};

export const equalWeights = (tickers: string[]): Weights =>
  Object.fromEntries(tickers.map((t) => [t, tickers.length ? 1 / tickers.length : 0]));

/**
 * Weights for every column of `window`. The equal-weight override returns
 * 1/n per name and ignores the bounds.
 */
export const optimizePortfolio = (window: ReturnWindow, options: OptimizeOptions): Weights => {
  if (!window.tickers.length) return {};
  if (options.forceEqualWeight) return equalWeights(window.tickers);
  return getOptimizer(options.method).optimize({
    window,
    covEstimator: options.covEstimator,
    minWeight: options.minWeight,
    maxWeight: options.maxWeight
  });
};

export type { OptimizeOptions, PortfolioOptimizer, Weights } from './optimizer.types';

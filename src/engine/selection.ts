import { BacktestConfig } from '../core/types';
import { ReturnWindow, selectWindowColumns } from '../data/priceTable';
import { projectToBounds, normalize } from '../optimizer/bounds';
import { OptimizeOptions, Weights } from '../optimizer';

export type PreSelector = (window: ReturnWindow, topK: number) => string[];
export type WeightOptimizer = (window: ReturnWindow, options: OptimizeOptions) => Weights;

export interface SelectionOutcome {
  universe: string[];
  tickers: string[];
  weights: number[];
}

export const optimizeOptionsFor = (config: BacktestConfig): OptimizeOptions => ({
  method: config.optimizerMethod,
  covEstimator: config.covEstimator,
  minWeight: config.minWeight,
  maxWeight: config.maxWeight,
  forceEqualWeight: config.forceEqualWeight
});

/**
 * Top `n` by absolute weight (ties keep universe order), re-normalised to
 * sum 1 and then projected onto the weight bounds.
 */
export const pickTopWeights = (
  universe: string[],
  weights: Weights,
  n: number,
  config: BacktestConfig
): { tickers: string[]; weights: number[] } => {
  const ranked = universe
    .map((ticker, idx) => ({ ticker, idx, w: weights[ticker] ?? 0 }))
    .sort((a, b) => Math.abs(b.w) - Math.abs(a.w) || a.idx - b.idx)
    .slice(0, n);
  const normalized = normalize(ranked.map((r) => Math.abs(r.w)));
  const bounded = config.forceEqualWeight
    ? normalized
    : projectToBounds(normalized, config.minWeight, config.maxWeight);
  return { tickers: ranked.map((r) => r.ticker), weights: bounded };
};

/**
 * Pre-selection plus weighting for one lookback window, shared by the
 * rebalance loop and the next-period preview.
 */
export const selectAndWeight = (
  window: ReturnWindow,
  n: number,
  config: BacktestConfig,
  preSelect: PreSelector,
  optimize: WeightOptimizer
): SelectionOutcome => {
  const universe = preSelect(window, config.topUniverseSize);
  const options = optimizeOptionsFor(config);
  const mode = config.optimizationMode;
  switch (mode) {
    case 'select-then-optimize': {
      const tickers = universe.slice(0, n);
      const weights = optimize(selectWindowColumns(window, tickers), options);
      return { universe, tickers, weights: tickers.map((t) => weights[t] ?? 0) };
    }
    case 'optimize-subset': {
      const weights = optimize(selectWindowColumns(window, universe), options);
      return { universe, ...pickTopWeights(universe, weights, n, config) };
    }
    default: {
      const unknown: never = mode;
      throw new Error(`Unknown optimization mode: ${String(unknown)}`);
    }
  }
};

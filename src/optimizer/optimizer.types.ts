import { CovEstimator, OptimizerMethod } from '../core/types';
import { ReturnWindow } from '../data/priceTable';

export type Weights = Record<string, number>;

export interface WeightBounds {
  minWeight: number;
  maxWeight: number;
}

export interface OptimizerInput extends WeightBounds {
  window: ReturnWindow;
  covEstimator: CovEstimator;
}

export interface PortfolioOptimizer {
  readonly method: OptimizerMethod;
  optimize(input: OptimizerInput): Weights;
}

export interface OptimizeOptions extends WeightBounds {
  method: OptimizerMethod;
  covEstimator: CovEstimator;
  forceEqualWeight: boolean;
}

import { BacktestConfig, OptimizerMethod, PerformanceMetrics, PriceTable } from '../core/types';
import { resolveBacktestConfig } from '../core/schema';
import { BacktestEngine, EngineCollaborators, silentLogger } from './backtestEngine';

export interface SweepGrid {
  numStocks?: number[];
  windowDays?: number[];
  optimizerMethod?: OptimizerMethod[];
}

export interface SweepResult {
  params: Pick<BacktestConfig, 'numStocks' | 'windowDays' | 'optimizerMethod'>;
  metrics: PerformanceMetrics | undefined;
  error?: string;
}

const rankKey = (r: SweepResult) => r.metrics?.sharpe ?? Number.NEGATIVE_INFINITY;

/**
 * Runs one independent engine per grid point. A failing point is recorded
 * with its error message and does not stop the sweep.
 */
export const runSweep = (
  prices: PriceTable,
  base: Record<string, unknown>,
  grid: SweepGrid,
  collaborators: EngineCollaborators = { logger: silentLogger }
): SweepResult[] => {
  const defaults = resolveBacktestConfig(base);
  const results: SweepResult[] = [];
  for (const numStocks of grid.numStocks ?? [defaults.numStocks]) {
    for (const windowDays of grid.windowDays ?? [defaults.windowDays]) {
      for (const optimizerMethod of grid.optimizerMethod ?? [defaults.optimizerMethod]) {
        const params = { numStocks, windowDays, optimizerMethod };
        try {
          const engine = new BacktestEngine(prices, { ...base, ...params }, collaborators);
          results.push({ params, metrics: engine.run().metrics });
        } catch (err) {
          results.push({ params, metrics: undefined, error: err instanceof Error ? err.message : String(err) });
        }
      }
    }
  }
  return results.sort((a, b) => rankKey(b) - rankKey(a));
};

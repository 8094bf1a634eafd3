import { z } from 'zod';
import { BacktestConfig, RebalanceFrequency } from './types';

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = {
  startBalance: 100_000,
  numStocks: 20,
  windowDays: 200,
  minWeight: 0.01,
  maxWeight: 0.2,
  optimizerMethod: 'ledoit-wolf',
  covEstimator: 'ledoit-wolf',
  optimizationMode: 'select-then-optimize',
  forceEqualWeight: false,
  rebalanceFrequency: 'monthly',
  tradingCosts: {
    enabled: true,
    fixedCostPerTrade: 1,
    variableCostPct: 0
  },
  topUniverseSize: 100,
  universeMode: 'dynamic',
  staticTickers: [],
  coverageThreshold: 0.95,
  riskFreeRate: 0.02,
  stalePricePolicy: 'zero'
};

export const parseFrequency = (value: string | number): RebalanceFrequency => {
  if (typeof value === 'number') return { months: value };
  if (value === 'weekly' || value === 'monthly') return value;
  const custom = /^(?:custom:)?(\d+)$/.exec(value);
  if (custom) return { months: Number(custom[1]) };
  throw new Error(`Unknown rebalance frequency: ${value}`);
};

const frequencySchema = z
  .union([z.literal('weekly'), z.literal('monthly'), z.string().regex(/^(custom:)?\d+$/), z.number().int().min(1)], {
    errorMap: () => ({ message: 'Unknown rebalance frequency (weekly | monthly | custom:N)' })
  })
  .transform((val): RebalanceFrequency => parseFrequency(val))
  .refine((freq) => typeof freq === 'string' || freq.months >= 1, {
    message: 'custom rebalance frequency needs at least 1 month'
  });

const tradingCostsSchema = z.object({
  enabled: z.boolean().default(DEFAULT_BACKTEST_CONFIG.tradingCosts.enabled),
  fixedCostPerTrade: z.number().min(0).default(DEFAULT_BACKTEST_CONFIG.tradingCosts.fixedCostPerTrade),
  variableCostPct: z.number().min(0).max(1).default(DEFAULT_BACKTEST_CONFIG.tradingCosts.variableCostPct)
});

export const backtestConfigSchema = z
  .object({
    startBalance: z.number().positive().default(DEFAULT_BACKTEST_CONFIG.startBalance),
    numStocks: z.number().int().min(1).default(DEFAULT_BACKTEST_CONFIG.numStocks),
    windowDays: z.number().int().min(1).default(DEFAULT_BACKTEST_CONFIG.windowDays),
    minWeight: z.number().min(0).max(1).default(DEFAULT_BACKTEST_CONFIG.minWeight),
    maxWeight: z.number().gt(0).max(1).default(DEFAULT_BACKTEST_CONFIG.maxWeight),
    optimizerMethod: z
      .enum(['ledoit-wolf', 'minvar', 'hrp'], {
        errorMap: () => ({ message: 'Unknown optimizer method (ledoit-wolf | minvar | hrp)' })
      })
      .default(DEFAULT_BACKTEST_CONFIG.optimizerMethod),
    covEstimator: z
      .enum(['sample', 'ledoit-wolf'], {
        errorMap: () => ({ message: 'Unknown covariance estimator (sample | ledoit-wolf)' })
      })
      .default(DEFAULT_BACKTEST_CONFIG.covEstimator),
    optimizationMode: z
      .enum(['select-then-optimize', 'optimize-subset'], {
        errorMap: () => ({ message: 'Unknown optimization mode (select-then-optimize | optimize-subset)' })
      })
      .default(DEFAULT_BACKTEST_CONFIG.optimizationMode),
    forceEqualWeight: z.boolean().default(DEFAULT_BACKTEST_CONFIG.forceEqualWeight),
    rebalanceFrequency: frequencySchema.default('monthly'),
    tradingCosts: tradingCostsSchema.default({}),
    topUniverseSize: z.number().int().min(1).default(DEFAULT_BACKTEST_CONFIG.topUniverseSize),
    universeMode: z
      .enum(['dynamic', 'static'], {
        errorMap: () => ({ message: 'Unknown universe mode (dynamic | static)' })
      })
      .default(DEFAULT_BACKTEST_CONFIG.universeMode),
    staticTickers: z.array(z.string().min(1)).default([]),
    coverageThreshold: z.number().min(0).max(1).default(DEFAULT_BACKTEST_CONFIG.coverageThreshold),
    riskFreeRate: z.number().min(-1).max(1).default(DEFAULT_BACKTEST_CONFIG.riskFreeRate),
    stalePricePolicy: z
      .enum(['zero', 'carry-forward'], {
        errorMap: () => ({ message: 'Unknown stale price policy (zero | carry-forward)' })
      })
      .default(DEFAULT_BACKTEST_CONFIG.stalePricePolicy)
  })
  .refine((cfg) => cfg.minWeight <= cfg.maxWeight, {
    message: 'minWeight must not exceed maxWeight',
    path: ['minWeight']
  })
  .refine((cfg) => cfg.universeMode !== 'static' || cfg.staticTickers.length > 0, {
    message: 'static universe mode needs a non-empty staticTickers list',
    path: ['staticTickers']
  });

export type BacktestConfigInput = z.input<typeof backtestConfigSchema>;

export const validateBacktestConfig = (
  input: unknown
): { success: true; value: BacktestConfig } | { success: false; errors: string[] } => {
  const result = backtestConfigSchema.safeParse(input ?? {});
  if (result.success) {
    return { success: true, value: result.data };
  }
  const errors = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
  return { success: false, errors };
};

export const resolveBacktestConfig = (input: unknown): BacktestConfig => {
  const result = validateBacktestConfig(input);
  if (!result.success) {
    throw new Error(`Invalid backtest config: ${result.errors.join('; ')}`);
  }
  return result.value;
};

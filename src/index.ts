export * from './core/types';
export { DEFAULT_BACKTEST_CONFIG, resolveBacktestConfig, validateBacktestConfig, parseFrequency } from './core/schema';
export type { BacktestConfigInput } from './core/schema';
export { createPriceTable, priceTableFromObservations, toReturnMatrix, sliceReturnWindow } from './data/priceTable';
export { getPriceDataProvider, withPriceDataProvider, CsvPriceDataProvider, StubPriceDataProvider } from './data/priceData';
export type { PriceDataProvider, PriceQuery } from './data/priceData.types';
export { filterByCoverage } from './universe/coverageFilter';
export { buildRebalanceSchedule } from './schedule/rebalanceSchedule';
export { selectTopSharpeTickers } from './selection/sharpeSelector';
export { optimizePortfolio, getOptimizer } from './optimizer';
export { allocatePositions } from './execution/positionAllocator';
export { BacktestEngine, runBacktest, silentLogger } from './engine/backtestEngine';
export type { EngineCollaborators, RunLogger } from './engine/backtestEngine';
export { runSweep } from './engine/sweep';
export { computePerformanceMetrics, computeMonthlyPerformance, formatMetricsTable } from './analytics/metrics';
export { writeBacktestReport } from './analytics/report';

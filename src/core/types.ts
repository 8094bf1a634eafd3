export type OptimizationMode = 'select-then-optimize' | 'optimize-subset';
export type OptimizerMethod = 'ledoit-wolf' | 'minvar' | 'hrp';
export type CovEstimator = 'sample' | 'ledoit-wolf';
export type UniverseMode = 'dynamic' | 'static';
export type StalePricePolicy = 'zero' | 'carry-forward';

export type RebalanceFrequency = 'weekly' | 'monthly' | { months: number };

export interface PriceTable {
  dates: string[]; // ISO YYYY-MM-DD, strictly increasing
  tickers: string[];
  closes: Record<string, Array<number | null>>;
}

export interface ReturnMatrix {
  dates: string[];
  tickers: string[];
  returns: Record<string, Array<number | null>>;
}

export interface RebalanceEvent {
  rebalanceDate: string;
  periodStart: string;
  periodEnd: string;
}

export interface Position {
  shares: number;
  weight: number;
  tradingCosts: number;
}

export type PositionMap = Record<string, Position>;

export interface AllocationRecord {
  date: string;
  ticker: string;
  price: number;
  shares: number;
  weight: number;
  amount: number;
  previousShares: number;
  tradedAmount: number;
  tradingCosts: number;
}

export interface DailyValuationRecord {
  date: string;
  ticker: string;
  price: number;
  shares: number;
  allocatedAmount: number;
  allocatedPct: number;
  totalPortfolioValue: number;
  isRebalanceDay: boolean;
  tradingCosts: number;
}

export interface SelectionDetailRow {
  kind: 'REBALANCE';
  rebalanceDate: string;
  universeSize: number;
  method: OptimizerMethod;
  covEstimator: CovEstimator;
  optimizationMode: OptimizationMode;
  selectedTickers: string[];
  weights: Record<string, number>;
  frequency: string;
  capital: number;
  tradingCosts: number;
}

export interface SelectionSummaryRow {
  kind: 'SUMMARY';
  frequency: string;
  totalTradingCosts: number;
  tradingCostsPct: number;
}

export type SelectionDetail = SelectionDetailRow | SelectionSummaryRow;

export interface EquityPoint {
  date: string;
  value: number;
}

export interface TradingCostSettings {
  enabled: boolean;
  fixedCostPerTrade: number;
  variableCostPct: number;
}

export interface BacktestConfig {
  startBalance: number;
  numStocks: number;
  windowDays: number;
  minWeight: number;
  maxWeight: number;
  optimizerMethod: OptimizerMethod;
  covEstimator: CovEstimator;
  optimizationMode: OptimizationMode;
  forceEqualWeight: boolean;
  rebalanceFrequency: RebalanceFrequency;
  tradingCosts: TradingCostSettings;
  topUniverseSize: number;
  universeMode: UniverseMode;
  staticTickers: string[];
  coverageThreshold: number;
  riskFreeRate: number;
  stalePricePolicy: StalePricePolicy;
}

export interface ExcludedTicker {
  ticker: string;
  firstDate: string | null;
  lastDate: string | null;
  observations: number;
  expected: number;
  coverage: number;
}

export interface MissingDaysRow {
  month: string;
  ticker: string;
  missingDays: number;
}

export interface CoverageReport {
  threshold: number;
  expectedDays: number;
  retained: string[];
  excluded: ExcludedTicker[];
  missingByMonth: MissingDaysRow[];
  log: string[];
}

export interface PerformanceMetrics {
  startBalance: number;
  endBalance: number;
  totalReturn: number;
  cagr: number;
  annualVolatility: number;
  sharpe: number | null;
  maxDrawdown: number;
  ulcerIndex: number;
  ulcerPerformanceIndex: number | null;
  sortino: number | null;
  calmar: number | null;
  omega: number | null;
  painRatio: number | null;
  longestDrawdownDays: number;
  maxDrawdownRecoveryDays: number | null;
  bestDay: number | null;
  worstDay: number | null;
  totalTradingCosts: number;
  tradingCostsPct: number;
}

export interface MonthlyPerformanceRow {
  month: string;
  endValue: number;
  pnl: number;
  pnlPct: number | null;
}

export interface NextAllocation {
  asOf: string | null;
  tickers: string[];
  weights: Record<string, number>;
}

export interface BacktestResult {
  config: BacktestConfig;
  events: RebalanceEvent[];
  equityCurve: EquityPoint[];
  dailyValuations: DailyValuationRecord[];
  selectionDetails: SelectionDetail[];
  allocations: AllocationRecord[];
  metrics: PerformanceMetrics | undefined;
  monthlyPerformance: MonthlyPerformanceRow[];
  nextAllocation: NextAllocation;
  missingMonths: string[];
  totalTradingCosts: number;
  coverage: CoverageReport | undefined;
  logLines: string[];
}

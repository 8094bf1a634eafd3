import {
  AllocationRecord,
  BacktestConfig,
  BacktestResult,
  CoverageReport,
  DailyValuationRecord,
  EquityPoint,
  NextAllocation,
  PositionMap,
  PriceTable,
  RebalanceEvent,
  RebalanceFrequency,
  ReturnMatrix,
  SelectionDetail
} from '../core/types';
import { resolveBacktestConfig } from '../core/schema';
import { addDays, monthKey, monthsBetween } from '../core/time';
import { latestPriceOnOrBefore, selectColumns, sliceReturnWindow, toReturnMatrix } from '../data/priceTable';
import { filterByCoverage } from '../universe/coverageFilter';
import { buildRebalanceSchedule, frequencyLabel, scheduleGaps } from '../schedule/rebalanceSchedule';
import { selectTopSharpeTickers } from '../selection/sharpeSelector';
import { optimizePortfolio } from '../optimizer';
import { AllocationParams, AllocationResult, allocatePositions } from '../execution/positionAllocator';
import { computeMonthlyPerformance, computePerformanceMetrics } from '../analytics/metrics';
import { PreSelector, WeightOptimizer, selectAndWeight } from './selection';

export interface RunLogger {
  log(message: string): void;
  warn(message: string): void;
}

export const silentLogger: RunLogger = {
  log: () => undefined,
  warn: () => undefined
};

export type Scheduler = (dates: string[], frequency: RebalanceFrequency) => RebalanceEvent[];
export type Allocator = (params: AllocationParams) => AllocationResult;

export interface EngineCollaborators {
  scheduler?: Scheduler;
  preSelector?: PreSelector;
  optimizer?: WeightOptimizer;
  allocator?: Allocator;
  logger?: RunLogger;
}

interface RunState {
  balance: number;
  cash: number;
  positions: PositionMap;
  totalTradingCosts: number;
  dayValues: Map<number, number>;
  dailyValuations: DailyValuationRecord[];
  selectionDetails: SelectionDetail[];
  allocations: AllocationRecord[];
  logLines: string[];
}

/**
 * Walks the price table one rebalance event at a time. The configuration is
 * validated once here; each `run()` starts from a fresh RunState.
 */
export class BacktestEngine {
  readonly config: BacktestConfig;
  readonly prices: PriceTable;
  readonly coverage: CoverageReport | undefined;
  private readonly scheduler: Scheduler;
  private readonly preSelector: PreSelector;
  private readonly optimizer: WeightOptimizer;
  private readonly allocator: Allocator;
  private readonly logger: RunLogger;

  constructor(prices: PriceTable, config: unknown, collaborators: EngineCollaborators = {}) {
    this.config = resolveBacktestConfig(config);
    this.scheduler = collaborators.scheduler ?? buildRebalanceSchedule;
    this.preSelector = collaborators.preSelector ?? selectTopSharpeTickers;
    this.optimizer = collaborators.optimizer ?? optimizePortfolio;
    this.allocator = collaborators.allocator ?? allocatePositions;
    this.logger = collaborators.logger ?? console;

    if (this.config.universeMode === 'dynamic') {
      const { table, report } = filterByCoverage(prices, this.config.coverageThreshold);
      report.log.forEach((line) => this.logger.log(line));
      this.prices = table;
      this.coverage = report;
    } else {
      const missing = this.config.staticTickers.filter((t) => !prices.closes[t]);
      if (missing.length) {
        this.logger.warn(`Static universe tickers without price data: ${missing.join(', ')}`);
      }
      this.prices = selectColumns(prices, this.config.staticTickers);
      this.coverage = undefined;
    }
  }

  run(): BacktestResult {
    const cfg = this.config;
    const state: RunState = {
      balance: cfg.startBalance,
      cash: 0,
      positions: {},
      totalTradingCosts: 0,
      dayValues: new Map(),
      dailyValuations: [],
      selectionDetails: [],
      allocations: [],
      logLines: []
    };
    const log = (line: string) => {
      state.logLines.push(line);
      this.logger.log(line);
    };
    const warn = (line: string) => {
      state.logLines.push(line);
      this.logger.warn(line);
    };

    const returns = toReturnMatrix(this.prices);
    const events = this.scheduler(this.prices.dates, cfg.rebalanceFrequency);
    const frequency = frequencyLabel(cfg.rebalanceFrequency);
    scheduleGaps(events, this.prices.dates).forEach((gap) =>
      warn(`Schedule gap between ${gap.after} and ${gap.before}`)
    );

    for (const event of events) {
      const rebalanced = this.rebalance(event, returns, state, frequency, log, warn);
      this.markToMarket(event, rebalanced, state);
    }

    const equityCurve: EquityPoint[] = this.prices.dates
      .map((date, idx) => ({ date, value: state.dayValues.get(idx) }))
      .filter((p): p is EquityPoint => p.value !== undefined && Number.isFinite(p.value));

    state.selectionDetails.push({
      kind: 'SUMMARY',
      frequency,
      totalTradingCosts: state.totalTradingCosts,
      tradingCostsPct: state.totalTradingCosts / cfg.startBalance
    });

    const missingMonths = this.monthsWithoutRebalance(state.selectionDetails);
    if (missingMonths.length) {
      warn(`Rebalance missing for months: ${missingMonths.join(', ')}`);
    }

    const metrics = computePerformanceMetrics(equityCurve, {
      startBalance: cfg.startBalance,
      totalTradingCosts: state.totalTradingCosts,
      riskFreeRate: cfg.riskFreeRate
    });

    return {
      config: cfg,
      events,
      equityCurve,
      dailyValuations: state.dailyValuations,
      selectionDetails: state.selectionDetails,
      allocations: state.allocations,
      metrics,
      monthlyPerformance: computeMonthlyPerformance(equityCurve),
      nextAllocation: this.previewNextAllocation(returns),
      missingMonths,
      totalTradingCosts: state.totalTradingCosts,
      coverage: this.coverage,
      logLines: state.logLines
    };
  }

  /**
   * Selection, weighting and allocation for one event. Returns false when
   * the event is skipped; positions and balance are then left untouched.
   */
  private rebalance(
    event: RebalanceEvent,
    returns: ReturnMatrix,
    state: RunState,
    frequency: string,
    log: (line: string) => void,
    warn: (line: string) => void
  ): boolean {
    const cfg = this.config;
    const date = event.rebalanceDate;
    const window = sliceReturnWindow(returns, addDays(date, -cfg.windowDays), date);
    const available = window.tickers.length;
    if (available === 0) {
      warn(`${date}: no tickers with returns in the lookback window. Skipping rebalance.`);
      return false;
    }
    const n = Math.min(cfg.numStocks, available);
    if (n < cfg.numStocks) {
      warn(`${date}: only ${available} tickers available, holding ${n} instead of ${cfg.numStocks}`);
    }

    const selection = selectAndWeight(window, n, cfg, this.preSelector, this.optimizer);
    if (!selection.tickers.length) {
      warn(`${date}: selection returned no tickers. Skipping rebalance.`);
      return false;
    }
    log(
      `Rebalance ${date} | Optimizer: ${cfg.optimizerMethod} | Mode: ${cfg.optimizationMode} | CovEstimator: ${cfg.covEstimator}`
    );

    const capital = state.balance;
    const allocation = this.allocator({
      prices: this.prices,
      tickers: selection.tickers,
      weights: selection.weights,
      date,
      capital,
      previousPositions: state.positions,
      costs: cfg.tradingCosts
    });
    if (allocation.skipped.length) {
      warn(`${date}: no price on or before rebalance date for ${allocation.skipped.join(', ')}`);
    }
    const rebalanceCosts = allocation.allocations.reduce((acc, a) => acc + a.tradingCosts, 0);
    state.positions = allocation.positions;
    state.cash = allocation.cash;
    state.totalTradingCosts += rebalanceCosts;
    state.allocations.push(...allocation.allocations);
    state.selectionDetails.push({
      kind: 'REBALANCE',
      rebalanceDate: date,
      universeSize: selection.universe.length,
      method: cfg.optimizerMethod,
      covEstimator: cfg.covEstimator,
      optimizationMode: cfg.optimizationMode,
      selectedTickers: selection.tickers,
      weights: Object.fromEntries(selection.tickers.map((t, i) => [t, selection.weights[i]])),
      frequency,
      capital,
      tradingCosts: rebalanceCosts
    });
    log(
      `${date}: Rebalanced for ${event.periodStart} - ${event.periodEnd} | ${
        Object.keys(state.positions).length
      } positions | Trading Costs: ${rebalanceCosts.toFixed(2)}`
    );
    return true;
  }

  /**
   * Values the held positions plus uninvested cash on every table date of
   * the holding period. The last day's total becomes the capital for the
   * next rebalance.
   */
  private markToMarket(event: RebalanceEvent, rebalanced: boolean, state: RunState) {
    const tickers = Object.keys(state.positions);
    if (!tickers.length && state.cash === 0) return;
    const { dates, closes } = this.prices;
    for (let idx = 0; idx < dates.length; idx++) {
      const day = dates[idx];
      if (day < event.periodStart || day > event.periodEnd) continue;
      const isRebalanceDay = rebalanced && day === event.periodStart;
      const dayRecords: DailyValuationRecord[] = [];
      let total = state.cash;
      for (const ticker of tickers) {
        const pos = state.positions[ticker];
        let price = closes[ticker]?.[idx] ?? null;
        if (price === null && this.config.stalePricePolicy === 'carry-forward') {
          price = latestPriceOnOrBefore(this.prices, ticker, day) ?? null;
        }
        // Under the 'zero' policy an unpriced holding adds nothing to the day.
        if (price === null) continue;
        const value = pos.shares * price;
        total += value;
        dayRecords.push({
          date: day,
          ticker,
          price,
          shares: pos.shares,
          allocatedAmount: value,
          allocatedPct: pos.weight * 100,
          totalPortfolioValue: 0,
          isRebalanceDay,
          tradingCosts: isRebalanceDay ? pos.tradingCosts : 0
        });
      }
      dayRecords.forEach((r) => (r.totalPortfolioValue = total));
      state.dailyValuations.push(...dayRecords);
      state.dayValues.set(idx, total);
      state.balance = total;
    }
  }

  private monthsWithoutRebalance(details: SelectionDetail[]): string[] {
    const { dates } = this.prices;
    if (!dates.length) return [];
    const executed = new Set(
      details.flatMap((d) => (d.kind === 'REBALANCE' ? [monthKey(d.rebalanceDate)] : []))
    );
    return monthsBetween(monthKey(dates[0]), monthKey(dates[dates.length - 1])).filter((m) => !executed.has(m));
  }

  /**
   * What the next rebalance would buy, using the window that ends on the
   * last date of the table. No capital is allocated and nothing is logged
   * to the selection details.
   */
  private previewNextAllocation(returns: ReturnMatrix): NextAllocation {
    const { dates } = this.prices;
    if (!dates.length) return { asOf: null, tickers: [], weights: {} };
    const asOf = dates[dates.length - 1];
    const window = sliceReturnWindow(returns, addDays(asOf, -this.config.windowDays), asOf);
    if (!window.tickers.length) return { asOf, tickers: [], weights: {} };
    const n = Math.min(this.config.numStocks, window.tickers.length);
    const selection = selectAndWeight(window, n, this.config, this.preSelector, this.optimizer);
    return {
      asOf,
      tickers: selection.tickers,
      weights: Object.fromEntries(selection.tickers.map((t, i) => [t, selection.weights[i]]))
    };
  }
}

export const runBacktest = (prices: PriceTable, config: unknown, collaborators?: EngineCollaborators): BacktestResult =>
  new BacktestEngine(prices, config, collaborators).run();

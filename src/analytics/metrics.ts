import { EquityPoint, MonthlyPerformanceRow, PerformanceMetrics } from '../core/types';
import { monthKey } from '../core/time';
import { average, safeDivide, stdDev, sum } from '../core/utils';

export const TRADING_DAYS_PER_YEAR = 252;

export interface MetricsParams {
  startBalance: number;
  totalTradingCosts: number;
  riskFreeRate: number;
}

export const computeDailyReturns = (points: EquityPoint[]): number[] => {
  const returns: number[] = [];
  for (let i = 1; i < points.length; i++) {
    const prev = points[i - 1].value;
    const curr = points[i].value;
    returns.push(prev > 0 ? (curr - prev) / prev : 0);
  }
  return returns;
};

// value / running peak - 1, so every entry is <= 0.
export const computeDrawdowns = (points: EquityPoint[]): number[] => {
  let peak = Number.NEGATIVE_INFINITY;
  return points.map((p) => {
    peak = Math.max(peak, p.value);
    return peak > 0 ? p.value / peak - 1 : 0;
  });
};

export const longestDrawdownDays = (drawdowns: number[]): number => {
  let longest = 0;
  let current = 0;
  for (const dd of drawdowns) {
    current = dd < 0 ? current + 1 : 0;
    longest = Math.max(longest, current);
  }
  return longest;
};

/**
 * Points from the deepest trough back to its prior peak value; null when the
 * curve never recovers. A curve without drawdown recovers in 0.
 */
export const recoveryDaysFromMaxDrawdown = (points: EquityPoint[], drawdowns: number[]): number | null => {
  if (!drawdowns.length) return null;
  let trough = 0;
  drawdowns.forEach((dd, i) => {
    if (dd < drawdowns[trough]) trough = i;
  });
  if (drawdowns[trough] >= 0) return 0;
  const peakValue = points[trough].value / (1 + drawdowns[trough]);
  for (let i = trough + 1; i < points.length; i++) {
    if (points[i].value >= peakValue) return i - trough;
  }
  return null;
};

export const computePerformanceMetrics = (
  points: EquityPoint[],
  { startBalance, totalTradingCosts, riskFreeRate }: MetricsParams
): PerformanceMetrics | undefined => {
  if (!points.length) return undefined;

  const n = points.length;
  const endBalance = points[n - 1].value;
  const growth = startBalance > 0 ? endBalance / startBalance : 0;
  const totalReturn = growth - 1;
  const cagr = Math.pow(growth, TRADING_DAYS_PER_YEAR / n) - 1;
  const annualFactor = Math.sqrt(TRADING_DAYS_PER_YEAR);

  const daily = computeDailyReturns(points);
  const meanDaily = average(daily);
  const sdDaily = stdDev(daily);
  const sharpeDaily = safeDivide(meanDaily, sdDaily);

  const drawdowns = computeDrawdowns(points);
  const maxDrawdown = drawdowns.reduce((acc, dd) => Math.min(acc, dd), 0);
  const ulcerIndex = Math.sqrt(average(drawdowns.map((dd) => (dd * 100) ** 2)));
  const negativeDrawdowns = drawdowns.filter((dd) => dd < 0).map((dd) => Math.abs(dd));

  const dailyRiskFree = riskFreeRate / TRADING_DAYS_PER_YEAR;
  const downsideDeviation = Math.sqrt(average(daily.map((r) => Math.min(r - dailyRiskFree, 0) ** 2)));
  const sortinoDaily = safeDivide(meanDaily - dailyRiskFree, downsideDeviation);

  const gains = sum(daily.filter((r) => r > 0));
  const shortfalls = sum(daily.filter((r) => r < 0).map((r) => -r));

  return {
    startBalance,
    endBalance,
    totalReturn,
    cagr,
    annualVolatility: sdDaily * annualFactor,
    sharpe: sharpeDaily === null ? null : sharpeDaily * annualFactor,
    maxDrawdown,
    ulcerIndex,
    ulcerPerformanceIndex: safeDivide(cagr, ulcerIndex / 100),
    sortino: sortinoDaily === null ? null : sortinoDaily * annualFactor,
    calmar: safeDivide(cagr, Math.abs(maxDrawdown)),
    omega: safeDivide(gains, shortfalls),
    painRatio: negativeDrawdowns.length ? safeDivide(cagr, average(negativeDrawdowns)) : null,
    longestDrawdownDays: longestDrawdownDays(drawdowns),
    maxDrawdownRecoveryDays: recoveryDaysFromMaxDrawdown(points, drawdowns),
    bestDay: daily.length ? daily.reduce((acc, r) => Math.max(acc, r), Number.NEGATIVE_INFINITY) : null,
    worstDay: daily.length ? daily.reduce((acc, r) => Math.min(acc, r), Number.POSITIVE_INFINITY) : null,
    totalTradingCosts,
    tradingCostsPct: startBalance > 0 ? totalTradingCosts / startBalance : 0
  };
};

/**
 * Month-end values with the change against the previous month end. The
 * first month has no prior month end and is omitted.
 */
export const computeMonthlyPerformance = (points: EquityPoint[]): MonthlyPerformanceRow[] => {
  const monthEnds: Array<{ month: string; value: number }> = [];
  for (const p of points) {
    const month = monthKey(p.date);
    const last = monthEnds[monthEnds.length - 1];
    if (last && last.month === month) last.value = p.value;
    else monthEnds.push({ month, value: p.value });
  }
  return monthEnds.slice(1).map((m, i) => {
    const prev = monthEnds[i].value;
    return {
      month: m.month,
      endValue: m.value,
      pnl: m.value - prev,
      pnlPct: prev > 0 ? m.value / prev - 1 : null
    };
  });
};

const money = (v: number) =>
  `$${v.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
const percent = (v: number) => `${(v * 100).toFixed(2)}%`;
const ratio = (v: number | null) => (v === null ? 'n/a' : v.toFixed(2));

export const formatMetricsTable = (metrics: PerformanceMetrics | undefined): Array<{ metric: string; value: string }> => {
  if (!metrics) return [];
  return [
    { metric: 'Start Balance', value: money(metrics.startBalance) },
    { metric: 'End Balance', value: money(metrics.endBalance) },
    { metric: 'Total Return (%)', value: percent(metrics.totalReturn) },
    { metric: 'CAGR (%)', value: percent(metrics.cagr) },
    { metric: 'Annual Volatility (%)', value: percent(metrics.annualVolatility) },
    { metric: 'Sharpe Ratio', value: ratio(metrics.sharpe) },
    { metric: 'Sortino Ratio', value: ratio(metrics.sortino) },
    { metric: 'Max Drawdown (%)', value: percent(metrics.maxDrawdown) },
    { metric: 'Calmar Ratio', value: ratio(metrics.calmar) },
    { metric: 'Ulcer Index', value: metrics.ulcerIndex.toFixed(2) },
    { metric: 'Ulcer Performance Index', value: ratio(metrics.ulcerPerformanceIndex) },
    { metric: 'Omega Ratio', value: ratio(metrics.omega) },
    { metric: 'Pain Ratio', value: ratio(metrics.painRatio) },
    { metric: 'Longest Drawdown (days)', value: String(metrics.longestDrawdownDays) },
    {
      metric: 'Max Drawdown Recovery (days)',
      value: metrics.maxDrawdownRecoveryDays === null ? 'not recovered' : String(metrics.maxDrawdownRecoveryDays)
    },
    { metric: 'Total Trading Costs', value: money(metrics.totalTradingCosts) },
    { metric: 'Trading Costs (% of Initial)', value: percent(metrics.tradingCostsPct) }
  ];
};

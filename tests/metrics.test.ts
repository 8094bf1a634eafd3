import {
  computeDailyReturns,
  computeDrawdowns,
  computeMonthlyPerformance,
  computePerformanceMetrics,
  formatMetricsTable
} from '../src/analytics/metrics';
import { EquityPoint } from '../src/core/types';

const curve = (values: number[], dates: string[]): EquityPoint[] =>
  values.map((value, i) => ({ date: dates[i], value }));

describe('performance metrics', () => {
  const points = curve([100, 110, 99, 121], ['2024-01-30', '2024-01-31', '2024-02-29', '2024-03-01']);

  it('derives returns and drawdowns from the curve', () => {
    const daily = computeDailyReturns(points);
    expect(daily[0]).toBeCloseTo(0.1, 12);
    expect(daily[1]).toBeCloseTo(-0.1, 12);
    expect(daily[2]).toBeCloseTo(22 / 99, 12);
    const dd = computeDrawdowns(points);
    expect(dd[0]).toBe(0);
    expect(dd[1]).toBe(0);
    expect(dd[2]).toBeCloseTo(-0.1, 12);
    expect(dd[3]).toBe(0);
  });

  it('computes the summary statistics', () => {
    const metrics = computePerformanceMetrics(points, { startBalance: 100, totalTradingCosts: 2, riskFreeRate: 0 });
    if (!metrics) throw new Error('expected metrics');
    const cagr = Math.pow(1.21, 252 / 4) - 1;
    expect(metrics.endBalance).toBe(121);
    expect(metrics.totalReturn).toBeCloseTo(0.21, 12);
    expect(metrics.cagr).toBeCloseTo(cagr, 6);
    expect(metrics.maxDrawdown).toBeCloseTo(-0.1, 12);
    expect(metrics.ulcerIndex).toBeCloseTo(5, 9);
    expect(metrics.calmar).toBeCloseTo(cagr / 0.1, 3);
    expect(metrics.painRatio).toBeCloseTo(cagr / 0.1, 3);
    expect(metrics.omega).toBeCloseTo((0.1 + 22 / 99) / 0.1, 9);
    expect(metrics.longestDrawdownDays).toBe(1);
    expect(metrics.maxDrawdownRecoveryDays).toBe(1);
    expect(metrics.bestDay).toBeCloseTo(22 / 99, 12);
    expect(metrics.worstDay).toBeCloseTo(-0.1, 12);
    expect(metrics.tradingCostsPct).toBeCloseTo(0.02, 12);
    expect(metrics.sharpe).not.toBeNull();
  });

  it('returns null ratios for a flat curve', () => {
    const flat = curve([100, 100, 100], ['2024-01-02', '2024-01-03', '2024-01-04']);
    const metrics = computePerformanceMetrics(flat, { startBalance: 100, totalTradingCosts: 0, riskFreeRate: 0 });
    if (!metrics) throw new Error('expected metrics');
    expect(metrics.cagr).toBe(0);
    expect(metrics.annualVolatility).toBe(0);
    expect(metrics.sharpe).toBeNull();
    expect(metrics.sortino).toBeNull();
    expect(metrics.calmar).toBeNull();
    expect(metrics.omega).toBeNull();
    expect(metrics.painRatio).toBeNull();
    expect(metrics.ulcerPerformanceIndex).toBeNull();
    expect(metrics.maxDrawdownRecoveryDays).toBe(0);
  });

  it('handles curves longer than the argument limit of Math.min', () => {
    const long = Array.from({ length: 200000 }, (_, i) => ({ date: '2024-01-02', value: i % 2 ? 101 : 100 }));
    const metrics = computePerformanceMetrics(long, { startBalance: 100, totalTradingCosts: 0, riskFreeRate: 0 });
    expect(metrics?.maxDrawdown).toBeCloseTo(100 / 101 - 1, 12);
    expect(metrics?.bestDay).toBeCloseTo(0.01, 12);
    expect(metrics?.worstDay).toBeCloseTo(100 / 101 - 1, 12);
  });

  it('reports no metrics for an empty curve', () => {
    expect(computePerformanceMetrics([], { startBalance: 100, totalTradingCosts: 0, riskFreeRate: 0 })).toBeUndefined();
  });

  it('reports an unrecovered drawdown as null', () => {
    const falling = curve([100, 90, 80], ['2024-01-02', '2024-01-03', '2024-01-04']);
    const metrics = computePerformanceMetrics(falling, { startBalance: 100, totalTradingCosts: 0, riskFreeRate: 0 });
    expect(metrics?.maxDrawdownRecoveryDays).toBeNull();
    expect(metrics?.longestDrawdownDays).toBe(2);
  });

  it('builds month-end rows without the first month', () => {
    const rows = computeMonthlyPerformance(points);
    expect(rows.map((r) => [r.month, r.endValue, r.pnl])).toEqual([
      ['2024-02', 99, -11],
      ['2024-03', 121, 22]
    ]);
    expect(rows[0].pnlPct).toBeCloseTo(-0.1, 12);
    expect(rows[1].pnlPct).toBeCloseTo(22 / 99, 12);
  });

  it('formats the table for display', () => {
    const metrics = computePerformanceMetrics(curve([100000, 100000], ['2024-01-02', '2024-01-03']), {
      startBalance: 100000,
      totalTradingCosts: 0,
      riskFreeRate: 0
    });
    const table = formatMetricsTable(metrics);
    expect(table[0]).toEqual({ metric: 'Start Balance', value: '$100,000.00' });
    expect(table.find((r) => r.metric === 'Sharpe Ratio')?.value).toBe('n/a');
    expect(formatMetricsTable(undefined)).toEqual([]);
  });
});

import path from 'path';
import fs from 'fs';
import { BacktestResult } from '../core/types';
import { ensureDir, writeCSVFile, writeJSONFile } from '../core/utils';
import { formatMetricsTable } from './metrics';

export interface ReportPaths {
  dir: string;
  files: string[];
}

export const writeBacktestReport = (result: BacktestResult, reportsDir: string): ReportPaths => {
  ensureDir(reportsDir);
  const files: string[] = [];
  const out = (name: string) => {
    const p = path.join(reportsDir, name);
    files.push(p);
    return p;
  };

  writeCSVFile(
    out('equity_curve.csv'),
    ['date', 'value'],
    result.equityCurve.map((p) => [p.date, p.value.toFixed(2)])
  );
  writeCSVFile(
    out('daily_valuations.csv'),
    [
      'date',
      'ticker',
      'price',
      'shares',
      'allocatedAmount',
      'allocatedPct',
      'totalPortfolioValue',
      'isRebalanceDay',
      'tradingCosts'
    ],
    result.dailyValuations.map((r) => [
      r.date,
      r.ticker,
      r.price,
      r.shares.toFixed(6),
      r.allocatedAmount.toFixed(2),
      r.allocatedPct.toFixed(2),
      r.totalPortfolioValue.toFixed(2),
      r.isRebalanceDay,
      r.tradingCosts.toFixed(2)
    ])
  );
  writeJSONFile(out('selection_details.json'), result.selectionDetails);
  writeJSONFile(out('allocations.json'), result.allocations);
  writeJSONFile(out('metrics.json'), { metrics: result.metrics ?? null, table: formatMetricsTable(result.metrics) });
  writeJSONFile(out('monthly_performance.json'), result.monthlyPerformance);
  writeJSONFile(out('next_allocation.json'), result.nextAllocation);
  writeJSONFile(out('coverage.json'), result.coverage ?? null);
  fs.writeFileSync(
    out('run.log'),
    `${[...(result.coverage?.log ?? []), ...result.logLines, ...result.missingMonths.map((m) => `missing month ${m}`)].join('\n')}\n`
  );
  return { dir: reportsDir, files };
};

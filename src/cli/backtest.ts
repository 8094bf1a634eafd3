#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import { Command } from 'commander';
import { getPriceDataProvider, withPriceDataProvider } from '../data/priceData';
import { BacktestEngine } from '../engine/backtestEngine';
import { formatMetricsTable } from '../analytics/metrics';
import { writeBacktestReport } from '../analytics/report';
import { loadConfigInput, parseIntOption, parseListOption } from './options';

const program = new Command();

program
  .name('rebalance-backtest')
  .option('--config <path>', 'run configuration JSON (default src/config/default.json or BACKTEST_CONFIG)')
  .option('--prices <path>', 'price CSV (date,ticker,close or wide date,T1,T2,...)')
  .option('--out <dir>', 'reports directory (default REPORTS_DIR or ./reports)')
  .option('--from <date>', 'first price date to load')
  .option('--to <date>', 'last price date to load')
  .option('--num-stocks <n>', 'override numStocks', parseIntOption)
  .option('--frequency <freq>', 'override rebalanceFrequency (weekly | monthly | custom:N)')
  .option('--mode <mode>', 'override optimizationMode (select-then-optimize | optimize-subset)')
  .option('--method <method>', 'override optimizerMethod (ledoit-wolf | minvar | hrp)')
  .option('--static <tickers>', 'static universe, comma separated', parseListOption)
  .option('--equal-weight', 'force equal weights', false)
  .option('--no-costs', 'disable trading costs');

interface BacktestOptions {
  config?: string;
  prices?: string;
  out?: string;
  from?: string;
  to?: string;
  numStocks?: number;
  frequency?: string;
  mode?: string;
  method?: string;
  static?: string[];
  equalWeight: boolean;
  costs: boolean;
}

export const runBacktestCommand = async (opts: BacktestOptions) => {
  const input = loadConfigInput(opts.config);
  if (opts.numStocks !== undefined) input.numStocks = opts.numStocks;
  if (opts.frequency) input.rebalanceFrequency = opts.frequency;
  if (opts.mode) input.optimizationMode = opts.mode;
  if (opts.method) input.optimizerMethod = opts.method;
  if (opts.static) {
    input.universeMode = 'static';
    input.staticTickers = opts.static;
  }
  if (opts.equalWeight) input.forceEqualWeight = true;
  if (!opts.costs) {
    const costs = typeof input.tradingCosts === 'object' && input.tradingCosts !== null ? input.tradingCosts : {};
    input.tradingCosts = { ...costs, enabled: false };
  }

  const provider = getPriceDataProvider(opts.prices);
  const prices = await withPriceDataProvider(provider, (p) =>
    p.loadPriceTable({ tickers: opts.static, from: opts.from, to: opts.to })
  );
  console.log(`Loaded ${prices.tickers.length} tickers x ${prices.dates.length} days from ${provider.name}`);

  const result = new BacktestEngine(prices, input).run();
  const reportsDir = path.resolve(process.cwd(), opts.out || process.env.REPORTS_DIR || 'reports');
  const report = writeBacktestReport(result, reportsDir);

  console.table(formatMetricsTable(result.metrics));
  if (result.nextAllocation.tickers.length) {
    console.log(
      `Next allocation (${result.nextAllocation.asOf}): ${result.nextAllocation.tickers
        .map((t) => `${t} ${(result.nextAllocation.weights[t] * 100).toFixed(1)}%`)
        .join(', ')}`
    );
  }
  console.log(`Reports written to ${report.dir}`);
  return result;
};

if (require.main === module) {
  const opts = program.parse(process.argv).opts<BacktestOptions>();
  runBacktestCommand(opts).catch((err) => {
    console.error('Backtest failed', err);
    process.exitCode = 1;
  });
}

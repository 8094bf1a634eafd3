#!/usr/bin/env node
import 'dotenv/config';
import path from 'path';
import { Command } from 'commander';
import { OptimizerMethod } from '../core/types';
import { writeJSONFile } from '../core/utils';
import { getPriceDataProvider, withPriceDataProvider } from '../data/priceData';
import { runSweep } from '../engine/sweep';
import { loadConfigInput, parseListOption } from './options';

const program = new Command();

const methods: OptimizerMethod[] = ['ledoit-wolf', 'minvar', 'hrp'];

const parseIntList = (value: string): number[] => parseListOption(value).map((v) => Number.parseInt(v, 10));

const parseMethods = (value: string): OptimizerMethod[] =>
  parseListOption(value).map((v) => {
    const method = methods.find((m) => m === v);
    if (!method) throw new Error(`Unknown optimizer method: ${v}`);
    return method;
  });

program
  .name('rebalance-sweep')
  .option('--config <path>', 'base run configuration JSON')
  .option('--prices <path>', 'price CSV')
  .option('--num-stocks <list>', 'comma separated numStocks values', parseIntList)
  .option('--window-days <list>', 'comma separated windowDays values', parseIntList)
  .option('--methods <list>', 'comma separated optimizer methods', parseMethods)
  .option('--out <file>', 'ranking output file', 'reports/sweep.json');

interface SweepOptions {
  config?: string;
  prices?: string;
  numStocks?: number[];
  windowDays?: number[];
  methods?: OptimizerMethod[];
  out: string;
}

const main = async () => {
  const opts = program.parse(process.argv).opts<SweepOptions>();
  const base = loadConfigInput(opts.config);
  const provider = getPriceDataProvider(opts.prices);
  const prices = await withPriceDataProvider(provider, (p) => p.loadPriceTable());
  const results = runSweep(prices, base, {
    numStocks: opts.numStocks,
    windowDays: opts.windowDays,
    optimizerMethod: opts.methods
  });
  const outFile = path.resolve(process.cwd(), opts.out);
  writeJSONFile(outFile, results);
  for (const r of results.slice(0, 10)) {
    const sharpe = r.metrics?.sharpe;
    console.log(
      `${r.params.optimizerMethod} n=${r.params.numStocks} window=${r.params.windowDays} | Sharpe ${
        sharpe === null || sharpe === undefined ? 'n/a' : sharpe.toFixed(2)
      }${r.error ? ` | error: ${r.error}` : ''}`
    );
  }
  console.log(`Sweep results written to ${outFile}`);
};

main().catch((err) => {
  console.error('Sweep failed', err);
  process.exitCode = 1;
});

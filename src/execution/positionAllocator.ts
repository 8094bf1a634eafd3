import { AllocationRecord, PositionMap, PriceTable, TradingCostSettings } from '../core/types';
import { latestPriceOnOrBefore } from '../data/priceTable';

export interface AllocationParams {
  prices: PriceTable;
  tickers: string[];
  weights: number[];
  date: string;
  capital: number;
  previousPositions: PositionMap;
  costs: TradingCostSettings;
}

export interface AllocationResult {
  positions: PositionMap;
  allocations: AllocationRecord[];
  tradingCosts: number;
  // Capital left uninvested after costs: unused weight and skipped tickers.
  cash: number;
  skipped: string[];
}

// Below this notional a ticker is treated as untouched.
const MIN_TRADED_AMOUNT = 1e-8;

export const tradeCost = (tradedAmount: number, costs: TradingCostSettings): number => {
  if (!costs.enabled || tradedAmount <= MIN_TRADED_AMOUNT) return 0;
  return costs.fixedCostPerTrade + costs.variableCostPct * tradedAmount;
};

/**
 * Converts target weights into share counts at the rebalance date's close.
 * Costs are charged on the traded notional against the previous positions
 * and come out of the capital before it is invested; whatever the weights
 * leave unallocated is returned as cash.
 */
export const allocatePositions = ({
  prices,
  tickers,
  weights,
  date,
  capital,
  previousPositions,
  costs
}: AllocationParams): AllocationResult => {
  if (tickers.length !== weights.length) {
    throw new Error(`Allocator got ${tickers.length} tickers but ${weights.length} weights`);
  }
  const skipped: string[] = [];
  const targets: Array<{ ticker: string; weight: number; price: number }> = [];
  tickers.forEach((ticker, i) => {
    const price = latestPriceOnOrBefore(prices, ticker, date);
    if (price === undefined) {
      skipped.push(ticker);
      return;
    }
    targets.push({ ticker, weight: weights[i], price });
  });

  const targetByTicker = new Map(targets.map((t) => [t.ticker, t]));
  const universe = targets.map((t) => t.ticker);
  for (const ticker of Object.keys(previousPositions)) {
    if (!targetByTicker.has(ticker)) universe.push(ticker);
  }

  const rows = universe.map((ticker) => {
    const target = targetByTicker.get(ticker);
    const previousShares = previousPositions[ticker]?.shares ?? 0;
    const price = target?.price ?? latestPriceOnOrBefore(prices, ticker, date) ?? 0;
    const weight = target?.weight ?? 0;
    const tradedAmount = Math.abs(capital * weight - previousShares * price);
    return { ticker, price, weight, previousShares, tradedAmount, cost: tradeCost(tradedAmount, costs) };
  });

  const tradingCosts = rows.reduce((acc, r) => acc + r.cost, 0);
  const investable = Math.max(0, capital - tradingCosts);
  const positions: PositionMap = {};
  const allocations: AllocationRecord[] = rows.map((r) => {
    const amount = investable * r.weight;
    const shares = r.weight > 0 && r.price > 0 ? amount / r.price : 0;
    if (shares > 0) {
      positions[r.ticker] = { shares, weight: r.weight, tradingCosts: r.cost };
    }
    return {
      date,
      ticker: r.ticker,
      price: r.price,
      shares,
      weight: r.weight,
      amount: shares * r.price,
      previousShares: r.previousShares,
      tradedAmount: r.tradedAmount,
      tradingCosts: r.cost
    };
  });

  const invested = allocations.reduce((acc, a) => acc + a.amount, 0);
  const cash = Math.max(0, capital - tradingCosts - invested);

  return { positions, allocations, tradingCosts, cash, skipped };
};

import { resolveBacktestConfig } from '../src/core/schema';
import { ReturnWindow, sliceReturnWindow, toReturnMatrix } from '../src/data/priceTable';
import { normalize, projectToBounds } from '../src/optimizer/bounds';
import { ledoitWolfCovariance, sampleCovariance } from '../src/optimizer/covariance';
import { hrpWeights } from '../src/optimizer/hrp';
import { solveMinVariance } from '../src/optimizer/minVariance';
import { optimizePortfolio } from '../src/optimizer';
import { pickTopWeights, selectAndWeight } from '../src/engine/selection';
import { threeAssetTable } from './fixtures';

const sumOf = (values: number[]) => values.reduce((a, b) => a + b, 0);

describe('weight bounds', () => {
  it('projects onto the bounded simplex', () => {
    const projected = projectToBounds([0.7, 0.2, 0.1], 0.05, 0.5);
    expect(projected[0]).toBeCloseTo(0.5, 9);
    expect(projected[1]).toBeCloseTo(0.3, 9);
    expect(projected[2]).toBeCloseTo(0.2, 9);
  });

  it('caps every name at maxWeight when n * maxWeight is below 1', () => {
    expect(projectToBounds([0.5, 0.5], 0, 0.2)).toEqual([0.2, 0.2]);
  });

  it('rejects bounds no portfolio can satisfy', () => {
    expect(() => projectToBounds([1, 1, 1], 0.5, 0.6)).toThrow(/Infeasible weight bounds/);
  });

  it('normalizes all-zero weights to equal weights', () => {
    expect(normalize([0, 0, 0, 0])).toEqual([0.25, 0.25, 0.25, 0.25]);
    expect(normalize([1, 3])).toEqual([0.25, 0.75]);
  });
});

describe('covariance estimators', () => {
  const window: ReturnWindow = {
    dates: ['2024-01-02', '2024-01-03'],
    tickers: ['AAA', 'BBB'],
    columns: { AAA: [0.01, 0.03], BBB: [0.02, 0.02] }
  };

  it('computes the unbiased sample covariance', () => {
    const cov = sampleCovariance(window);
    expect(cov[0][0]).toBeCloseTo(0.0002, 12);
    expect(cov[1][1]).toBe(0);
    expect(cov[0][1]).toBeCloseTo(0, 12);
  });

  it('shrinks towards a scaled identity with intensity in [0, 1]', () => {
    const returns = toReturnMatrix(threeAssetTable(120));
    const w = sliceReturnWindow(returns, '2023-01-01', '2023-12-31');
    const { covariance, shrinkage } = ledoitWolfCovariance(w);
    expect(shrinkage).toBeGreaterThanOrEqual(0);
    expect(shrinkage).toBeLessThanOrEqual(1);
    expect(covariance[0][1]).toBeCloseTo(covariance[1][0], 15);
    covariance.forEach((row, i) => expect(row[i]).toBeGreaterThan(0));
  });
});

describe('optimizers', () => {
  const diagonal = [
    [0.04, 0],
    [0, 0.01]
  ];

  it('finds the inverse-variance portfolio for uncorrelated assets', () => {
    const w = solveMinVariance(diagonal, 0, 1);
    expect(w[0]).toBeCloseTo(0.2, 4);
    expect(w[1]).toBeCloseTo(0.8, 4);
  });

  it('splits HRP weight by inverse cluster variance', () => {
    const w = hrpWeights(diagonal);
    expect(w[0]).toBeCloseTo(0.2, 12);
    expect(w[1]).toBeCloseTo(0.8, 12);
  });

  it.each(['ledoit-wolf', 'minvar', 'hrp'] as const)('%s respects bounds and sums to 1', (method) => {
    const returns = toReturnMatrix(threeAssetTable(250));
    const window = sliceReturnWindow(returns, '2023-01-01', '2023-12-31');
    const weights = optimizePortfolio(window, {
      method,
      covEstimator: 'sample',
      forceEqualWeight: false,
      minWeight: 0.1,
      maxWeight: 0.6
    });
    const values = Object.values(weights);
    expect(Object.keys(weights)).toEqual(['AAA', 'BBB', 'CCC']);
    expect(sumOf(values)).toBeCloseTo(1, 6);
    values.forEach((v) => {
      expect(v).toBeGreaterThanOrEqual(0.1 - 1e-9);
      expect(v).toBeLessThanOrEqual(0.6 + 1e-9);
    });
  });

  it('returns equal weights when forced and nothing for an empty window', () => {
    const window: ReturnWindow = {
      dates: ['2024-01-02'],
      tickers: ['AAA', 'BBB', 'CCC', 'DDD'],
      columns: { AAA: [0.01], BBB: [0.02], CCC: [0], DDD: [-0.01] }
    };
    const options = { method: 'hrp' as const, covEstimator: 'sample' as const, forceEqualWeight: true, minWeight: 0.3, maxWeight: 0.3 };
    expect(optimizePortfolio(window, options)).toEqual({ AAA: 0.25, BBB: 0.25, CCC: 0.25, DDD: 0.25 });
    expect(optimizePortfolio({ dates: [], tickers: [], columns: {} }, options)).toEqual({});
  });
});

describe('selection modes', () => {
  const config = resolveBacktestConfig({ minWeight: 0, maxWeight: 1, topUniverseSize: 4 });
  const window: ReturnWindow = {
    dates: ['2024-01-02'],
    tickers: ['AAA', 'BBB', 'CCC', 'DDD'],
    columns: { AAA: [0.01], BBB: [0.02], CCC: [0], DDD: [-0.01] }
  };

  it('keeps the top n by absolute weight with ties in universe order', () => {
    const picked = pickTopWeights(['AAA', 'BBB', 'CCC'], { AAA: 0.3, BBB: 0.3, CCC: 0.4 }, 2, config);
    expect(picked.tickers).toEqual(['CCC', 'AAA']);
    expect(picked.weights[0]).toBeCloseTo(4 / 7, 9);
    expect(picked.weights[1]).toBeCloseTo(3 / 7, 9);
  });

  it('optimizes only the first n pre-selected names in select-then-optimize', () => {
    const seen: string[][] = [];
    const outcome = selectAndWeight(
      window,
      2,
      config,
      () => ['DDD', 'BBB', 'AAA', 'CCC'],
      (w) => {
        seen.push(w.tickers);
        return Object.fromEntries(w.tickers.map((t) => [t, 0.5]));
      }
    );
    expect(seen).toEqual([['DDD', 'BBB']]);
    expect(outcome).toEqual({ universe: ['DDD', 'BBB', 'AAA', 'CCC'], tickers: ['DDD', 'BBB'], weights: [0.5, 0.5] });
  });

  it('optimizes the whole universe in optimize-subset and truncates afterwards', () => {
    const seen: string[][] = [];
    const subsetConfig = { ...config, optimizationMode: 'optimize-subset' as const };
    const outcome = selectAndWeight(
      window,
      2,
      subsetConfig,
      () => ['AAA', 'BBB', 'CCC', 'DDD'],
      (w) => {
        seen.push(w.tickers);
        return { AAA: 0.1, BBB: 0.4, CCC: 0.1, DDD: 0.4 };
      }
    );
    expect(seen).toEqual([['AAA', 'BBB', 'CCC', 'DDD']]);
    expect(outcome.tickers).toEqual(['BBB', 'DDD']);
    expect(outcome.weights[0]).toBeCloseTo(0.5, 9);
    expect(outcome.weights[1]).toBeCloseTo(0.5, 9);
  });
});

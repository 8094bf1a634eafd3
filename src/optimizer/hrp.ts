import { Matrix, estimateCovariance, portfolioVariance } from './covariance';
import { projectToBounds } from './bounds';
import { OptimizerInput, PortfolioOptimizer, Weights } from './optimizer.types';

export const correlationDistance = (cov: Matrix): Matrix =>
  cov.map((row, i) =>
    row.map((v, j) => {
      if (i === j) return 0;
      const den = Math.sqrt(cov[i][i] * cov[j][j]);
      const corr = den > 0 ? Math.max(-1, Math.min(1, v / den)) : 0;
      return Math.sqrt(0.5 * (1 - corr));
    })
  );

/**
 * Leaf order of a single-linkage dendrogram over the distance matrix, so
 * that similar names sit next to each other.
 */
export const quasiDiagonalOrder = (dist: Matrix): number[] => {
  let clusters = dist.map((_, i) => [i]);
  while (clusters.length > 1) {
    let best = { a: 0, b: 1, d: Number.POSITIVE_INFINITY };
    for (let a = 0; a < clusters.length; a++) {
      for (let b = a + 1; b < clusters.length; b++) {
        let d = Number.POSITIVE_INFINITY;
        for (const i of clusters[a]) {
          for (const j of clusters[b]) d = Math.min(d, dist[i][j]);
        }
        if (d < best.d) best = { a, b, d };
      }
    }
    const merged = [...clusters[best.a], ...clusters[best.b]];
    clusters = clusters.filter((_, idx) => idx !== best.a && idx !== best.b);
    clusters.splice(best.a, 0, merged);
  }
  return clusters[0] ?? [];
};

const clusterVariance = (cov: Matrix, members: number[]): number => {
  const sub = members.map((i) => members.map((j) => cov[i][j]));
  const inv = members.map((i) => (cov[i][i] > 0 ? 1 / cov[i][i] : 0));
  const total = inv.reduce((a, b) => a + b, 0);
  const w = total > 0 ? inv.map((v) => v / total) : members.map(() => 1 / members.length);
  return portfolioVariance(sub, w);
};

export const hrpWeights = (cov: Matrix): number[] => {
  const n = cov.length;
  const weights = new Array<number>(n).fill(1);
  let queue: number[][] = n ? [quasiDiagonalOrder(correlationDistance(cov))] : [];
  while (queue.length) {
    const next: number[][] = [];
    for (const members of queue) {
      if (members.length < 2) continue;
      const half = Math.floor(members.length / 2);
      const left = members.slice(0, half);
      const right = members.slice(half);
      const vLeft = clusterVariance(cov, left);
      const vRight = clusterVariance(cov, right);
      const alpha = vLeft + vRight > 0 ? 1 - vLeft / (vLeft + vRight) : 0.5;
      left.forEach((i) => (weights[i] *= alpha));
      right.forEach((i) => (weights[i] *= 1 - alpha));
      next.push(left, right);
    }
    queue = next;
  }
  return weights;
};

export const hrpOptimizer: PortfolioOptimizer = {
  method: 'hrp',
  optimize: ({ window, covEstimator, minWeight, maxWeight }: OptimizerInput): Weights => {
    const raw = hrpWeights(estimateCovariance(window, covEstimator));
    const bounded = projectToBounds(raw, minWeight, maxWeight);
    return Object.fromEntries(window.tickers.map((t, i) => [t, bounded[i]]));
  }
};

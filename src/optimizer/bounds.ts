const EPS = 1e-12;

export const boundsFeasible = (n: number, minWeight: number) => n * minWeight <= 1 + 1e-9;

/**
 * Euclidean projection of `values` onto { lo <= w <= hi, sum(w) = s } with
 * s = min(1, n * hi). Throws when n * lo > 1.
 */
export const projectToBounds = (values: number[], minWeight: number, maxWeight: number): number[] => {
  const n = values.length;
  if (!n) return [];
  if (!boundsFeasible(n, minWeight)) {
    throw new Error(`Infeasible weight bounds: ${n} names x minWeight ${minWeight} exceeds 1`);
  }
  if (n * maxWeight <= 1 + EPS) {
    return values.map(() => maxWeight);
  }
  const clip = (v: number) => Math.min(maxWeight, Math.max(minWeight, v));
  const total = (tau: number) => values.reduce((acc, v) => acc + clip(v - tau), 0);
  let low = Math.min(...values) - maxWeight;
  let high = Math.max(...values) - minWeight;
  for (let iter = 0; iter < 200 && high - low > EPS; iter++) {
    const mid = (low + high) / 2;
    if (total(mid) > 1) low = mid;
    else high = mid;
  }
  const tau = (low + high) / 2;
  return values.map((v) => clip(v - tau));
};

// Scale to sum 1; all-zero input maps to equal weights.
export const normalize = (values: number[]): number[] => {
  const total = values.reduce((a, b) => a + b, 0);
  if (total <= 0) return values.map(() => (values.length ? 1 / values.length : 0));
  return values.map((v) => v / total);
};

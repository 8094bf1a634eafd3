import fs from 'fs';
import path from 'path';

export const ensureDir = (dir: string) => {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

export const readJSONFile = (filePath: string): unknown => {
  const raw = fs.readFileSync(filePath, 'utf-8');
  return JSON.parse(raw);
};

export const writeJSONFile = (filePath: string, data: unknown) => {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
};

export const writeCSVFile = (filePath: string, header: string[], rows: Array<Array<string | number | boolean | null>>) => {
  ensureDir(path.dirname(filePath));
  const lines = [header.join(',')];
  for (const row of rows) {
    lines.push(row.map((cell) => (cell === null ? '' : String(cell))).join(','));
  }
  fs.writeFileSync(filePath, `${lines.join('\n')}\n`);
};

export const mulberry32 = (seed: number) => {
  let t = seed + 0x6d2b79f5;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
};

// FNV-1a; seeds the synthetic price paths per ticker.
export const hashString = (input: string): number => {
  let hash = 0x811c9dc5;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
};

export const sum = (arr: number[]): number => arr.reduce((a, b) => a + b, 0);

export const average = (arr: number[]): number => (arr.length ? sum(arr) / arr.length : 0);

// Sample standard deviation (n - 1), 0 for fewer than two points.
export const stdDev = (arr: number[]): number => {
  if (arr.length < 2) return 0;
  const mean = average(arr);
  const variance = arr.reduce((acc, v) => acc + (v - mean) ** 2, 0) / (arr.length - 1);
  return Math.sqrt(variance);
};

export const safeDivide = (num: number, den: number): number | null => {
  if (den === 0 || !Number.isFinite(den)) return null;
  const out = num / den;
  return Number.isFinite(out) ? out : null;
};

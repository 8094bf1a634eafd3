import fs from 'fs';
import path from 'path';
import { readJSONFile } from '../core/utils';

export const DEFAULT_CONFIG_PATH = 'src/config/default.json';

export const loadConfigInput = (configPath?: string): Record<string, unknown> => {
  const resolved = path.resolve(process.cwd(), configPath || process.env.BACKTEST_CONFIG || DEFAULT_CONFIG_PATH);
  if (!fs.existsSync(resolved)) {
    throw new Error(`Config file not found: ${resolved}`);
  }
  const raw = readJSONFile(resolved);
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error(`Config file ${resolved} must contain a JSON object`);
  }
  return { ...raw };
};

export const parseIntOption = (value: string): number => {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
};

export const parseListOption = (value: string): string[] =>
  value
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);

import path from 'path';
import { CsvPriceDataProvider } from './priceData.csv';
import { StubPriceDataProvider } from './priceData.stub';
import { PriceDataProvider } from './priceData.types';

const DEFAULT_STUB_TICKERS = ['AAA', 'BBB', 'CCC', 'DDD', 'EEE', 'FFF', 'GGG', 'HHH'];

export const getPriceDataProvider = (filePath?: string): PriceDataProvider => {
  const provider = (process.env.PRICE_DATA_PROVIDER || (filePath ? 'csv' : 'stub')).toLowerCase();
  if (provider === 'csv') {
    const file = filePath || process.env.PRICE_DATA_FILE;
    if (!file) {
      throw new Error('PRICE_DATA_PROVIDER=csv but no price file given (--prices or PRICE_DATA_FILE)');
    }
    return new CsvPriceDataProvider(path.resolve(process.cwd(), file));
  }
  if (provider !== 'stub') {
    throw new Error(`Unknown price data provider: ${provider}`);
  }
  const tickers = process.env.STUB_TICKERS?.split(',').map((t) => t.trim()).filter(Boolean) ?? DEFAULT_STUB_TICKERS;
  return new StubPriceDataProvider({
    tickers,
    startDate: process.env.STUB_START_DATE || '2022-01-03',
    days: Number(process.env.STUB_DAYS || 756)
  });
};

/**
 * Opens the provider for the duration of `fn` and always closes it,
 * including when `fn` throws.
 */
export const withPriceDataProvider = async <T>(
  provider: PriceDataProvider,
  fn: (provider: PriceDataProvider) => Promise<T>
): Promise<T> => {
  await provider.open();
  try {
    return await fn(provider);
  } finally {
    await provider.close();
  }
};

export { CsvPriceDataProvider, StubPriceDataProvider };

import { PriceTable } from '../core/types';

export interface PriceQuery {
  tickers?: string[];
  from?: string;
  to?: string;
}

export interface PriceDataProvider {
  readonly name: string;
  open(): Promise<void>;
  loadPriceTable(query?: PriceQuery): Promise<PriceTable>;
  close(): Promise<void>;
}

import type { AssetSymbol } from '@/modules/backtest/types';

/** Units held per symbol; zero positions are removed. */
export type Holdings = Record<AssetSymbol, number>;

export interface PortfolioSnapshot {
  cash: number;
  holdings: Holdings;
}

export type PriceMap = Record<AssetSymbol, number>;

/** Latest price for a symbol; injected so trades never touch the network directly. */
export type PriceLookup = (symbol: AssetSymbol) => number | Promise<number>;

export const CASH_KEY = 'CASH';

export type PricePoint = {
  date: string; // YYYY-MM-DD
  close: number;
};

/** 每月最后一个交易日的收盘价 */
export type MonthlyPriceRow = {
  month: string; // YYYY-MM
  prices: Record<string, number>;
};

export type ProviderName = 'yahoo';

export type DailySeries = {
  symbol: string;
  provider: ProviderName;
  points: PricePoint[];
};

export type AssetSymbol = string;

/** 目标权重：symbol -> weight，总和为 1 */
export type Allocation = Record<AssetSymbol, number>;

export type MonthlyReturnRecord = {
  month: string; // YYYY-MM
  returns: Record<AssetSymbol, number>; // 0.013 = +1.3%
};

export type PortfolioState = {
  values: Record<AssetSymbol, number>;
  cash: number; // always 0 after the initial split (fully invested)
};

export type StepResult = {
  state: PortfolioState;
  total: number;
  rebalanced: boolean;
};

/** 0 = Buy & Hold，其余为每 N 个月再平衡一次 */
export type RebalanceFrequency = number;

export type PeriodReturn = {
  month: string;
  return: number;
};

export type YearlyReturn = {
  index: number; // 0-based bucket, anchored to the first simulated month
  startMonth: string;
  endMonth: string;
  months: number; // 12, or fewer for a trailing partial bucket
  return: number;
};

export type DrawdownInfo = {
  peakIndex: number; // index into portfolioHistory
  troughIndex: number;
  recoveryIndex: number | null; // 如果未恢复则为 null
  drawdown: number; // <= 0
};

export type BacktestResult = {
  initialCapital: number;
  rebalanceFrequency: RebalanceFrequency;
  finalValue: number;
  totalReturn: number;
  cagr: number;
  maxDrawdown: number;
  maxDrawdownInfo: DrawdownInfo;
  bestYear: YearlyReturn;
  worstYear: YearlyReturn;
  yearlyReturns: YearlyReturn[];
  monthlyReturns: PeriodReturn[];
  // portfolioHistory[0] 为初始资金，长度 = months.length + 1
  portfolioHistory: number[];
  months: string[];
  rebalanceCount: number;
};

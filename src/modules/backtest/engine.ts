import { InvalidInputError } from '@/modules/backtest/errors';
import {
  computeCagr,
  computeMaxDrawdown,
  computeMonthlyReturns,
  computeYearlyReturns,
  pickBestAndWorst,
} from '@/modules/backtest/metrics';
import { backtestInputSchema, formatZodIssues, type BacktestInput } from '@/modules/backtest/schema';
import type {
  Allocation,
  BacktestResult,
  MonthlyReturnRecord,
  PortfolioState,
  RebalanceFrequency,
  StepResult,
} from '@/modules/backtest/types';

export const WEIGHT_TOLERANCE = 1e-6;

export function validateBacktestInput(raw: {
  monthlyReturns: readonly MonthlyReturnRecord[];
  allocation: Allocation;
  initialCapital: number;
  rebalanceFrequency: RebalanceFrequency;
}): BacktestInput {
  const parsed = backtestInputSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(formatZodIssues(parsed.error));
  }
  const input = parsed.data;

  const totalWeight = Object.values(input.allocation).reduce((s, w) => s + w, 0);
  if (Math.abs(totalWeight - 1) > WEIGHT_TOLERANCE) {
    throw new InvalidInputError(`Allocation must sum to 1.0, but got ${totalWeight}`, { totalWeight });
  }
  // 容差内的权重归一化到总和为 1
  const allocation: Allocation = Object.fromEntries(
    Object.entries(input.allocation).map(([symbol, weight]) => [symbol, weight / totalWeight])
  );

  const symbols = Object.keys(allocation);
  let prevMonth: string | null = null;
  for (const record of input.monthlyReturns) {
    // 不重新排序，只校验：月份必须严格递增
    if (prevMonth !== null && record.month <= prevMonth) {
      throw new InvalidInputError(`Months must be strictly increasing: ${record.month} follows ${prevMonth}`, {
        month: record.month,
        previous: prevMonth,
      });
    }
    prevMonth = record.month;

    const missing = symbols.filter((s) => !Object.hasOwn(record.returns, s));
    if (missing.length > 0) {
      throw new InvalidInputError(`Month ${record.month} is missing returns for: ${missing.join(', ')}`, {
        month: record.month,
        missing,
      });
    }
  }

  return { ...input, allocation };
}

export function portfolioTotal(state: PortfolioState): number {
  let total = 0;
  for (const value of Object.values(state.values)) total += value;
  return total + state.cash;
}

/** Month 0: split the capital by target weight. */
export function initPortfolio(initialCapital: number, allocation: Allocation): PortfolioState {
  const values: Record<string, number> = {};
  for (const [symbol, weight] of Object.entries(allocation)) {
    values[symbol] = initialCapital * weight;
  }
  return { values, cash: 0 };
}

/** Resets per-symbol values to the target weights, keeping the total. */
export function rebalancePortfolio(state: PortfolioState, allocation: Allocation): PortfolioState {
  return initPortfolio(portfolioTotal(state), allocation);
}

export function shouldRebalance(monthIndex: number, frequency: RebalanceFrequency): boolean {
  return frequency > 0 && monthIndex % frequency === 0;
}

/**
 * Advances the portfolio by one month: compounds each symbol by its return,
 * then rebalances when `monthIndex` (1-based) is a multiple of `frequency`.
 * `total` is the value before any rebalance, which is the same either way.
 */
export function stepPortfolio(
  state: PortfolioState,
  record: MonthlyReturnRecord,
  monthIndex: number,
  allocation: Allocation,
  frequency: RebalanceFrequency
): StepResult {
  const values: Record<string, number> = {};
  for (const [symbol, value] of Object.entries(state.values)) {
    values[symbol] = value * (1 + record.returns[symbol]);
  }
  const drifted: PortfolioState = { values, cash: state.cash };
  const total = portfolioTotal(drifted);

  if (shouldRebalance(monthIndex, frequency)) {
    return { state: rebalancePortfolio(drifted, allocation), total, rebalanced: true };
  }
  return { state: drifted, total, rebalanced: false };
}

/**
 * Replays a fixed-weight portfolio over monthly returns.
 *
 * `rebalanceFrequency` is a month count: 0 = Buy & Hold, 1 = monthly,
 * 6 = semi-annual, 12 = annual, any other N = every N months. Throws
 * `InvalidInputError` for malformed input; never mutates its arguments.
 */
export function runBacktest(
  monthlyReturns: readonly MonthlyReturnRecord[],
  allocation: Allocation,
  initialCapital: number,
  rebalanceFrequency: RebalanceFrequency = 0
): BacktestResult {
  const input = validateBacktestInput({ monthlyReturns, allocation, initialCapital, rebalanceFrequency });

  let state = initPortfolio(input.initialCapital, input.allocation);
  const portfolioHistory: number[] = [input.initialCapital];
  const months: string[] = [];
  let rebalanceCount = 0;

  input.monthlyReturns.forEach((record, i) => {
    const step = stepPortfolio(state, record, i + 1, input.allocation, input.rebalanceFrequency);
    state = step.state;
    portfolioHistory.push(step.total);
    months.push(record.month);
    if (step.rebalanced) rebalanceCount++;
  });

  const finalValue = portfolioHistory[portfolioHistory.length - 1];
  const maxDrawdownInfo = computeMaxDrawdown(portfolioHistory);
  const yearlyReturns = computeYearlyReturns(portfolioHistory, months);
  const { best, worst } = pickBestAndWorst(yearlyReturns);

  return {
    initialCapital: input.initialCapital,
    rebalanceFrequency: input.rebalanceFrequency,
    finalValue,
    totalReturn: finalValue / input.initialCapital - 1,
    cagr: computeCagr(input.initialCapital, finalValue, months.length),
    maxDrawdown: maxDrawdownInfo.drawdown,
    maxDrawdownInfo,
    bestYear: best,
    worstYear: worst,
    yearlyReturns,
    monthlyReturns: computeMonthlyReturns(portfolioHistory, months),
    portfolioHistory,
    months,
    rebalanceCount,
  };
}

import { ComputationError } from '@/modules/backtest/errors';
import type { DrawdownInfo, PeriodReturn, YearlyReturn } from '@/modules/backtest/types';

const MONTHS_PER_YEAR = 12;

/**
 * CAGR annualized from a monthly span: (final / initial) ^ (12 / months) - 1.
 *
 * A non-positive ending ratio is a total loss and reports -1 (-100%) instead of
 * raising a fractional power of a non-positive base.
 */
export function computeCagr(initialValue: number, finalValue: number, months: number): number {
  if (!(months > 0)) {
    throw new ComputationError(`CAGR needs at least one month, got ${months}`, { months });
  }
  if (!(initialValue > 0)) {
    throw new ComputationError(`CAGR needs a positive initial value, got ${initialValue}`, { initialValue });
  }

  const ratio = finalValue / initialValue;
  if (ratio <= 0) return -1;

  const cagr = Math.pow(ratio, MONTHS_PER_YEAR / months) - 1;
  if (!Number.isFinite(cagr)) {
    throw new ComputationError(`CAGR is not finite for ratio ${ratio} over ${months} months`, {
      ratio,
      months,
    });
  }
  return cagr;
}

export function computeMaxDrawdown(history: readonly number[]): DrawdownInfo {
  if (history.length === 0) {
    return { peakIndex: 0, troughIndex: 0, recoveryIndex: null, drawdown: 0 };
  }

  let runningMax = history[0];
  let peakIndex = 0;
  let maxDrawdown = 0;
  let maxDrawdownPeakIndex = 0;
  let maxDrawdownTroughIndex = 0;

  for (let j = 0; j < history.length; j++) {
    const value = history[j];
    if (value > runningMax) {
      runningMax = value;
      peakIndex = j;
    }

    const dd = runningMax > 0 ? (value - runningMax) / runningMax : 0;
    if (dd < maxDrawdown) {
      maxDrawdown = dd;
      maxDrawdownPeakIndex = peakIndex;
      maxDrawdownTroughIndex = j;
    }
  }

  // 查找恢复点：谷底之后第一次回到前高
  const peakValue = history[maxDrawdownPeakIndex];
  let recoveryIndex: number | null = null;
  for (let j = maxDrawdownTroughIndex; j < history.length; j++) {
    if (history[j] >= peakValue) {
      recoveryIndex = j;
      break;
    }
  }

  return {
    peakIndex: maxDrawdownPeakIndex,
    troughIndex: maxDrawdownTroughIndex,
    recoveryIndex,
    drawdown: maxDrawdown,
  };
}

/**
 * Splits the trajectory into 12-month buckets anchored to the first simulated
 * month. Bucket k spans history[12k] .. history[min(12k + 12, L)]; a trailing
 * bucket may be shorter.
 */
export function computeYearlyReturns(history: readonly number[], months: readonly string[]): YearlyReturn[] {
  const out: YearlyReturn[] = [];
  const total = months.length;

  for (let start = 0, index = 0; start < total; start += MONTHS_PER_YEAR, index++) {
    const end = Math.min(start + MONTHS_PER_YEAR, total);
    const startValue = history[start];
    out.push({
      index,
      startMonth: months[start],
      endMonth: months[end - 1],
      months: end - start,
      return: startValue > 0 ? history[end] / startValue - 1 : 0,
    });
  }

  return out;
}

export function pickBestAndWorst(yearly: readonly YearlyReturn[]): { best: YearlyReturn; worst: YearlyReturn } {
  if (yearly.length === 0) {
    throw new ComputationError('No yearly periods to rank');
  }

  let best = yearly[0];
  let worst = yearly[0];
  for (const y of yearly) {
    if (y.return > best.return) best = y;
    if (y.return < worst.return) worst = y;
  }
  return { best, worst };
}

export function computeMonthlyReturns(history: readonly number[], months: readonly string[]): PeriodReturn[] {
  return months.map((month, i) => {
    const prev = history[i];
    return { month, return: prev > 0 ? history[i + 1] / prev - 1 : 0 };
  });
}

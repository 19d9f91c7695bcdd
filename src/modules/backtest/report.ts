import type { BacktestResult, YearlyReturn } from '@/modules/backtest/types';

export type ReportOptions = {
  strategyName: string;
  currency?: string;
  recentMonths?: number;
};

const WIDE_RULE = '='.repeat(50);
const NARROW_RULE = '-'.repeat(40);

const moneyFormat = new Intl.NumberFormat('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 });
const wholeFormat = new Intl.NumberFormat('en-US', { maximumFractionDigits: 0 });

/** 0.1234 -> "+12.34%", -0.05 -> "-5.00%" */
export function formatPercent(value: number): string {
  const pct = value * 100;
  const sign = pct >= 0 ? '+' : '';
  return `${sign}${pct.toFixed(2)}%`;
}

function formatPeriod(y: YearlyReturn): string {
  const span = y.startMonth === y.endMonth ? y.startMonth : `${y.startMonth} – ${y.endMonth}`;
  return `${span} (${formatPercent(y.return)})`;
}

export function renderReport(result: BacktestResult, opts: ReportOptions): string[] {
  const currency = opts.currency ?? 'THB';
  const recentMonths = opts.recentMonths ?? 12;
  const firstMonth = result.months[0];
  const lastMonth = result.months[result.months.length - 1];
  const recent = recentMonths > 0 ? result.monthlyReturns.slice(-recentMonths) : [];

  const lines: string[] = [
    WIDE_RULE,
    `Strategy: ${opts.strategyName}`,
    `Period: ${firstMonth} – ${lastMonth}`,
    `Initial Capital: ${wholeFormat.format(result.initialCapital)} ${currency}`,
    WIDE_RULE,
    '',
    '[ Performance Summary ]',
    NARROW_RULE,
    `Final Value        : ${moneyFormat.format(result.finalValue).padStart(12)} ${currency}`,
    `Total Return       : ${formatPercent(result.totalReturn)}`,
    `CAGR               : ${formatPercent(result.cagr)}`,
    `Max Drawdown       : ${formatPercent(result.maxDrawdown)}`,
    `Rebalances         : ${result.rebalanceCount}`,
    '',
    '[ Key Insight ]',
    NARROW_RULE,
    `Best Year          : ${formatPeriod(result.bestYear)}`,
    `Worst Year         : ${formatPeriod(result.worstYear)}`,
    '',
    `[ Monthly - Last ${recent.length} months ]`,
    NARROW_RULE,
    ...recent.map((m) => `${m.month}  ${formatPercent(m.return)}`),
    WIDE_RULE,
  ];

  return lines;
}

import { format, isValid, parseISO } from 'date-fns';
import { InvalidInputError } from '@/modules/backtest/errors';
import type { MonthlyReturnRecord } from '@/modules/backtest/types';
import type { MonthlyPriceRow, PricePoint } from '@/modules/stocks/types';

function monthKey(date: string): string | null {
  const d = parseISO(date);
  return isValid(d) ? format(d, 'yyyy-MM') : null;
}

/**
 * Month-end closes: the last close of each calendar month per symbol. Only
 * months where every symbol has a price are kept, oldest first.
 */
export function toMonthlyPrices(seriesBySymbol: Record<string, PricePoint[]>): MonthlyPriceRow[] {
  const symbols = Object.keys(seriesBySymbol);
  if (symbols.length === 0) {
    throw new InvalidInputError('seriesBySymbol must not be empty');
  }

  const lastCloseBySymbol = new Map<string, Map<string, number>>();
  for (const symbol of symbols) {
    const byMonth = new Map<string, number>();
    const pts = [...seriesBySymbol[symbol]].sort((a, b) => a.date.localeCompare(b.date));
    for (const p of pts) {
      const month = monthKey(p.date);
      if (!month || !Number.isFinite(p.close) || p.close <= 0) continue;
      byMonth.set(month, p.close);
    }
    lastCloseBySymbol.set(symbol, byMonth);
  }

  const months = new Set<string>();
  for (const byMonth of lastCloseBySymbol.values()) {
    for (const month of byMonth.keys()) months.add(month);
  }

  const rows: MonthlyPriceRow[] = [];
  for (const month of Array.from(months).sort()) {
    const prices: Record<string, number> = {};
    let complete = true;
    for (const symbol of symbols) {
      const price = lastCloseBySymbol.get(symbol)?.get(month);
      if (price === undefined) {
        complete = false;
        break;
      }
      prices[symbol] = price;
    }
    if (complete) rows.push({ month, prices });
  }

  if (rows.length === 0) {
    throw new InvalidInputError('No month has a price for every symbol');
  }
  return rows;
}

/** Month-over-month change of month-end closes; the first month only anchors the series. */
export function toMonthlyReturns(rows: readonly MonthlyPriceRow[]): MonthlyReturnRecord[] {
  if (rows.length < 2) {
    throw new InvalidInputError(`At least 2 monthly prices are needed to compute returns, got ${rows.length}`);
  }

  const out: MonthlyReturnRecord[] = [];
  for (let i = 1; i < rows.length; i++) {
    const prev = rows[i - 1];
    const cur = rows[i];
    const returns: Record<string, number> = {};
    for (const [symbol, price] of Object.entries(cur.prices)) {
      const prevPrice = prev.prices[symbol];
      if (prevPrice === undefined) {
        throw new InvalidInputError(`Month ${prev.month} has no price for ${symbol}`, { month: prev.month, symbol });
      }
      returns[symbol] = price / prevPrice - 1;
    }
    out.push({ month: cur.month, returns });
  }
  return out;
}

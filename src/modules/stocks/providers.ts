import { z } from 'zod';
import { format, isValid, parseISO, subDays } from 'date-fns';
import { normalizeAndValidateSymbol } from '@/lib/validation';
import { InvalidInputError, MarketDataError } from '@/modules/backtest/errors';
import type { DailySeries, PricePoint } from '@/modules/stocks/types';

const DEFAULT_TIMEOUT_MS = 15_000;
// 覆盖周末和假期
const LATEST_PRICE_LOOKBACK_DAYS = 10;

const yahooChartSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z
            .object({
              adjclose: z.array(z.object({ adjclose: z.array(z.number().nullable()).optional() })).optional(),
              quote: z.array(z.object({ close: z.array(z.number().nullable()).optional() })).optional(),
            })
            .optional(),
        })
      )
      .nullable()
      .optional(),
  }),
});

function toIsoDateUTC(tsSeconds: number): string {
  return new Date(tsSeconds * 1000).toISOString().slice(0, 10);
}

function dateToUnixSeconds(dateStr: string): number {
  return Math.floor(new Date(`${dateStr}T00:00:00.000Z`).getTime() / 1000);
}

function assertIsoDate(field: string, value: string): void {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || !isValid(parseISO(value))) {
    throw new InvalidInputError(`${field} must be a valid YYYY-MM-DD date, got "${value}"`);
  }
}

async function fetchJsonWithTimeout(
  url: string,
  timeoutMs: number,
  extraHeaders?: Record<string, string>
): Promise<unknown> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);
  try {
    const headers: Record<string, string> = { accept: 'application/json', ...extraHeaders };
    const resp = await fetch(url, { signal: ctrl.signal, headers });
    if (!resp.ok) {
      const text = await resp.text().catch(() => '');
      throw new MarketDataError(`HTTP ${resp.status}: ${text.slice(0, 200)}`, { url, status: resp.status });
    }
    return await resp.json();
  } finally {
    clearTimeout(t);
  }
}

/**
 * Yahoo Finance chart API, daily bars. Adjusted close is preferred (dividends
 * and splits folded in), plain close is the fallback.
 */
export async function fetchYahooDaily(
  symbol: string,
  start: string,
  end: string,
  opts: { timeoutMs?: number } = {}
): Promise<PricePoint[]> {
  const period1 = dateToUnixSeconds(start);
  const period2 = dateToUnixSeconds(end) + 86400; // 包含结束日期

  const url = `https://query1.finance.yahoo.com/v8/finance/chart/${encodeURIComponent(symbol)}?period1=${period1}&period2=${period2}&interval=1d&events=history`;

  const json = await fetchJsonWithTimeout(url, opts.timeoutMs ?? DEFAULT_TIMEOUT_MS, {
    'User-Agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36',
  });

  const parsed = yahooChartSchema.safeParse(json);
  if (!parsed.success) {
    throw new MarketDataError(`Yahoo Finance returned an unexpected payload for ${symbol}`, { symbol });
  }

  const result = parsed.data.chart.result?.[0];
  if (!result) {
    throw new MarketDataError(`Yahoo Finance returned no data for ${symbol}`, { symbol });
  }

  const timestamps = result.timestamp ?? [];
  const adjClose = result.indicators?.adjclose?.[0]?.adjclose ?? [];
  const close = result.indicators?.quote?.[0]?.close ?? [];

  if (timestamps.length === 0) {
    throw new MarketDataError(`Yahoo Finance returned empty timestamps for ${symbol}`, { symbol });
  }

  const out: PricePoint[] = [];
  for (let i = 0; i < timestamps.length; i++) {
    const price = adjClose[i] ?? close[i];
    if (typeof price !== 'number' || !Number.isFinite(price)) continue;
    out.push({ date: toIsoDateUTC(timestamps[i]), close: price });
  }

  if (out.length === 0) {
    throw new MarketDataError(`Yahoo Finance returned no valid price data for ${symbol}`, { symbol });
  }

  return out;
}

/** Fetches daily series for every symbol in parallel; any failure rejects the whole batch. */
export async function fetchDailySeries(opts: {
  symbols: string[];
  start: string;
  end: string;
  timeoutMs?: number;
}): Promise<DailySeries[]> {
  assertIsoDate('start', opts.start);
  assertIsoDate('end', opts.end);
  if (opts.start > opts.end) {
    throw new InvalidInputError(`start (${opts.start}) must be <= end (${opts.end})`);
  }

  const symbols = opts.symbols.map((raw) => {
    const symbol = normalizeAndValidateSymbol(raw);
    if (!symbol) throw new InvalidInputError(`Invalid symbol: ${String(raw)}`);
    return symbol;
  });
  if (symbols.length === 0) {
    throw new InvalidInputError('At least one symbol is required');
  }

  return await Promise.all(
    symbols.map(async (symbol): Promise<DailySeries> => {
      try {
        const points = await fetchYahooDaily(symbol, opts.start, opts.end, { timeoutMs: opts.timeoutMs });
        console.log(`[stocks/providers] ${symbol}: ${points.length} daily points from yahoo`);
        return { symbol, provider: 'yahoo', points };
      } catch (err) {
        console.error(`[stocks/providers] Failed to fetch ${symbol}:`, err);
        if (err instanceof MarketDataError) throw err;
        throw new MarketDataError(`Failed to fetch ${symbol}: ${String(err)}`, { symbol });
      }
    })
  );
}

/** Most recent close on or before `asOf` (default today), looking back over a short window. */
export async function fetchLatestPrice(
  rawSymbol: string,
  opts: { asOf?: string; timeoutMs?: number } = {}
): Promise<number> {
  const symbol = normalizeAndValidateSymbol(rawSymbol);
  if (!symbol) throw new InvalidInputError(`Invalid symbol: ${rawSymbol}`);

  const end = opts.asOf ?? format(new Date(), 'yyyy-MM-dd');
  assertIsoDate('asOf', end);
  const start = format(subDays(parseISO(end), LATEST_PRICE_LOOKBACK_DAYS), 'yyyy-MM-dd');

  const points = await fetchYahooDaily(symbol, start, end, { timeoutMs: opts.timeoutMs });
  const latest = points[points.length - 1];
  console.log(`[stocks/providers] ${symbol}: latest close ${latest.close} on ${latest.date}`);
  return latest.close;
}

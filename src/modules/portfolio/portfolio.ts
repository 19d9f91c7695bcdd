import { InvalidInputError } from '@/modules/backtest/errors';
import type { AssetSymbol } from '@/modules/backtest/types';
import { CASH_KEY, type Holdings, type PortfolioSnapshot, type PriceMap } from '@/modules/portfolio/types';

// 浮点误差容忍
const CASH_EPSILON = 1e-9;

/**
 * In-memory cash + holdings account used for the one-off initial purchase.
 * Every mutation goes through `buy`/`sell`, which reject anything that would
 * leave cash or a position negative.
 */
export class Portfolio {
  private _cash: number;
  private readonly _holdings = new Map<AssetSymbol, number>();

  constructor(initialCash: number) {
    if (!Number.isFinite(initialCash) || initialCash < 0) {
      throw new InvalidInputError('Initial cash must not be negative', { initialCash });
    }
    this._cash = initialCash;
  }

  get cash(): number {
    return this._cash;
  }

  get holdings(): Holdings {
    return Object.fromEntries(this._holdings);
  }

  units(symbol: AssetSymbol): number {
    return this._holdings.get(symbol) ?? 0;
  }

  /** Adjusts a position by a signed unit count. */
  addPosition(symbol: AssetSymbol, delta: number): void {
    const current = this.units(symbol);
    const next = current + delta;
    if (next < 0) {
      throw new InvalidInputError(
        `Cannot reduce holdings of ${symbol} below zero (current: ${current}, change: ${delta})`,
        { symbol, current, delta }
      );
    }
    if (next === 0) {
      this._holdings.delete(symbol);
    } else {
      this._holdings.set(symbol, next);
    }
  }

  buy(symbol: AssetSymbol, units: number, price: number): void {
    assertPositive(units, 'Buy units');
    assertPositive(price, 'Price');

    const cost = units * price;
    if (cost > this._cash + CASH_EPSILON) {
      throw new InvalidInputError(
        `Insufficient cash to buy ${units} of ${symbol} at ${price} (required: ${cost}, available: ${this._cash})`,
        { symbol, cost, cash: this._cash }
      );
    }

    this._cash -= cost;
    if (Math.abs(this._cash) < CASH_EPSILON) this._cash = 0;
    this.addPosition(symbol, units);
  }

  sell(symbol: AssetSymbol, units: number, price: number): void {
    assertPositive(units, 'Sell units');
    assertPositive(price, 'Price');

    const current = this.units(symbol);
    if (units > current) {
      throw new InvalidInputError(`Insufficient holdings to sell ${units} of ${symbol} (current: ${current})`, {
        symbol,
        units,
        current,
      });
    }

    this.addPosition(symbol, -units);
    this._cash += units * price;
  }

  /** Cash plus every holding marked at `prices`. */
  value(prices: PriceMap): number {
    let total = this._cash;
    for (const [symbol, units] of this._holdings) {
      total += units * priceOf(prices, symbol);
    }
    return total;
  }

  /** Current weights including `CASH`; empty when the portfolio is worth nothing. */
  currentAllocation(prices: PriceMap): Record<string, number> {
    const total = this.value(prices);
    if (total === 0) return {};

    const allocation: Record<string, number> = {};
    if (this._cash > 0) allocation[CASH_KEY] = this._cash / total;
    for (const [symbol, units] of this._holdings) {
      allocation[symbol] = (units * priceOf(prices, symbol)) / total;
    }
    return allocation;
  }

  snapshot(): PortfolioSnapshot {
    return { cash: this._cash, holdings: this.holdings };
  }
}

function assertPositive(value: number, label: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new InvalidInputError(`${label} must be greater than zero`, { value });
  }
}

function priceOf(prices: PriceMap, symbol: AssetSymbol): number {
  if (!Object.hasOwn(prices, symbol)) {
    throw new InvalidInputError(`Missing price for ${symbol}`, { symbol });
  }
  return prices[symbol];
}

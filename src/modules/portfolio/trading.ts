import { InvalidInputError } from '@/modules/backtest/errors';
import { WEIGHT_TOLERANCE } from '@/modules/backtest/engine';
import type { Allocation } from '@/modules/backtest/types';
import type { Portfolio } from '@/modules/portfolio/portfolio';
import type { PriceLookup } from '@/modules/portfolio/types';

/**
 * Spends the portfolio's cash on `allocation` at the prices `getPrice` returns.
 * Buys only, no selling. The last symbol takes whatever cash is left so no
 * float residue stays behind.
 */
export async function executeTrade(portfolio: Portfolio, allocation: Allocation, getPrice: PriceLookup): Promise<void> {
  const totalWeight = Object.values(allocation).reduce((s, w) => s + w, 0);
  if (Math.abs(totalWeight - 1) > WEIGHT_TOLERANCE) {
    throw new InvalidInputError(`Allocation must sum to 1.0, but got ${totalWeight}`, { totalWeight });
  }

  const startingCash = portfolio.cash;
  if (startingCash <= 0) {
    throw new InvalidInputError('Portfolio cash must be greater than zero', { cash: startingCash });
  }

  const entries = Object.entries(allocation).filter(([, weight]) => weight > 0);
  for (let i = 0; i < entries.length; i++) {
    const [symbol, weight] = entries[i];
    const cash = i === entries.length - 1 ? portfolio.cash : (startingCash * weight) / totalWeight;
    const price = await getPrice(symbol);
    if (!Number.isFinite(price) || price <= 0) {
      throw new InvalidInputError(`Price for ${symbol} must be greater than zero, got ${price}`, { symbol, price });
    }
    portfolio.buy(symbol, cash / price, price);
    console.log(`[portfolio/trading] Bought ${symbol}: ${(cash / price).toFixed(4)} units @ ${price}`);
  }
}

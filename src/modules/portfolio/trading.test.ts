/**
 * 测试文件：trading.test.ts
 * 覆盖模块：src/modules/portfolio/trading.ts
 * 测试框架：vitest
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { executeTrade } from './trading';
import { Portfolio } from './portfolio';
import { InvalidInputError } from '@/modules/backtest/errors';

const PRICES: Record<string, number> = { VTI: 100, VXUS: 50, BND: 80 };

const priceLookup = vi.fn((symbol: string) => PRICES[symbol]);

beforeEach(() => {
  priceLookup.mockClear();
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('executeTrade', () => {
  it('should_buy_each_symbol_by_weight', async () => {
    // Arrange
    const portfolio = new Portfolio(10_000);

    // Act
    await executeTrade(portfolio, { VTI: 0.5, VXUS: 0.3, BND: 0.2 }, priceLookup);

    // Assert
    expect(portfolio.cash).toBe(0);
    expect(portfolio.holdings).toEqual({ VTI: 50, VXUS: 60, BND: 25 });
    expect(priceLookup.mock.calls.map((c) => c[0])).toEqual(['VTI', 'VXUS', 'BND']);
  });

  it('should_accept_async_price_lookups', async () => {
    const portfolio = new Portfolio(1000);

    await executeTrade(portfolio, { VTI: 1 }, async (symbol) => PRICES[symbol]);

    expect(portfolio.holdings).toEqual({ VTI: 10 });
  });

  it('should_skip_zero_weight_symbols', async () => {
    const portfolio = new Portfolio(1000);

    await executeTrade(portfolio, { VTI: 1, BND: 0 }, priceLookup);

    expect(portfolio.holdings).toEqual({ VTI: 10 });
    expect(priceLookup).toHaveBeenCalledTimes(1);
  });

  it('should_reject_allocation_not_summing_to_one', async () => {
    const portfolio = new Portfolio(1000);

    await expect(executeTrade(portfolio, { VTI: 0.6, VXUS: 0.3 }, priceLookup)).rejects.toThrow(
      'Allocation must sum to 1.0'
    );
    expect(priceLookup).not.toHaveBeenCalled();
  });

  it('should_reject_empty_cash', async () => {
    await expect(executeTrade(new Portfolio(0), { VTI: 1 }, priceLookup)).rejects.toThrow(
      'Portfolio cash must be greater than zero'
    );
  });

  it('should_reject_unusable_prices', async () => {
    const portfolio = new Portfolio(1000);

    await expect(executeTrade(portfolio, { VTI: 1 }, () => 0)).rejects.toThrow(InvalidInputError);
    await expect(executeTrade(portfolio, { VTI: 1 }, () => 0)).rejects.toThrow(
      'Price for VTI must be greater than zero, got 0'
    );
    expect(portfolio.cash).toBe(1000);
  });
});

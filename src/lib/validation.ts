/**
 * Shared lightweight input validation helpers.
 */

import { InvalidInputError } from '@/modules/backtest/errors';

/**
 * Stock/ETF symbol validation (upper-case, dot/hyphen/numbers allowed for tickers).
 *
 * Examples: VTI, VXUS, BRK-B, BRK.B
 */
export function normalizeAndValidateSymbol(input: unknown): string | null {
  if (typeof input !== 'string') return null;
  const symbol = input.toUpperCase().trim();
  // 必须以字母开头，支持字母、数字、连字符、点（如 BRK-B, BRK.B）
  if (!/^[A-Z][A-Z0-9.\-]{0,11}$/.test(symbol)) return null;
  return symbol;
}

/**
 * Parses user-entered initial capital. Accepts "100000", "100,000" and
 * surrounding whitespace; the result must be > 0.
 */
export function parseInitialCapital(raw: string): number {
  const normalized = raw.trim().replace(/,/g, '');
  if (!normalized) {
    throw new InvalidInputError('Initial capital must not be empty');
  }

  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)$/.test(normalized)) {
    throw new InvalidInputError('Initial capital must be a valid number');
  }

  const value = Number(normalized);
  if (!Number.isFinite(value)) {
    throw new InvalidInputError('Initial capital must be a valid number');
  }
  if (value <= 0) {
    throw new InvalidInputError('Initial capital must be greater than zero');
  }
  return value;
}

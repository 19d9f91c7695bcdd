import { z } from 'zod';
import { InvalidInputError } from '@/modules/backtest/errors';
import type { RebalanceFrequency } from '@/modules/backtest/types';

export const REBALANCE_OPTIONS = [
  { frequency: 0, label: 'Buy & Hold' },
  { frequency: 1, label: 'Monthly (1 month)' },
  { frequency: 6, label: 'Semi-Annual (6 months)' },
  { frequency: 12, label: 'Annual (12 months)' },
] as const;

export function getRebalanceLabel(frequency: RebalanceFrequency): string {
  const option = REBALANCE_OPTIONS.find((o) => o.frequency === frequency);
  return option ? option.label : `Every ${frequency} months`;
}

const frequencySchema = z
  .string()
  .trim()
  .regex(/^\d+$/, { message: 'must be a non-negative integer (0 = Buy & Hold)' })
  .transform((val) => Number.parseInt(val, 10));

export function parseRebalanceFrequency(raw: string): RebalanceFrequency {
  const parsed = frequencySchema.safeParse(raw);
  if (!parsed.success) {
    throw new InvalidInputError(`Invalid rebalance frequency "${raw}": ${parsed.error.issues[0].message}`);
  }
  return parsed.data;
}

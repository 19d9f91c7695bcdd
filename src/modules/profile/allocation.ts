import { InvalidInputError } from '@/modules/backtest/errors';
import { WEIGHT_TOLERANCE } from '@/modules/backtest/engine';
import type { Allocation } from '@/modules/backtest/types';
import { RISK_LEVELS, type AllocationTable, type RiskLevel } from '@/modules/profile/types';

// ETF 组合：美股 / 国际股 / 美债 / 国际债 / REITs
export const ALLOCATION_TABLE: AllocationTable = {
  low: { VTI: 0.2, VXUS: 0.1, BND: 0.4, BNDX: 0.2, VNQ: 0.1 },
  medium: { VTI: 0.35, VXUS: 0.2, BND: 0.25, BNDX: 0.1, VNQ: 0.1 },
  high: { VTI: 0.45, VXUS: 0.3, BND: 0.1, BNDX: 0.05, VNQ: 0.1 },
};

function isRiskLevel(value: string): value is RiskLevel {
  return RISK_LEVELS.some((level) => level === value);
}

export function parseRiskLevel(input: string): RiskLevel {
  const normalized = input.trim().toLowerCase();
  if (!isRiskLevel(normalized)) {
    throw new InvalidInputError(`Invalid risk level '${input}'. Valid values: ${RISK_LEVELS.join(', ')}`);
  }
  return normalized;
}

export function riskLevelLabel(level: RiskLevel): string {
  if (level === 'low') return 'Low';
  if (level === 'medium') return 'Moderate';
  return 'High';
}

/** Target weights for a risk level ('low', ' Medium ', 'HIGH' ...). Returns a copy. */
export function getAllocation(riskLevel: string, table: AllocationTable = ALLOCATION_TABLE): Allocation {
  const level = parseRiskLevel(riskLevel);
  const allocation = table[level];

  const total = Object.values(allocation).reduce((s, w) => s + w, 0);
  if (Math.abs(total - 1) > WEIGHT_TOLERANCE) {
    throw new InvalidInputError(`Allocation weights for risk level '${level}' must sum to 1.0, but got ${total}`, {
      level,
      total,
    });
  }

  return { ...allocation };
}

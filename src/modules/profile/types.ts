import type { Allocation } from '@/modules/backtest/types';

export type RiskLevel = 'low' | 'medium' | 'high';

export const RISK_LEVELS: readonly RiskLevel[] = ['low', 'medium', 'high'];

export type RiskAnswers = {
  age: number;
  investmentHorizonYears: number;
  incomeStability: number; // 1-5
  investmentExperience: number; // 1-5
  reactionToDrawdown: number; // 1-5：组合下跌 20% 时的反应
};

export type AllocationTable = Record<RiskLevel, Allocation>;

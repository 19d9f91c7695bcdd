import { z } from 'zod';
import { InvalidInputError } from '@/modules/backtest/errors';
import { formatZodIssues } from '@/modules/backtest/schema';
import type { RiskAnswers, RiskLevel } from '@/modules/profile/types';

const scale = z.number().int().min(1).max(5);

export const riskAnswersSchema = z.object({
  age: z.number().int().min(0),
  investmentHorizonYears: z.number().int().min(1),
  incomeStability: scale,
  investmentExperience: scale,
  reactionToDrawdown: scale,
});

function ageScore(age: number): number {
  if (age <= 30) return 10;
  if (age <= 45) return 7;
  if (age <= 60) return 4;
  return 1;
}

function horizonScore(years: number): number {
  if (years >= 15) return 10;
  if (years >= 10) return 7;
  if (years >= 5) return 4;
  return 1;
}

/**
 * Deterministic questionnaire score, 12 (most conservative) to 70.
 *
 * - age: <=30 → 10, 31-45 → 7, 46-60 → 4, older → 1
 * - horizon: >=15y → 10, 10-14y → 7, 5-9y → 4, shorter → 1
 * - income stability, experience: 1-5, ×3 each
 * - reaction to a 20% drop: 1 (sell everything) to 5 (buy more), ×4
 */
export function calculateRiskScore(answers: RiskAnswers): number {
  const parsed = riskAnswersSchema.safeParse(answers);
  if (!parsed.success) {
    throw new InvalidInputError(formatZodIssues(parsed.error));
  }
  const a = parsed.data;

  return (
    ageScore(a.age) +
    horizonScore(a.investmentHorizonYears) +
    a.incomeStability * 3 +
    a.investmentExperience * 3 +
    a.reactionToDrawdown * 4
  );
}

export function determineRiskLevel(score: number): RiskLevel {
  if (score <= 25) return 'low';
  if (score <= 45) return 'medium';
  return 'high';
}

/**
 * 测试文件：risk.test.ts
 * 覆盖模块：src/modules/profile/risk.ts
 * 测试框架：vitest
 */

import { describe, it, expect } from 'vitest';
import { calculateRiskScore, determineRiskLevel } from './risk';
import { InvalidInputError } from '@/modules/backtest/errors';
import type { RiskAnswers } from './types';

function answers(overrides: Partial<RiskAnswers> = {}): RiskAnswers {
  return {
    age: 40,
    investmentHorizonYears: 10,
    incomeStability: 3,
    investmentExperience: 3,
    reactionToDrawdown: 3,
    ...overrides,
  };
}

// ============================================================================
// calculateRiskScore Tests
// ============================================================================
describe('calculateRiskScore', () => {
  it('should_score_a_moderate_profile', () => {
    // 7 + 7 + 9 + 9 + 12
    expect(calculateRiskScore(answers())).toBe(44);
  });

  it('should_reach_maximum_score', () => {
    const score = calculateRiskScore(
      answers({ age: 25, investmentHorizonYears: 20, incomeStability: 5, investmentExperience: 5, reactionToDrawdown: 5 })
    );

    expect(score).toBe(70);
  });

  it('should_reach_minimum_score', () => {
    const score = calculateRiskScore(
      answers({ age: 65, investmentHorizonYears: 2, incomeStability: 1, investmentExperience: 1, reactionToDrawdown: 1 })
    );

    expect(score).toBe(12);
  });

  it('should_apply_age_and_horizon_bands_at_boundaries', () => {
    // base without age/horizon: 9 + 9 + 12 = 30
    expect(calculateRiskScore(answers({ age: 30, investmentHorizonYears: 15 }))).toBe(50);
    expect(calculateRiskScore(answers({ age: 31, investmentHorizonYears: 14 }))).toBe(44);
    expect(calculateRiskScore(answers({ age: 60, investmentHorizonYears: 5 }))).toBe(38);
    expect(calculateRiskScore(answers({ age: 61, investmentHorizonYears: 4 }))).toBe(32);
  });

  it('should_reject_out_of_range_answers', () => {
    expect(() => calculateRiskScore(answers({ incomeStability: 6 }))).toThrow(InvalidInputError);
    expect(() => calculateRiskScore(answers({ reactionToDrawdown: 0 }))).toThrow('reactionToDrawdown');
    expect(() => calculateRiskScore(answers({ age: -1 }))).toThrow('age');
    expect(() => calculateRiskScore(answers({ investmentHorizonYears: 0 }))).toThrow('investmentHorizonYears');
  });
});

// ============================================================================
// determineRiskLevel Tests
// ============================================================================
describe('determineRiskLevel', () => {
  it('should_map_scores_to_levels_at_thresholds', () => {
    expect(determineRiskLevel(12)).toBe('low');
    expect(determineRiskLevel(25)).toBe('low');
    expect(determineRiskLevel(26)).toBe('medium');
    expect(determineRiskLevel(45)).toBe('medium');
    expect(determineRiskLevel(46)).toBe('high');
    expect(determineRiskLevel(70)).toBe('high');
  });
});

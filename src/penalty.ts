/**
 * Penalty Evaluator
 *
 * Liability charged when a cylinder is returned. The amounts live in
 * PENALTY_POLICY and nowhere else.
 */

import type { ReturnCondition } from './types'

export const PENALTY_POLICY = {
  base: 0,
  /** Any condition other than 'Good' */
  damaged: 500,
  /** Returned past its next test date */
  overdue: 1000,
} as const

export const GOOD_CONDITION = 'Good'

export function isDamaged(condition: ReturnCondition): boolean {
  return condition !== GOOD_CONDITION
}

export function evaluatePenalty(condition: ReturnCondition, isOverdue: boolean): number {
  let amount: number = PENALTY_POLICY.base
  if (isDamaged(condition)) amount += PENALTY_POLICY.damaged
  if (isOverdue) amount += PENALTY_POLICY.overdue
  return amount
}

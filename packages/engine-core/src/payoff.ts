import type { Action, PayoffTable } from './types.js';

/**
 * Map a simultaneous action pair to a score pair.
 *
 * (D, D) → (mutualDefect, mutualDefect)
 * (C, C) → (mutualCooperate, mutualCooperate)
 * (D, C) → (defectWin, cooperateLoss)
 * (C, D) → (cooperateLoss, defectWin)
 */
export function computePayoff(table: PayoffTable, a: Action, b: Action): readonly [number, number] {
  if (a === 'DEFECT' && b === 'DEFECT') {
    return [table.mutualDefect, table.mutualDefect];
  }
  if (a === 'COOPERATE' && b === 'COOPERATE') {
    return [table.mutualCooperate, table.mutualCooperate];
  }
  if (a === 'DEFECT') {
    return [table.defectWin, table.cooperateLoss];
  }
  return [table.cooperateLoss, table.defectWin];
}

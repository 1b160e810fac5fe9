export type BudgetStopReason = 'target_count' | 'max_time' | 'end_cursor';

export type LoopState = {
  recordsStored: number;
  targetCount: number;
  elapsedSeconds: number;
  maxTimeSeconds: number;
  endCursorReached: boolean;
};

/**
 * Checked once at the top of every receive iteration. The deadline is
 * cooperative: a receive that is already waiting is not interrupted.
 */
export function evaluateStopCondition(state: LoopState): BudgetStopReason | null {
  if (state.recordsStored >= state.targetCount) return 'target_count';
  if (state.elapsedSeconds >= state.maxTimeSeconds) return 'max_time';
  if (state.endCursorReached) return 'end_cursor';
  return null;
}

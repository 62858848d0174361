/**
 * Grading Policy
 *
 * Base scores per question kind and the timeout decay curve.
 */

/**
 * Multiplier for a timed answer.
 *
 * Full credit up to the timeout, linear decay to zero at twice the timeout,
 * zero afterwards. Negative or NaN elapsed time counts as 0.
 */
export function timeoutMultiplier(elapsedSeconds: number, timeout?: number): number {
  if (timeout === undefined) return 1;

  const elapsed = Number.isFinite(elapsedSeconds) && elapsedSeconds > 0 ? elapsedSeconds : 0;
  if (elapsed <= timeout) return 1;
  if (elapsed > 2 * timeout) return 0;
  return 1 - (elapsed - timeout) / timeout;
}

/**
 * Ratio of satisfied slots; 0 when nothing is required
 */
export function slotRatio(matched: number, required: number): number {
  return required === 0 ? 0 : matched / required;
}

/**
 * Score outcome buckets used by tallies and reports
 */
export type ScoreOutcome = 'correct' | 'partial' | 'incorrect' | 'ungraded';

export function classifyScore(score: number | null): ScoreOutcome {
  if (score === null) return 'ungraded';
  if (score >= 1) return 'correct';
  if (score <= 0) return 'incorrect';
  return 'partial';
}

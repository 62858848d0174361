/**
 * Attempt folding and aggregation
 */

import type { IResultHistory } from '@/ports/IResultHistory';
import type { AttemptRecord } from './types';

/**
 * Fold corrections onto the records they correct.
 *
 * A correction replaces the score of the latest preceding non-correction
 * record. A correction with nothing before it stands on its own.
 */
export function effectiveAttempts(records: readonly AttemptRecord[]): AttemptRecord[] {
  const result: AttemptRecord[] = [];

  for (const record of records) {
    const target = result.length - 1;
    if (record.isCorrection && target >= 0) {
      result[target] = { ...result[target], score: record.score };
    } else {
      result.push({ ...record, isCorrection: false });
    }
  }

  return result;
}

/**
 * Mean of graded effective scores, or null when nothing was graded
 */
export function aggregateScore(records: readonly AttemptRecord[]): number | null {
  const scores = effectiveAttempts(records)
    .map((record) => record.score)
    .filter((score): score is number => score !== null);

  if (scores.length === 0) return null;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

/**
 * Read-only history over a fixed set of records
 */
export function historyFromRecords(records: readonly AttemptRecord[]): IResultHistory {
  const byQuestion = new Map<string, AttemptRecord[]>();
  for (const record of records) {
    const list = byQuestion.get(record.questionId) ?? [];
    list.push(record);
    byQuestion.set(record.questionId, list);
  }

  return {
    history: (questionId) => byQuestion.get(questionId) ?? [],
  };
}

export const EMPTY_HISTORY: IResultHistory = historyFromRecords([]);

/**
 * Results report
 */

import type { Question } from '@/domain/quiz/types';
import type { IResultHistory } from '@/ports/IResultHistory';
import { aggregateScore, effectiveAttempts } from './attempts';
import type { ResultRow, ResultSort } from './types';

/**
 * Build one row per question; questions never attempted get zero attempts
 */
export function buildResultRows(questions: readonly Question[], history: IResultHistory): ResultRow[] {
  return questions.map((question) => {
    const records = history.history(question.id);
    return {
      questionId: question.id,
      text: question.text[0] ?? question.id,
      attempts: effectiveAttempts(records).length,
      score: aggregateScore(records),
    };
  });
}

/**
 * Stable ordering of rows. best/worst put rows without a score last.
 */
export function sortResultRows(rows: readonly ResultRow[], sort: ResultSort): ResultRow[] {
  const byScore = (direction: 1 | -1) => (a: ResultRow, b: ResultRow) => {
    if (a.score === null || b.score === null) {
      return (a.score === null ? 1 : 0) - (b.score === null ? 1 : 0);
    }
    return direction * (a.score - b.score);
  };

  switch (sort) {
    case 'best':
      return [...rows].sort(byScore(-1));
    case 'worst':
      return [...rows].sort(byScore(1));
    case 'most':
      return [...rows].sort((a, b) => b.attempts - a.attempts);
    case 'least':
      return [...rows].sort((a, b) => a.attempts - b.attempts);
  }
}

/**
 * Per-question results for attempted questions, sorted and optionally limited
 */
export function summarizeResults(
  questions: readonly Question[],
  history: IResultHistory,
  sort: ResultSort,
  limit?: number,
): ResultRow[] {
  const rows = sortResultRows(
    buildResultRows(questions, history).filter((row) => row.attempts > 0),
    sort,
  );
  return limit === undefined ? rows : rows.slice(0, Math.max(0, limit));
}

/**
 * Result History Types
 *
 * Every submitted answer becomes one AttemptRecord. Records are never edited;
 * a correction is a new record with `isCorrection` set.
 */

/**
 * Current result log schema version
 */
export const RESULT_LOG_VERSION = 1;

/**
 * One graded (or ungraded) answer
 */
export interface AttemptRecord {
  questionId: string;
  /** Epoch milliseconds */
  timestamp: number;
  /** Score in [0, 1]; null for an ungraded response */
  score: number | null;
  elapsedSeconds: number;
  /** Overrides the score of the latest preceding non-correction record */
  isCorrection: boolean;
  response?: string | string[];
  timedOut?: boolean;
}

/**
 * Persisted form of a quiz's result log
 */
export interface StoredResultLog {
  version: number;
  quiz: string;
  records: Record<string, AttemptRecord[]>;
  lastUpdated: number;
}

/**
 * Report and preselection orderings
 */
export type ResultSort = 'best' | 'worst' | 'most' | 'least';

export const RESULT_SORTS: readonly ResultSort[] = ['best', 'worst', 'most', 'least'];

export interface ResultRow {
  questionId: string;
  text: string;
  /** Attempts after folding corrections */
  attempts: number;
  /** Mean graded score, null when every attempt was ungraded */
  score: number | null;
}

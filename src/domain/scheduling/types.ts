/**
 * Scheduling Domain Types
 */

import type { ResultSort } from '@/domain/history/types';
import type { Question } from '@/domain/quiz/types';

// ============ Configuration ============

/**
 * Tunables for recency-weighted priority and jitter
 */
export interface SchedulerConfig {
  /** Per-day decay applied to older attempts, in (0, 1) */
  decay: number;
  /** Re-exposure interval that consistently correct questions approach */
  targetIntervalDays: number;
  /** Incorrectness every attempted question carries */
  baselineIncorrectness: number;
  jitterMin: number;
  jitterMax: number;
  /** Priority of a question that was never attempted */
  unseenPriority: number;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  decay: 0.9,
  targetIntervalDays: 14,
  baselineIncorrectness: 0.1,
  jitterMin: 0.5,
  jitterMax: 1.5,
  unseenPriority: Number.POSITIVE_INFINITY,
};

// ============ Filters and Options ============

/**
 * Candidate filters. Glob patterns are matched against each tag.
 */
export interface SessionFilterSet {
  /** Every pattern must match at least one tag */
  tags?: string[];
  /** No tag may match any pattern */
  exclude?: string[];
  /** Every keyword must appear in some prompt variant, case-insensitively */
  keywords?: string[];
  /** Only questions without any record */
  never?: boolean;
}

export type SessionFilters = 'all' | SessionFilterSet;

/**
 * Preselection by past results before ranking
 */
export interface SelectionMode {
  mode: ResultSort;
  limit: number;
}

export interface ScheduleOptions {
  /** Number of questions to take after ranking; all when unset */
  count?: number;
  selection?: SelectionMode;
  /** Keep definition order instead of shuffling (constraints still apply) */
  inOrder?: boolean;
  config?: Partial<SchedulerConfig>;
  /** Epoch milliseconds used for record ages */
  now?: number;
}

// ============ Results ============

/**
 * A candidate with its computed priority
 */
export interface RankedQuestion {
  question: Question;
  priority: number;
  jitter: number;
  /** priority x jitter; the ranking key */
  weighted: number;
}

/**
 * Ordered questions for one sitting
 */
export interface QuizSession {
  readonly id: string;
  /** Seed that reproduces this session */
  readonly seed: number;
  readonly questions: readonly Question[];
  readonly createdAt: number;
}

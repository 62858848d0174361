import type { AttemptRecord } from '@/domain/history/types';

/**
 * Read side of a quiz's result log, as seen by scheduling and reports
 */
export interface IResultHistory {
  /**
   * Records for a question in append order; empty when never attempted
   */
  history(questionId: string): readonly AttemptRecord[];
}

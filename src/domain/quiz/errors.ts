/**
 * Quiz and scheduling errors
 */

export type MalformedQuestionCode =
  | 'EMPTY_ANSWER'
  | 'TIMEOUT_ON_LIST'
  | 'NOCREDIT_ON_SINGLE'
  | 'UNKNOWN_DEPENDENCY'
  | 'DUPLICATE_ID'
  | 'MISSING_FIELD'
  | 'INVALID_FIELD';

/**
 * Raised at load time. Rejects the whole quiz.
 */
export class MalformedQuestionError extends Error {
  constructor(
    message: string,
    public readonly code: MalformedQuestionCode,
    public readonly questionId: string | null = null,
  ) {
    super(questionId ? `Question '${questionId}': ${message}` : message);
    this.name = 'MalformedQuestionError';
  }
}

/**
 * Raised when the selected questions' `depends` links form a cycle.
 * No partial order is produced.
 */
export class DependencyCycleError extends Error {
  public readonly code = 'CYCLE' as const;
  /** Every id on any cycle, in cycle order */
  public readonly ids: string[];

  constructor(public readonly cycles: string[][]) {
    const description = cycles.map((cycle) => [...cycle, cycle[0]].join(' -> ')).join('; ');
    super(`Dependency cycle detected: ${description}`);
    this.name = 'DependencyCycleError';
    this.ids = cycles.flat();
  }
}

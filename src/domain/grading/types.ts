/**
 * Grading Domain Types
 */

/**
 * A labelled multiple-choice presentation
 */
export interface ChoicePresentation {
  /** Option labels in display order, e.g. ['a', 'b', 'c', 'd'] */
  keys: string[];
  /** Option text by label */
  options: Record<string, string>;
  /** Label of the correct option */
  answerKey: string;
}

/**
 * A submission: one line for single-answer kinds, many for lists
 */
export type Submission = string | readonly string[];

export interface GradeOptions {
  /** When set, multiple-choice answers are compared by option key */
  presentation?: ChoicePresentation;
}

/**
 * Outcome of grading one submission
 */
export interface GradeResult {
  /** Final score in [0, 1]; null for ungraded questions */
  score: number | null;
  graded: boolean;
  matchedSlots: number;
  requiredSlots: number;
  /** Timeout multiplier applied to the base score */
  multiplier: number;
  timedOut: boolean;
  /** Canonical spelling of every unsatisfied slot */
  missed: string[];
  /** Submitted lines that earned nothing */
  extras: string[];
  /** Explanation attached to the specific wrong answer given */
  explanation?: string;
  /** Model answer shown after an ungraded question */
  modelAnswer?: string;
}

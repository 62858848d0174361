/**
 * Quiz Domain Types
 *
 * Question records as the scheduler and grader see them. Questions are
 * validated once at load time and are immutable afterwards.
 */

// ============ Question Types ============

/**
 * Question kinds
 */
export type QuestionKind =
  | 'ShortAnswer'
  | 'ListAnswer'
  | 'OrderedListAnswer'
  | 'MultipleChoice'
  | 'Ungraded'
  | 'Flashcard';

export const QUESTION_KINDS: readonly QuestionKind[] = [
  'ShortAnswer',
  'ListAnswer',
  'OrderedListAnswer',
  'MultipleChoice',
  'Ungraded',
  'Flashcard',
];

/**
 * Accepted spellings of one answer. The first entry is the canonical form
 * shown to the user.
 */
export type VariantGroup = readonly string[];

/**
 * Explanation shown when a specific wrong answer is given
 */
export interface Explanation {
  variants: readonly string[];
  text: string;
}

/**
 * A validated quiz question
 */
export interface Question {
  /** Unique within the quiz */
  id: string;
  kind: QuestionKind;
  /** Prompt variants, one is shown per sitting */
  text: readonly string[];
  /**
   * One group for single-answer kinds, one group per required slot for list
   * kinds. Ungraded questions may carry a model answer or nothing.
   */
  answer: readonly VariantGroup[];
  tags: ReadonlySet<string>;
  /** Seconds; single-answer kinds only */
  timeout?: number;
  /** Normalized entries that earn no credit; list kinds only */
  nocredit: ReadonlySet<string>;
  /** Id of the question that must be asked first */
  depends?: string;
  /** Distractors for multiple choice */
  choices: readonly string[];
  explanations: readonly Explanation[];
}

/**
 * Unvalidated question record, as produced by a quiz file loader
 */
export interface QuestionInput {
  id?: string;
  kind?: QuestionKind;
  text?: string | string[];
  answer?: Array<string | string[]>;
  tags?: string[];
  timeout?: number;
  nocredit?: string[];
  depends?: string;
  choices?: string[];
  explanations?: Array<{ variants: string[]; text: string }>;
}

/**
 * A loaded quiz
 */
export interface Quiz {
  instructions?: string;
  questions: Question[];
}

// ============ Kind Helpers ============

export function isQuestionKind(value: unknown): value is QuestionKind {
  return typeof value === 'string' && QUESTION_KINDS.some((kind) => kind === value);
}

export function isListKind(kind: QuestionKind): boolean {
  return kind === 'ListAnswer' || kind === 'OrderedListAnswer';
}

/**
 * Kinds answered with a single response, which may carry a timeout
 */
export function isSingleAnswerKind(kind: QuestionKind): boolean {
  return kind === 'ShortAnswer' || kind === 'MultipleChoice' || kind === 'Flashcard';
}

export function isGradedKind(kind: QuestionKind): boolean {
  return kind !== 'Ungraded';
}

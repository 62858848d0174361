/**
 * Quiz Validation Module
 *
 * Turns loose question records into frozen, typed questions. Any problem
 * rejects the whole quiz.
 */

import { normalizeAnswer, removeNoCreditSlots } from '@/domain/grading/answerMatcher';
import { MalformedQuestionError } from './errors';
import type { Explanation, Question, QuestionInput, QuestionKind, VariantGroup } from './types';
import { isGradedKind, isListKind, isQuestionKind } from './types';

function isBlank(value: string): boolean {
  return value.trim().length === 0;
}

function toTextVariants(text: QuestionInput['text']): string[] {
  if (text === undefined) return [];
  return (typeof text === 'string' ? [text] : text).filter((variant) => !isBlank(variant));
}

function toVariantGroups(answer: QuestionInput['answer'], id: string): VariantGroup[] {
  if (!answer) return [];

  return answer.map((entry) => {
    const variants = typeof entry === 'string' ? [entry] : entry;
    if (variants.length === 0 || variants.some(isBlank)) {
      throw new MalformedQuestionError('answer contains an empty variant group', 'EMPTY_ANSWER', id);
    }
    return Object.freeze([...variants]);
  });
}

function toKind(kind: QuestionInput['kind'], id: string): QuestionKind {
  if (kind === undefined) return 'ShortAnswer';
  if (!isQuestionKind(kind)) {
    throw new MalformedQuestionError(`unknown kind '${String(kind)}'`, 'INVALID_FIELD', id);
  }
  return kind;
}

function toExplanations(input: QuestionInput['explanations'], id: string): Explanation[] {
  return (input ?? []).map((explanation) => {
    if (explanation.variants.length === 0 || isBlank(explanation.text)) {
      throw new MalformedQuestionError('explanation needs variants and text', 'INVALID_FIELD', id);
    }
    return Object.freeze({ variants: Object.freeze([...explanation.variants]), text: explanation.text });
  });
}

/**
 * Validate a single record. Cross-question rules (duplicate ids, dependency
 * targets) are checked by validateQuiz.
 */
export function validateQuestion(input: QuestionInput): Question {
  const text = toTextVariants(input.text);
  const id = input.id ?? text[0];

  if (!id || isBlank(id)) {
    throw new MalformedQuestionError('question has neither id nor text', 'MISSING_FIELD');
  }
  if (text.length === 0) {
    throw new MalformedQuestionError('question has no text', 'MISSING_FIELD', id);
  }

  const kind = toKind(input.kind, id);
  const answer = toVariantGroups(input.answer, id);

  if (isGradedKind(kind) && answer.length === 0) {
    throw new MalformedQuestionError('question has no answer', 'EMPTY_ANSWER', id);
  }

  if (input.timeout !== undefined) {
    if (isListKind(kind)) {
      throw new MalformedQuestionError('timeout is not allowed on list questions', 'TIMEOUT_ON_LIST', id);
    }
    if (!Number.isFinite(input.timeout) || input.timeout <= 0) {
      throw new MalformedQuestionError('timeout must be a positive number', 'INVALID_FIELD', id);
    }
  }

  const nocreditEntries = (input.nocredit ?? []).map(normalizeAnswer).filter((entry) => entry.length > 0);
  if (nocreditEntries.length > 0 && !isListKind(kind)) {
    throw new MalformedQuestionError('nocredit is only allowed on list questions', 'NOCREDIT_ON_SINGLE', id);
  }
  const nocredit = new Set(nocreditEntries);

  if (isListKind(kind) && removeNoCreditSlots(answer, nocredit).length === 0) {
    throw new MalformedQuestionError('every answer slot is marked nocredit', 'EMPTY_ANSWER', id);
  }

  const tags = new Set((input.tags ?? []).map((tag) => tag.trim()).filter((tag) => tag.length > 0));

  const question: Question = {
    id,
    kind,
    text: Object.freeze(text),
    answer: Object.freeze(answer),
    tags,
    nocredit,
    choices: Object.freeze(kind === 'MultipleChoice' ? [...(input.choices ?? [])] : []),
    explanations: Object.freeze(toExplanations(input.explanations, id)),
  };
  if (input.timeout !== undefined) question.timeout = input.timeout;
  if (input.depends !== undefined) question.depends = input.depends;

  return Object.freeze(question);
}

/**
 * Validate a whole quiz
 *
 * @throws MalformedQuestionError on the first invalid record
 */
export function validateQuiz(inputs: readonly QuestionInput[]): Question[] {
  const questions: Question[] = [];
  const seen = new Set<string>();

  for (const input of inputs) {
    const question = validateQuestion(input);
    if (seen.has(question.id)) {
      throw new MalformedQuestionError('duplicate question id', 'DUPLICATE_ID', question.id);
    }
    seen.add(question.id);
    questions.push(question);
  }

  // Targets are checked against the whole quiz, not a session's selection
  for (const question of questions) {
    if (question.depends !== undefined && !seen.has(question.depends)) {
      throw new MalformedQuestionError(
        `depends on unknown question '${question.depends}'`,
        'UNKNOWN_DEPENDENCY',
        question.id,
      );
    }
  }

  return questions;
}

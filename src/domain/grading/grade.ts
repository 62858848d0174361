/**
 * Grade a submission against a question.
 *
 * Grading never throws: an empty or unusable submission scores 0.
 */

import type { Question, VariantGroup } from '@/domain/quiz/types';
import { isListKind, isSingleAnswerKind } from '@/domain/quiz/types';
import { findMatchingGroup, matchOrdered, matchUnordered, matchVariants, normalizeAnswer } from './answerMatcher';
import { slotRatio, timeoutMultiplier } from './gradingPolicy';
import type { GradeOptions, GradeResult, Submission } from './types';

function toLines(submitted: Submission): string[] {
  return typeof submitted === 'string' ? submitted.split(/\r?\n/) : [...submitted];
}

function firstLine(submitted: Submission): string {
  return toLines(submitted).find((line) => line.trim().length > 0) ?? '';
}

function canonical(group: VariantGroup): string {
  return group[0] ?? '';
}

function findExplanation(question: Question, response: string): string | undefined {
  return question.explanations.find((explanation) => matchVariants(response, explanation.variants) === 'Matched')
    ?.text;
}

function gradeList(question: Question, submitted: Submission): GradeResult {
  const match =
    question.kind === 'OrderedListAnswer'
      ? matchOrdered(toLines(submitted), question.answer, question.nocredit)
      : matchUnordered(toLines(submitted), question.answer, question.nocredit);

  const matchedSlots = match.satisfied.filter(Boolean).length;
  return {
    score: slotRatio(matchedSlots, match.slots.length),
    graded: true,
    matchedSlots,
    requiredSlots: match.slots.length,
    multiplier: 1,
    timedOut: false,
    missed: match.slots.filter((_, i) => !match.satisfied[i]).map(canonical),
    extras: match.extras,
  };
}

function gradeSingle(
  question: Question,
  submitted: Submission,
  elapsedSeconds: number,
  options: GradeOptions,
): GradeResult {
  const line = firstLine(submitted);
  const presentation = question.kind === 'MultipleChoice' ? options.presentation : undefined;

  let matched: boolean;
  let response = line;
  if (presentation) {
    const key = normalizeAnswer(line);
    matched = key === presentation.answerKey;
    // Explanations are keyed by option text, not by label
    response = presentation.options[key] ?? line;
  } else {
    matched = line.trim().length > 0 && findMatchingGroup(line, question.answer) !== -1;
  }

  const multiplier = timeoutMultiplier(elapsedSeconds, question.timeout);
  const result: GradeResult = {
    score: (matched ? 1 : 0) * multiplier,
    graded: true,
    matchedSlots: matched ? 1 : 0,
    requiredSlots: 1,
    multiplier,
    timedOut: multiplier < 1,
    missed: matched ? [] : [canonical(question.answer[0] ?? [])],
    extras: matched || line.trim().length === 0 ? [] : [line],
  };

  if (!matched) {
    const explanation = findExplanation(question, response);
    if (explanation !== undefined) result.explanation = explanation;
  }
  return result;
}

function gradeUngraded(question: Question): GradeResult {
  const result: GradeResult = {
    score: null,
    graded: false,
    matchedSlots: 0,
    requiredSlots: 0,
    multiplier: 1,
    timedOut: false,
    missed: [],
    extras: [],
  };
  const model = question.answer[0];
  if (model) result.modelAnswer = canonical(model);
  return result;
}

export function grade(
  question: Question,
  submitted: Submission,
  elapsedSeconds: number,
  options: GradeOptions = {},
): GradeResult {
  if (isListKind(question.kind)) return gradeList(question, submitted);
  if (isSingleAnswerKind(question.kind)) return gradeSingle(question, submitted, elapsedSeconds, options);
  return gradeUngraded(question);
}

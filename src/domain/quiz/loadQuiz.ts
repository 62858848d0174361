/**
 * JSON quiz loading
 *
 * Reads the JSON quiz format and expands its shorthands before validation:
 * - `kind` defaults to ShortAnswer
 * - `text` may be a single string
 * - `answer` may be one value or an array of variants (one answer group)
 * - `answer_list` entries may be strings or arrays of variants
 * - `candidates` are the distractors of a multiple-choice question
 */

import { MalformedQuestionError } from './errors';
import type { Question, QuestionInput, Quiz } from './types';
import { isQuestionKind } from './types';
import { validateQuiz } from './validateQuiz';

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function invalid(message: string, id: string | null = null): MalformedQuestionError {
  return new MalformedQuestionError(message, 'INVALID_FIELD', id);
}

function optionalStrings(raw: JsonObject, field: string, id: string | null): string[] | undefined {
  const value = raw[field];
  if (value === undefined) return undefined;
  if (!isStringArray(value)) throw invalid(`'${field}' must be an array of strings`, id);
  return value;
}

function optionalString(raw: JsonObject, field: string, id: string | null): string | undefined {
  const value = raw[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw invalid(`'${field}' must be a string`, id);
  return value;
}

function expandAnswer(raw: JsonObject, id: string | null): Array<string | string[]> | undefined {
  const list = raw.answer_list;
  if (list !== undefined) {
    if (!Array.isArray(list)) throw invalid("'answer_list' must be an array", id);
    return list.map((entry) => {
      if (typeof entry === 'string' || isStringArray(entry)) return entry;
      throw invalid("'answer_list' entries must be strings or arrays of strings", id);
    });
  }

  const answer = raw.answer;
  if (answer === undefined) return undefined;
  if (typeof answer === 'string') return [[answer]];
  if (isStringArray(answer)) return [answer];
  throw invalid("'answer' must be a string or an array of strings", id);
}

function expandExplanations(raw: JsonObject, id: string | null): QuestionInput['explanations'] {
  const value = raw.explanations;
  if (value === undefined) return undefined;
  if (!Array.isArray(value)) throw invalid("'explanations' must be an array", id);

  return value.map((entry) => {
    // [[variants...], text] pairs or { variants, text } objects
    if (Array.isArray(entry) && entry.length === 2 && isStringArray(entry[0]) && typeof entry[1] === 'string') {
      return { variants: entry[0], text: entry[1] };
    }
    if (isObject(entry) && isStringArray(entry.variants) && typeof entry.text === 'string') {
      return { variants: entry.variants, text: entry.text };
    }
    throw invalid('explanations must be [variants, text] pairs', id);
  });
}

/**
 * Expand one question object from the JSON format into a QuestionInput
 */
export function expandQuestionJson(raw: unknown): QuestionInput {
  if (!isObject(raw)) throw invalid('each question must be an object');

  const id = optionalString(raw, 'id', null) ?? null;
  const text = typeof raw.text === 'string' ? [raw.text] : optionalStrings(raw, 'text', id);

  const kind = raw.kind ?? 'ShortAnswer';
  if (!isQuestionKind(kind)) throw invalid(`unknown kind '${String(kind)}'`, id);

  const timeout = raw.timeout;
  if (timeout !== undefined && typeof timeout !== 'number') {
    throw invalid("'timeout' must be a number of seconds", id);
  }

  return {
    id: id ?? undefined,
    kind,
    text,
    answer: expandAnswer(raw, id),
    tags: optionalStrings(raw, 'tags', id),
    timeout,
    nocredit: optionalStrings(raw, 'nocredit', id),
    depends: optionalString(raw, 'depends', id),
    choices: optionalStrings(raw, 'candidates', id) ?? optionalStrings(raw, 'choices', id),
    explanations: expandExplanations(raw, id),
  };
}

/**
 * Parse and validate a JSON quiz
 *
 * @throws MalformedQuestionError for unparsable JSON, a wrong shape or an invalid question
 */
export function loadQuizFromJson(data: string): Quiz {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw invalid(`quiz is not valid JSON (${reason})`);
  }

  if (!isObject(parsed) || !Array.isArray(parsed.questions)) {
    throw invalid("quiz must be an object with a 'questions' array");
  }

  const instructions = optionalString(parsed, 'instructions', null);
  const questions = validateQuiz(parsed.questions.map(expandQuestionJson));

  return instructions === undefined ? { questions } : { instructions, questions };
}

/**
 * Swap prompt and answer of every flashcard
 */
export function flipFlashcards(questions: readonly Question[]): Question[] {
  return questions.map((question) => {
    if (question.kind !== 'Flashcard') return question;

    // Every front variant becomes an accepted back variant
    const back = question.answer.flat();
    return Object.freeze({
      ...question,
      text: Object.freeze(back),
      answer: Object.freeze([Object.freeze([...question.text])]),
    });
  });
}

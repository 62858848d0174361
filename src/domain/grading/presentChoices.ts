import type { Question } from '@/domain/quiz/types';
import type { RandomSource } from '@/domain/scheduling/random';
import { shuffle } from '@/domain/scheduling/random';
import type { ChoicePresentation } from './types';

const OPTION_KEYS = ['a', 'b', 'c', 'd'] as const;
const MAX_DISTRACTORS = OPTION_KEYS.length - 1;

/**
 * Build the labelled options for a multiple-choice question.
 *
 * Up to three distractors are picked after a shuffle, one accepted variant is
 * added, and the result is shuffled again before labelling.
 */
export function presentChoices(question: Question, rng: RandomSource): ChoicePresentation {
  const distractors = shuffle(question.choices, rng).slice(0, MAX_DISTRACTORS);
  const variants = question.answer[0] ?? [];
  const correct = variants.length > 0 ? variants[Math.floor(rng() * variants.length)] : '';

  const ordered = shuffle([...distractors, correct], rng);
  const keys: string[] = [];
  const options: Record<string, string> = {};
  let answerKey = '';

  ordered.forEach((text, i) => {
    const key = OPTION_KEYS[i];
    keys.push(key);
    options[key] = text;
    if (text === correct && answerKey === '') answerKey = key;
  });

  return { keys, options, answerKey };
}

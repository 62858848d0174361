/**
 * Recency Scorer Module
 *
 * Priority of a question from its attempt history: recent mistakes weigh
 * most, and the longer a question has rested the more eligible it becomes.
 */

import { effectiveAttempts } from '@/domain/history/attempts';
import type { AttemptRecord } from '@/domain/history/types';
import type { Question } from '@/domain/quiz/types';
import type { IResultHistory } from '@/ports/IResultHistory';
import type { RandomSource } from './random';
import { uniform } from './random';
import type { RankedQuestion, SchedulerConfig } from './types';
import { DEFAULT_SCHEDULER_CONFIG } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

function ageInDays(timestamp: number, now: number): number {
  return Math.max(0, (now - timestamp) / DAY_MS);
}

/**
 * Bounded, monotonic growth with rest time. Reaches 1 at the target interval.
 */
export function recencyFactor(daysSinceLastAsked: number, targetIntervalDays: number): number {
  if (targetIntervalDays <= 0) return 1;
  return Math.min(1, Math.max(0, daysSinceLastAsked) / targetIntervalDays);
}

/**
 * Decayed sum of (1 - score) over graded attempts, plus the baseline
 */
export function incorrectnessSignal(
  records: readonly AttemptRecord[],
  config: SchedulerConfig,
  now: number,
): number {
  return effectiveAttempts(records).reduce((signal, record) => {
    if (record.score === null) return signal;
    return signal + config.decay ** ageInDays(record.timestamp, now) * (1 - record.score);
  }, config.baselineIncorrectness);
}

/**
 * Selection priority before jitter
 */
export function computePriority(
  records: readonly AttemptRecord[],
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  now: number = Date.now(),
): number {
  if (records.length === 0) return config.unseenPriority;

  const lastAsked = effectiveAttempts(records).reduce(
    (latest, record) => Math.max(latest, record.timestamp),
    Number.NEGATIVE_INFINITY,
  );
  const signal = incorrectnessSignal(records, config, now);
  return signal * recencyFactor(ageInDays(lastAsked, now), config.targetIntervalDays);
}

/**
 * Rank candidates by jittered priority, highest first.
 *
 * One jitter is drawn per candidate, in candidate order. Unseen questions
 * (infinite priority) are ordered among themselves by their jitter.
 */
export function rankCandidates(
  questions: readonly Question[],
  history: IResultHistory,
  rng: RandomSource,
  config: SchedulerConfig = DEFAULT_SCHEDULER_CONFIG,
  now: number = Date.now(),
): RankedQuestion[] {
  const ranked = questions.map((question) => {
    const priority = computePriority(history.history(question.id), config, now);
    const jitter = uniform(rng, config.jitterMin, config.jitterMax);
    return { question, priority, jitter, weighted: priority * jitter };
  });

  return ranked.sort((a, b) => {
    if (a.weighted === b.weighted) return b.jitter - a.jitter;
    return b.weighted - a.weighted;
  });
}

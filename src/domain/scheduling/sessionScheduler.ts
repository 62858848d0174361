/**
 * Session Scheduler Module
 *
 * Filter, preselect, rank, take, resolve. Every random draw comes from one
 * generator seeded per call, so identical inputs and seed give an identical
 * session.
 */

import { buildResultRows, sortResultRows } from '@/domain/history/summarizeResults';
import type { Question } from '@/domain/quiz/types';
import type { IResultHistory } from '@/ports/IResultHistory';
import { resolveDependencies } from './dependencyResolver';
import { filterCandidates } from './filters';
import { createSeededRandom, drawSeed } from './random';
import { rankCandidates } from './recencyScorer';
import type { QuizSession, ScheduleOptions, SelectionMode, SessionFilters } from './types';
import { DEFAULT_SCHEDULER_CONFIG } from './types';

/**
 * Session id derived from its creation time and seed
 */
export function generateSessionId(createdAt: number, seed: number): string {
  return `session_${createdAt}_${seed.toString(36)}`;
}

/**
 * Keep the best, worst, most or least attempted candidates.
 * best and worst only consider questions with graded results.
 */
export function preselect(
  candidates: readonly Question[],
  history: IResultHistory,
  selection: SelectionMode,
): Question[] {
  const byId = new Map(candidates.map((question) => [question.id, question]));
  const scoreBased = selection.mode === 'best' || selection.mode === 'worst';
  const rows = buildResultRows(candidates, history).filter((row) => !scoreBased || row.score !== null);

  return sortResultRows(rows, selection.mode)
    .slice(0, Math.max(0, selection.limit))
    .flatMap((row) => byId.get(row.questionId) ?? []);
}

/**
 * Plan the ordered questions of one sitting
 *
 * @throws DependencyCycleError when the chosen questions' dependencies form a cycle
 */
export function schedule(
  questions: readonly Question[],
  history: IResultHistory,
  filters: SessionFilters,
  seed?: number,
  options: ScheduleOptions = {},
): QuizSession {
  const config = { ...DEFAULT_SCHEDULER_CONFIG, ...options.config };
  const now = options.now ?? Date.now();
  const sessionSeed = seed ?? drawSeed();
  const rng = createSeededRandom(sessionSeed);

  let candidates = filterCandidates(questions, filters, history);
  if (options.selection) {
    candidates = preselect(candidates, history, options.selection);
  }

  const ranked = rankCandidates(candidates, history, rng, config, now);
  const count = options.count === undefined ? ranked.length : Math.max(0, Math.floor(options.count));
  // Definition order, so cycle reports and the in-order start do not depend on jitter
  const position = new Map(questions.map((question, index) => [question.id, index]));
  const chosen = ranked
    .slice(0, count)
    .map((entry) => entry.question)
    .sort((a, b) => (position.get(a.id) ?? 0) - (position.get(b.id) ?? 0));

  const ordered = resolveDependencies(chosen, rng, { inOrder: options.inOrder });

  return Object.freeze({
    id: generateSessionId(now, sessionSeed),
    seed: sessionSeed,
    questions: Object.freeze(ordered),
    createdAt: now,
  });
}

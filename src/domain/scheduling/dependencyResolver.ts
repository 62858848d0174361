/**
 * Dependency Resolver Module
 *
 * Orders a selection so that every question comes after the question it
 * depends on. Constraints whose predecessor was not selected are dropped.
 */

import { DependencyCycleError } from '@/domain/quiz/errors';
import type { Question } from '@/domain/quiz/types';
import type { RandomSource } from './random';
import { shuffle } from './random';

export interface ResolveOptions {
  /** Start from the given order instead of a seeded shuffle */
  inOrder?: boolean;
}

/**
 * Constraints that apply within the selection: dependent id -> predecessor id
 */
export function activeConstraints(questions: readonly Question[]): Map<string, string> {
  const selected = new Set(questions.map((question) => question.id));
  const constraints = new Map<string, string>();

  for (const question of questions) {
    if (question.depends !== undefined && selected.has(question.depends)) {
      constraints.set(question.id, question.depends);
    }
  }
  return constraints;
}

/**
 * Every cycle among the constraints, each listed by following `depends`
 * links from the first member met in selection order. Ids that only lead
 * into a cycle are not part of it.
 */
export function findDependencyCycles(questions: readonly Question[]): string[][] {
  const constraints = activeConstraints(questions);
  const state = new Map<string, 'visiting' | 'done'>();
  const cycles: string[][] = [];

  for (const question of questions) {
    const path: string[] = [];
    let current: string | undefined = question.id;

    while (current !== undefined && !state.has(current)) {
      state.set(current, 'visiting');
      path.push(current);
      current = constraints.get(current);
    }

    // Reaching a node of the current walk closes a new cycle
    if (current !== undefined && state.get(current) === 'visiting') {
      cycles.push(path.slice(path.indexOf(current)));
    }
    for (const id of path) state.set(id, 'done');
  }

  return cycles;
}

/**
 * Produce a constraint-respecting order.
 *
 * Starts from a seeded permutation (or the given order) and moves any
 * dependent found before its predecessor to just after it, until no move
 * is needed.
 *
 * @throws DependencyCycleError naming every id on every cycle
 */
export function resolveDependencies(
  questions: readonly Question[],
  rng: RandomSource,
  options: ResolveOptions = {},
): Question[] {
  const cycles = findDependencyCycles(questions);
  if (cycles.length > 0) {
    throw new DependencyCycleError(cycles);
  }

  const constraints = activeConstraints(questions);
  const order = options.inOrder ? [...questions] : shuffle(questions, rng);

  let moved = true;
  while (moved) {
    moved = false;
    for (let i = 0; i < order.length; i++) {
      const predecessor = constraints.get(order[i].id);
      if (predecessor === undefined) continue;

      const j = order.findIndex((question) => question.id === predecessor);
      if (j > i) {
        const [dependent] = order.splice(i, 1);
        order.splice(j, 0, dependent);
        moved = true;
        break;
      }
    }
  }

  return order;
}

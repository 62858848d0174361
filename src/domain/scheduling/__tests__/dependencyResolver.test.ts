import { DependencyCycleError } from '@/domain/quiz/errors';
import type { Question } from '@/domain/quiz/types';
import { makeQuestion } from '@/test/fixtures/questions';
import { describe, expect, it } from 'vitest';
import { activeConstraints, findDependencyCycles, resolveDependencies } from '../dependencyResolver';
import { createSeededRandom } from '../random';

function ids(questions: readonly Question[]): string[] {
  return questions.map((question) => question.id);
}

function catchCycle(questions: Question[], seed: number): DependencyCycleError {
  try {
    resolveDependencies(questions, createSeededRandom(seed));
  } catch (error) {
    if (error instanceof DependencyCycleError) return error;
    throw error;
  }
  throw new Error('expected a dependency cycle');
}

describe('activeConstraints', () => {
  it('drops constraints whose predecessor is not selected', () => {
    const a = makeQuestion('a');
    const b = makeQuestion('b', { depends: 'a' });
    const c = makeQuestion('c', { depends: 'missing' });
    expect([...activeConstraints([a, b, c])]).toEqual([['b', 'a']]);
  });
});

describe('findDependencyCycles', () => {
  it('finds nothing in an acyclic selection', () => {
    const questions = [makeQuestion('a'), makeQuestion('b', { depends: 'a' }), makeQuestion('c', { depends: 'b' })];
    expect(findDependencyCycles(questions)).toEqual([]);
  });

  it('reports a self dependency as a cycle of one', () => {
    expect(findDependencyCycles([makeQuestion('a', { depends: 'a' })])).toEqual([['a']]);
  });

  it('reports each cycle once without the ids leading into it', () => {
    const questions = [
      makeQuestion('lead', { depends: 'x' }),
      makeQuestion('x', { depends: 'y' }),
      makeQuestion('y', { depends: 'x' }),
      makeQuestion('p', { depends: 'q' }),
      makeQuestion('q', { depends: 'p' }),
    ];
    expect(findDependencyCycles(questions)).toEqual([
      ['x', 'y'],
      ['p', 'q'],
    ]);
  });
});

describe('resolveDependencies', () => {
  it('places every dependent after its predecessor for any seed', () => {
    const questions = [
      makeQuestion('c', { depends: 'b' }),
      makeQuestion('b', { depends: 'a' }),
      makeQuestion('a'),
      makeQuestion('d', { depends: 'a' }),
      makeQuestion('e'),
      makeQuestion('f', { depends: 'e' }),
    ];

    for (let seed = 0; seed < 100; seed++) {
      const order = ids(resolveDependencies(questions, createSeededRandom(seed)));
      expect([...order].sort()).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
      expect(order.indexOf('a')).toBeLessThan(order.indexOf('b'));
      expect(order.indexOf('b')).toBeLessThan(order.indexOf('c'));
      expect(order.indexOf('a')).toBeLessThan(order.indexOf('d'));
      expect(order.indexOf('e')).toBeLessThan(order.indexOf('f'));
    }
  });

  it('keeps a dependent whose predecessor was not selected', () => {
    const order = resolveDependencies([makeQuestion('b', { depends: 'a' }), makeQuestion('c')], createSeededRandom(1));
    expect([...ids(order)].sort()).toEqual(['b', 'c']);
  });

  it('moves a dependent right after its predecessor in definition order', () => {
    const questions = [makeQuestion('b', { depends: 'a' }), makeQuestion('a'), makeQuestion('c')];
    expect(ids(resolveDependencies(questions, createSeededRandom(1), { inOrder: true }))).toEqual(['a', 'b', 'c']);
  });

  it('keeps definition order when nothing needs to move', () => {
    const questions = [makeQuestion('a'), makeQuestion('b'), makeQuestion('c', { depends: 'a' })];
    expect(ids(resolveDependencies(questions, createSeededRandom(1), { inOrder: true }))).toEqual(['a', 'b', 'c']);
  });

  it('is stable for a fixed seed', () => {
    const questions = ['a', 'b', 'c', 'd', 'e'].map((id) => makeQuestion(id));
    expect(ids(resolveDependencies(questions, createSeededRandom(42)))).toEqual(
      ids(resolveDependencies(questions, createSeededRandom(42))),
    );
  });

  it('fails on a cycle with exactly the cycle ids, for every seed', () => {
    const questions = [
      makeQuestion('a', { depends: 'b' }),
      makeQuestion('b', { depends: 'c' }),
      makeQuestion('c', { depends: 'a' }),
      makeQuestion('d', { depends: 'a' }),
      makeQuestion('e'),
    ];

    for (let seed = 0; seed < 50; seed++) {
      const error = catchCycle(questions, seed);
      expect(error.code).toBe('CYCLE');
      expect(error.ids).toEqual(['a', 'b', 'c']);
      expect(error.cycles).toEqual([['a', 'b', 'c']]);
    }
  });

  it('describes the cycle in the message', () => {
    const questions = [makeQuestion('a', { depends: 'b' }), makeQuestion('b', { depends: 'a' })];
    expect(() => resolveDependencies(questions, createSeededRandom(0))).toThrow(
      'Dependency cycle detected: a -> b -> a',
    );
  });
});

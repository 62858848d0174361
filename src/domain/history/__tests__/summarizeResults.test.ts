import { makeQuestion, makeRecord } from '@/test/fixtures/questions';
import { describe, expect, it } from 'vitest';
import { historyFromRecords } from '../attempts';
import { summarizeResults } from '../summarizeResults';

describe('summarizeResults', () => {
  const questions = ['a', 'b', 'c', 'd'].map((id) => makeQuestion(id));
  const history = historyFromRecords([
    makeRecord('a', 1, 3),
    makeRecord('a', 1, 1),
    makeRecord('b', 0, 2),
    makeRecord('c', null, 2),
  ]);

  const ids = (sort: 'best' | 'worst' | 'most' | 'least', limit?: number) =>
    summarizeResults(questions, history, sort, limit).map((row) => row.questionId);

  it('omits questions without records', () => {
    expect(ids('best')).not.toContain('d');
  });

  it('sorts by score, putting unscored rows last', () => {
    expect(ids('best')).toEqual(['a', 'b', 'c']);
    expect(ids('worst')).toEqual(['b', 'a', 'c']);
  });

  it('sorts by attempt count', () => {
    expect(ids('most')).toEqual(['a', 'b', 'c']);
    expect(ids('least')).toEqual(['b', 'c', 'a']);
  });

  it('limits the number of rows', () => {
    expect(ids('worst', 1)).toEqual(['b']);
  });

  it('reports text, attempts and score', () => {
    expect(summarizeResults(questions, history, 'best')[0]).toEqual({
      questionId: 'a',
      text: 'Question a',
      attempts: 2,
      score: 1,
    });
  });
});

import { historyFromRecords } from '@/domain/history/attempts';
import { NOW, makeQuestion, makeRecord } from '@/test/fixtures/questions';
import { describe, expect, it } from 'vitest';
import { createSeededRandom } from '../random';
import { computePriority, incorrectnessSignal, rankCandidates, recencyFactor } from '../recencyScorer';
import { DEFAULT_SCHEDULER_CONFIG } from '../types';

describe('recencyFactor', () => {
  it('grows with rest time and caps at the target interval', () => {
    expect(recencyFactor(0, 14)).toBe(0);
    expect(recencyFactor(7, 14)).toBe(0.5);
    expect(recencyFactor(14, 14)).toBe(1);
    expect(recencyFactor(60, 14)).toBe(1);
  });

  it('treats negative rest time as none', () => {
    expect(recencyFactor(-3, 14)).toBe(0);
  });
});

describe('incorrectnessSignal', () => {
  it('weighs recent mistakes more than old ones', () => {
    const recent = incorrectnessSignal([makeRecord('q', 0, 1)], DEFAULT_SCHEDULER_CONFIG, NOW);
    const old = incorrectnessSignal([makeRecord('q', 0, 10)], DEFAULT_SCHEDULER_CONFIG, NOW);
    expect(recent).toBeCloseTo(0.1 + 0.9);
    expect(old).toBeCloseTo(0.1 + 0.9 ** 10);
    expect(recent).toBeGreaterThan(old);
  });

  it('counts only the baseline for correct and ungraded attempts', () => {
    const records = [makeRecord('q', 1, 2), makeRecord('q', null, 1)];
    expect(incorrectnessSignal(records, DEFAULT_SCHEDULER_CONFIG, NOW)).toBeCloseTo(0.1);
  });

  it('uses corrected scores', () => {
    const records = [makeRecord('q', 0, 2), makeRecord('q', 1, 2, { isCorrection: true })];
    expect(incorrectnessSignal(records, DEFAULT_SCHEDULER_CONFIG, NOW)).toBeCloseTo(0.1);
  });
});

describe('computePriority', () => {
  it('gives unseen questions the maximum priority', () => {
    expect(computePriority([], DEFAULT_SCHEDULER_CONFIG, NOW)).toBe(Number.POSITIVE_INFINITY);
  });

  it('multiplies the signal by the recency factor', () => {
    expect(computePriority([makeRecord('q', 0, 14)], DEFAULT_SCHEDULER_CONFIG, NOW)).toBeCloseTo(0.1 + 0.9 ** 14);
  });

  it('keeps consistently correct questions eligible once rested', () => {
    expect(computePriority([makeRecord('q', 1, 7)], DEFAULT_SCHEDULER_CONFIG, NOW)).toBeCloseTo(0.05);
    expect(computePriority([makeRecord('q', 1, 30)], DEFAULT_SCHEDULER_CONFIG, NOW)).toBeCloseTo(0.1);
  });

  it('handles very long histories', () => {
    const records = Array.from({ length: 200_000 }, () => makeRecord('q', 1, 30));
    expect(computePriority(records, DEFAULT_SCHEDULER_CONFIG, NOW)).toBeCloseTo(0.1);
  });

  it('gives nothing to a question asked just now', () => {
    expect(computePriority([makeRecord('q', 0, 0)], DEFAULT_SCHEDULER_CONFIG, NOW)).toBe(0);
  });
});

describe('rankCandidates', () => {
  const questions = ['mastered', 'new1', 'new2', 'struggling'].map((id) => makeQuestion(id));
  const history = historyFromRecords([makeRecord('mastered', 1, 7), makeRecord('struggling', 0, 20)]);

  it('puts unseen questions first, then by jittered priority', () => {
    for (let seed = 0; seed < 20; seed++) {
      const ids = rankCandidates(questions, history, createSeededRandom(seed), DEFAULT_SCHEDULER_CONFIG, NOW).map(
        (entry) => entry.question.id,
      );
      expect(ids.slice(0, 2).sort()).toEqual(['new1', 'new2']);
      expect(ids.slice(2)).toEqual(['struggling', 'mastered']);
    }
  });

  it('draws one jitter per candidate within the configured range', () => {
    const ranked = rankCandidates(questions, history, createSeededRandom(5), DEFAULT_SCHEDULER_CONFIG, NOW);
    for (const entry of ranked) {
      expect(entry.jitter).toBeGreaterThanOrEqual(0.5);
      expect(entry.jitter).toBeLessThan(1.5);
      expect(entry.weighted).toBe(entry.priority * entry.jitter);
    }
  });

  it('is reproducible for a seed', () => {
    const first = rankCandidates(questions, history, createSeededRandom(8), DEFAULT_SCHEDULER_CONFIG, NOW);
    const second = rankCandidates(questions, history, createSeededRandom(8), DEFAULT_SCHEDULER_CONFIG, NOW);
    expect(second).toEqual(first);
  });
});

import { describe, expect, it } from 'vitest';
import {
  findMatchingGroup,
  matchOrdered,
  matchUnordered,
  matchVariants,
  normalizeAnswer,
  removeNoCreditLines,
  removeNoCreditSlots,
} from '../answerMatcher';

describe('normalizeAnswer', () => {
  it('trims and case-folds', () => {
    expect(normalizeAnswer('  PaRis \n')).toBe('paris');
  });

  it('keeps inner whitespace and punctuation', () => {
    expect(normalizeAnswer(' New  York. ')).toBe('new  york.');
  });
});

describe('matchVariants', () => {
  it('matches any variant regardless of case and surrounding whitespace', () => {
    expect(matchVariants('  UNITED KINGDOM ', ['UK', 'United Kingdom'])).toBe('Matched');
  });

  it('does not strip punctuation', () => {
    expect(matchVariants('Paris.', ['Paris'])).toBe('Unmatched');
  });

  it('does not match an unrelated answer', () => {
    expect(matchVariants('Lyon', ['Paris'])).toBe('Unmatched');
  });
});

describe('findMatchingGroup', () => {
  it('returns the index of the first satisfied group', () => {
    expect(findMatchingGroup('b', [['a'], ['B', 'c'], ['b']])).toBe(1);
    expect(findMatchingGroup('z', [['a'], ['b']])).toBe(-1);
  });
});

describe('nocredit removal', () => {
  it('drops slots containing a nocredit variant', () => {
    const slots = [['red'], ['White', 'ivory'], ['blue']];
    expect(removeNoCreditSlots(slots, new Set(['white']))).toEqual([['red'], ['blue']]);
  });

  it('drops blank and nocredit lines', () => {
    expect(removeNoCreditLines(['red', '  ', 'WHITE', 'blue'], new Set(['white']))).toEqual(['red', 'blue']);
  });
});

describe('matchUnordered', () => {
  const slots = [['red'], ['green'], ['blue']];

  it('accepts any order', () => {
    const result = matchUnordered(['Blue', 'red', 'GREEN'], slots);
    expect(result.satisfied).toEqual([true, true, true]);
    expect(result.extras).toEqual([]);
  });

  it('records duplicates and unknown lines as extras', () => {
    const result = matchUnordered(['blue', 'red', 'red', 'purple'], slots);
    expect(result.satisfied).toEqual([true, false, true]);
    expect(result.extras).toEqual(['red', 'purple']);
  });

  it('assigns each line to the first open slot it satisfies', () => {
    const result = matchUnordered(['a', 'b'], [['a', 'b'], ['a']]);
    expect(result.satisfied).toEqual([true, false]);
    expect(result.extras).toEqual(['b']);
  });

  it('removes nocredit entries from slots and lines', () => {
    const result = matchUnordered(['white', 'red'], [['red'], ['white'], ['blue']], new Set(['white']));
    expect(result.slots).toEqual([['red'], ['blue']]);
    expect(result.satisfied).toEqual([true, false]);
    expect(result.extras).toEqual([]);
  });
});

describe('matchOrdered', () => {
  const slots = [['Mercury'], ['Venus'], ['Earth']];

  it('satisfies every position when in order', () => {
    expect(matchOrdered(['mercury', 'venus', 'earth'], slots).satisfied).toEqual([true, true, true]);
  });

  it('does not credit correct values in the wrong position', () => {
    const result = matchOrdered(['Venus', 'Earth', 'Mercury'], slots);
    expect(result.satisfied).toEqual([false, false, false]);
    expect(result.extras).toEqual(['Venus', 'Earth', 'Mercury']);
  });

  it('treats lines beyond the required count as extras', () => {
    const result = matchOrdered(['Mercury', 'Venus', 'Earth', 'Mars'], slots);
    expect(result.satisfied).toEqual([true, true, true]);
    expect(result.extras).toEqual(['Mars']);
  });
});

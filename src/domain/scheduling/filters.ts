import micromatch from 'micromatch';
import type { Question } from '@/domain/quiz/types';
import type { IResultHistory } from '@/ports/IResultHistory';
import type { SessionFilters } from './types';

const MATCH_OPTIONS = { dot: true };

/**
 * Check if any tag matches a glob pattern
 */
function anyTagMatches(tags: ReadonlySet<string>, patterns: string | string[]): boolean {
  for (const tag of tags) {
    if (micromatch.isMatch(tag, patterns, MATCH_OPTIONS)) return true;
  }
  return false;
}

function containsKeyword(question: Question, keyword: string): boolean {
  const needle = keyword.toLowerCase();
  return question.text.some((variant) => variant.toLowerCase().includes(needle));
}

/**
 * Check a question against the session filters
 */
export function matchesFilters(question: Question, filters: SessionFilters, history: IResultHistory): boolean {
  if (filters === 'all') return true;

  const include = filters.tags ?? [];
  if (!include.every((pattern) => anyTagMatches(question.tags, pattern))) return false;

  const exclude = filters.exclude ?? [];
  if (exclude.length > 0 && anyTagMatches(question.tags, exclude)) return false;

  const keywords = filters.keywords ?? [];
  if (!keywords.every((keyword) => containsKeyword(question, keyword))) return false;

  if (filters.never && history.history(question.id).length > 0) return false;

  return true;
}

/**
 * Candidate subset in definition order
 */
export function filterCandidates(
  questions: readonly Question[],
  filters: SessionFilters,
  history: IResultHistory,
): Question[] {
  return questions.filter((question) => matchesFilters(question, filters, history));
}

/**
 * Count questions per tag, sorted by tag
 */
export function listTags(questions: readonly Question[]): Array<{ tag: string; count: number }> {
  const counts = new Map<string, number>();
  for (const question of questions) {
    for (const tag of question.tags) {
      counts.set(tag, (counts.get(tag) ?? 0) + 1);
    }
  }

  return Array.from(counts, ([tag, count]) => ({ tag, count })).sort((a, b) =>
    a.tag < b.tag ? -1 : a.tag > b.tag ? 1 : 0,
  );
}

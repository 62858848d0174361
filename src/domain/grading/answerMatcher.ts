/**
 * Answer Matcher
 *
 * Compares submitted answers against accepted variants. Two strings are
 * equivalent when they are equal after trimming and case-folding. Punctuation
 * and inner whitespace are significant.
 */

import type { VariantGroup } from '@/domain/quiz/types';

export type MatchOutcome = 'Matched' | 'Unmatched';

/**
 * Result of matching a list of submitted lines against required slots
 */
export interface ListMatch {
  /** Required slots after nocredit removal */
  slots: VariantGroup[];
  /** Per slot, whether it was satisfied */
  satisfied: boolean[];
  /** Submitted lines (after nocredit removal) that earned nothing */
  extras: string[];
}

export function normalizeAnswer(answer: string): string {
  return answer.trim().toLowerCase();
}

/**
 * Match one submitted string against a group of accepted variants
 */
export function matchVariants(submitted: string, variants: readonly string[]): MatchOutcome {
  const normalized = normalizeAnswer(submitted);
  return variants.some((variant) => normalizeAnswer(variant) === normalized)
    ? 'Matched'
    : 'Unmatched';
}

/**
 * Match against any of several groups, returning the index of the first
 * group satisfied or -1
 */
export function findMatchingGroup(submitted: string, groups: readonly VariantGroup[]): number {
  return groups.findIndex((group) => matchVariants(submitted, group) === 'Matched');
}

/**
 * Drop slots that contain a nocredit entry
 */
export function removeNoCreditSlots(
  slots: readonly VariantGroup[],
  nocredit: ReadonlySet<string>,
): VariantGroup[] {
  if (nocredit.size === 0) return [...slots];
  return slots.filter((slot) => !slot.some((variant) => nocredit.has(normalizeAnswer(variant))));
}

/**
 * Drop blank lines and nocredit entries from a submission
 */
export function removeNoCreditLines(lines: readonly string[], nocredit: ReadonlySet<string>): string[] {
  return lines.filter((line) => {
    const normalized = normalizeAnswer(line);
    return normalized.length > 0 && !nocredit.has(normalized);
  });
}

/**
 * Unordered matching. Each line, in the order entered, claims the first
 * not-yet-satisfied slot it matches. Lines matching nothing left are extras.
 */
export function matchUnordered(
  lines: readonly string[],
  slots: readonly VariantGroup[],
  nocredit: ReadonlySet<string> = new Set(),
): ListMatch {
  const required = removeNoCreditSlots(slots, nocredit);
  const satisfied = required.map(() => false);
  const extras: string[] = [];

  for (const line of removeNoCreditLines(lines, nocredit)) {
    const index = required.findIndex(
      (slot, i) => !satisfied[i] && matchVariants(line, slot) === 'Matched',
    );
    if (index === -1) {
      extras.push(line);
    } else {
      satisfied[index] = true;
    }
  }

  return { slots: required, satisfied, extras };
}

/**
 * Ordered matching. The k-th line must satisfy the k-th slot; a correct value
 * in the wrong position earns nothing.
 */
export function matchOrdered(
  lines: readonly string[],
  slots: readonly VariantGroup[],
  nocredit: ReadonlySet<string> = new Set(),
): ListMatch {
  const required = removeNoCreditSlots(slots, nocredit);
  const submitted = removeNoCreditLines(lines, nocredit);
  const satisfied = required.map(
    (slot, i) => i < submitted.length && matchVariants(submitted[i], slot) === 'Matched',
  );
  const extras = submitted.filter(
    (line, i) => i >= required.length || matchVariants(line, required[i]) === 'Unmatched',
  );

  return { slots: required, satisfied, extras };
}

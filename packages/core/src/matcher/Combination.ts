import type { CardLabel } from '../cards/index.js';

/**
 * A required multiset of cards. Order is irrelevant, duplicates are not:
 * ["Island", "Island"] needs two Islands in the hand.
 */
export type Combination = readonly CardLabel[];

/** Count occurrences of each label */
export function countLabels(labels: readonly CardLabel[]): Map<CardLabel, number> {
  const counts = new Map<CardLabel, number>();
  for (const label of labels) {
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }
  return counts;
}

/**
 * Whether the hand holds at least as many copies of every label as the combination asks for.
 * Labels in the hand that the combination does not mention are ignored.
 * The empty combination always matches.
 */
export function matchesCombination(hand: readonly CardLabel[], combination: Combination): boolean {
  if (combination.length === 0) {
    return true;
  }

  const handCounts = countLabels(hand);
  for (const [label, required] of countLabels(combination)) {
    if ((handCounts.get(label) ?? 0) < required) {
      return false;
    }
  }
  return true;
}

/** Labels sorted into canonical order */
export function canonicalLabels(combination: Combination): CardLabel[] {
  return [...combination].sort();
}

/**
 * Order-independent identity of a combination.
 * Two combinations share a key iff they are the same multiset.
 */
export function canonicalKey(combination: Combination): string {
  return JSON.stringify(canonicalLabels(combination));
}

import { InvalidConfigurationError } from '../errors/index.js';

/**
 * Name of a card, e.g. "Forest" or "Ancestral Recall"
 */
export type CardLabel = string;

/**
 * How many copies of each card the deck holds, e.g. { Forest: 17, Island: 7 }
 */
export type CardDefinition = Readonly<Record<CardLabel, number>>;

/**
 * Check a card definition before any deck is built from it.
 * Throws InvalidConfigurationError naming the first offending entry.
 */
export function validateCardDefinition(definition: CardDefinition): void {
  const entries = Object.entries(definition);
  if (entries.length === 0) {
    throw new InvalidConfigurationError('cards', 'Card definition must contain at least one card.');
  }

  for (const [label, count] of entries) {
    if (label.length === 0) {
      throw new InvalidConfigurationError('cards', 'Card label must be a non-empty string.');
    }
    if (!Number.isInteger(count) || count <= 0) {
      throw new InvalidConfigurationError(
        label,
        `Card count for '${label}' must be a positive integer. Found: ${count}`
      );
    }
  }
}

/** Total number of cards the definition produces */
export function deckSize(definition: CardDefinition): number {
  let total = 0;
  for (const count of Object.values(definition)) {
    total += count;
  }
  return total;
}

/** Every label repeated by its count, in definition order. Does not validate. */
export function expandDefinition(definition: CardDefinition): CardLabel[] {
  const cards: CardLabel[] = [];
  for (const [label, count] of Object.entries(definition)) {
    for (let i = 0; i < count; i++) {
      cards.push(label);
    }
  }
  return cards;
}

/** Whether the definition contains at least one copy of `label` */
export function isDefinedLabel(definition: CardDefinition, label: CardLabel): boolean {
  return Object.prototype.hasOwnProperty.call(definition, label);
}

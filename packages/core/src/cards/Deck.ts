import { assertNonNegativeInteger } from '../errors/index.js';
import type { RandomSource } from '../random/index.js';
import { type CardDefinition, type CardLabel, expandDefinition, validateCardDefinition } from './CardDefinition.js';

/**
 * Cards drawn from the front of a deck
 */
export type OpenedHand = CardLabel[];

/**
 * A finite multiset of labeled cards with shuffle and draw operations.
 * Drawing moves a cursor over the current order; the card array is never spliced.
 */
export class Deck {
  private cards: CardLabel[];
  private position: number = 0;
  private random: RandomSource;

  private constructor(cards: CardLabel[], random: RandomSource) {
    this.cards = cards;
    this.random = random;
  }

  /** Expand a card definition into an unshuffled deck, in definition order */
  static fromDefinition(definition: CardDefinition, random: RandomSource): Deck {
    validateCardDefinition(definition);
    return new Deck(expandDefinition(definition), random);
  }

  /** Create deck from specific labels in the given order (for testing) */
  static fromLabels(labels: readonly CardLabel[], random: RandomSource): Deck {
    return new Deck([...labels], random);
  }

  /** Number of cards not yet drawn */
  get remaining(): number {
    return this.cards.length - this.position;
  }

  /** Total cards in deck (including drawn) */
  get size(): number {
    return this.cards.length;
  }

  /** Shuffle the deck using Fisher-Yates algorithm */
  shuffle(): this {
    this.position = 0;
    const arr = this.cards;
    for (let i = arr.length - 1; i > 0; i--) {
      const j = this.random.nextInt(i + 1);
      [arr[i], arr[j]] = [arr[j], arr[i]];
    }
    return this;
  }

  /**
   * Draw up to `count` cards from the front.
   * Returns fewer when the deck runs out; that is not an error.
   */
  draw(count: number): OpenedHand {
    assertNonNegativeInteger('drawCount', count);
    const end = Math.min(this.position + count, this.cards.length);
    const hand = this.cards.slice(this.position, end);
    this.position = end;
    return hand;
  }

  /** Get all remaining cards without drawing them */
  peekRemaining(): CardLabel[] {
    return this.cards.slice(this.position);
  }
}

/**
 * Build a freshly shuffled deck for one trial
 */
export function buildDeck(definition: CardDefinition, random: RandomSource): Deck {
  return Deck.fromDefinition(definition, random).shuffle();
}

/**
 * Open `count` cards from the deck's current position
 */
export function openHand(deck: Deck, count: number): OpenedHand {
  return deck.draw(count);
}

export * from './CardDefinition.js';
export * from './Deck.js';

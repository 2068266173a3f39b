export * from './DeckPresets.js';

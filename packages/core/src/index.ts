// Core opening-hand simulation library

// Errors
export * from './errors/index.js';

// Random sources
export * from './random/index.js';

// Cards and decks
export * from './cards/index.js';

// Combination matching
export * from './matcher/index.js';

// Monte Carlo simulation
export * from './simulator/index.js';

// Reporting
export * from './analyzer/index.js';

// Example decks
export * from './presets/index.js';

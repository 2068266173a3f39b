export * from './Combination.js';

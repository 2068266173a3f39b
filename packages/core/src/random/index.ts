export * from './RandomSource.js';

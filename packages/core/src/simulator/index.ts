export * from './types.js';
export * from './Simulator.js';

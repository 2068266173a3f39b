export * from './ProbabilityReport.js';

import type { CardDefinition, CardLabel } from '../cards/index.js';
import type { Combination } from '../matcher/index.js';
import type { RandomSource } from '../random/index.js';

/**
 * Configuration for running a simulation
 */
export interface SimulationConfig {
  /** Card labels and how many copies of each the deck holds */
  cards: CardDefinition;

  /** Number of cards opened in each trial */
  drawCount: number;

  /** Combinations to track; duplicates within one are meaningful */
  combinations: readonly Combination[];

  /** Number of trials to run */
  trials: number;

  /** Random seed for reproducibility (optional) */
  seed?: number;
}

export interface SimulatorOptions {
  /** Overrides the seed-derived source, e.g. with a deterministic stub */
  random?: RandomSource;
}

export interface RunOptions {
  /** Called every `progressInterval` trials and once when the run ends */
  onProgress?: (completed: number, total: number) => void;

  /** Trials between progress callbacks (default 1000) */
  progressInterval?: number;

  /** Checked between trials; once aborted the partial result is returned */
  signal?: AbortSignal;
}

/**
 * Non-fatal problem found before the run starts
 */
export interface SimulationWarning {
  code: 'undefined-label';

  /** The label missing from the card definition */
  label: CardLabel;

  /** The combination as it was configured */
  combination: CardLabel[];

  message: string;
}

/**
 * Hit count for one tracked combination
 */
export interface CombinationTally {
  /** Canonical identity shared by every equivalent combination */
  key: string;

  /** Labels in canonical order */
  labels: CardLabel[];

  /** Configured combinations that collapsed onto this tally, as given */
  sources: CardLabel[][];

  /**
   * Matches summed over every entry in `sources`: a trial meeting a
   * combination configured twice adds 2, so hits can exceed the trial count
   */
  hits: number;
}

export interface SimulationMetadata {
  /** Unique identifier for this simulation run */
  id: string;

  /** When the simulation was run */
  createdAt: string;

  /** Configuration used */
  config: SimulationConfig;

  /** How long the simulation took (ms) */
  durationMs: number;

  /** Version of the simulator */
  version: string;
}

/**
 * Complete simulation results
 */
export interface SimulationResult {
  metadata: SimulationMetadata;

  /** Sum of all card counts */
  deckSize: number;

  /** Trials actually completed; below the configured count only when aborted */
  trialCount: number;

  /** Whether the run stopped early on its abort signal */
  aborted: boolean;

  /** One tally per distinct tracked multiset, in order of first appearance */
  combinations: CombinationTally[];

  /** Trials in which at least one tracked combination was met */
  matchedAnyCount: number;

  /** Trials in which no tracked combination was met */
  noMatchCount: number;

  warnings: SimulationWarning[];
}

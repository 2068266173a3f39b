import { setImmediate } from 'node:timers/promises';
import {
  type CardLabel,
  Deck,
  deckSize,
  expandDefinition,
  isDefinedLabel,
  openHand,
  validateCardDefinition
} from '../cards/index.js';
import { assertNonNegativeInteger, InvalidConfigurationError } from '../errors/index.js';
import { canonicalKey, canonicalLabels, matchesCombination } from '../matcher/index.js';
import { type RandomSource, randomSourceFor } from '../random/index.js';
import type {
  CombinationTally,
  RunOptions,
  SimulationConfig,
  SimulationMetadata,
  SimulationResult,
  SimulationWarning,
  SimulatorOptions
} from './types.js';

const VERSION = '1.0.0';
const DEFAULT_PROGRESS_INTERVAL = 1000;

/** Counters for one run in progress */
interface RunState {
  startTime: number;
  options: RunOptions;
  interval: number;
  tallies: CombinationTally[];
  noMatchCount: number;
  completed: number;
  aborted: boolean;
}

/**
 * Monte Carlo opening-hand simulator.
 * Opens many random hands and counts how often each tracked combination shows up.
 */
export class Simulator {
  private config: SimulationConfig;
  private labels: CardLabel[];
  private random: RandomSource;
  private tallies: CombinationTally[];
  private warnings: SimulationWarning[];

  /**
   * Validates the whole configuration eagerly; a bad config never starts a trial.
   * The config is copied, so later changes to the caller's object do not reach the run.
   */
  constructor(config: SimulationConfig, options: SimulatorOptions = {}) {
    validateCardDefinition(config.cards);
    assertNonNegativeInteger('drawCount', config.drawCount);
    assertNonNegativeInteger('trials', config.trials);
    validateCombinations(config);

    this.config = {
      ...config,
      cards: { ...config.cards },
      combinations: config.combinations.map(c => [...c])
    };
    this.labels = expandDefinition(this.config.cards);
    this.random = options.random ?? randomSourceFor(this.config.seed);
    this.tallies = createTallies(this.config);
    this.warnings = findUndefinedLabels(this.config);
  }

  /** Advisory warnings found while validating the configuration */
  getWarnings(): SimulationWarning[] {
    return this.warnings.map(w => ({ ...w, combination: [...w.combination] }));
  }

  /**
   * Run the simulation and return results
   */
  run(options: RunOptions = {}): SimulationResult {
    const state = this.startRun(options);
    while (this.shouldContinue(state)) {
      this.runTrial(state);
    }
    return this.finishRun(state);
  }

  /**
   * Same as run(), but yields to the event loop after every progress interval
   * so that signal handlers (e.g. SIGINT) get a chance to abort the run.
   */
  async runAsync(options: RunOptions = {}): Promise<SimulationResult> {
    const state = this.startRun(options);
    while (this.shouldContinue(state)) {
      this.runTrial(state);
      if (state.completed % state.interval === 0) {
        await setImmediate();
      }
    }
    return this.finishRun(state);
  }

  private startRun(options: RunOptions): RunState {
    return {
      startTime: Date.now(),
      options,
      interval: Math.max(1, options.progressInterval ?? DEFAULT_PROGRESS_INTERVAL),
      // Fresh counters so a simulator can run more than once
      tallies: this.tallies.map(t => ({ ...t, sources: t.sources.map(s => [...s]), hits: 0 })),
      noMatchCount: 0,
      completed: 0,
      aborted: false
    };
  }

  private shouldContinue(state: RunState): boolean {
    if (state.completed >= this.config.trials) {
      return false;
    }
    if (state.options.signal?.aborted) {
      state.aborted = true;
      return false;
    }
    return true;
  }

  /**
   * Simulate a single opening hand
   */
  private runTrial(state: RunState): void {
    const { drawCount, trials } = this.config;
    const hand = openHand(Deck.fromLabels(this.labels, this.random).shuffle(), drawCount);

    let matchedAny = false;
    for (const tally of state.tallies) {
      if (matchesCombination(hand, tally.labels)) {
        // Every configured entry counts, so duplicates add more than one per trial
        tally.hits += tally.sources.length;
        matchedAny = true;
      }
    }
    if (!matchedAny) {
      state.noMatchCount++;
    }

    state.completed++;
    const { onProgress } = state.options;
    if (onProgress && state.completed % state.interval === 0) {
      onProgress(state.completed, trials);
    }
  }

  private finishRun(state: RunState): SimulationResult {
    const { completed, noMatchCount, options } = state;
    if (options.onProgress && completed % state.interval !== 0) {
      options.onProgress(completed, this.config.trials);
    }

    const endTime = Date.now();

    const metadata: SimulationMetadata = {
      id: runId(state.startTime, this.config.seed),
      createdAt: new Date().toISOString(),
      config: this.config,
      durationMs: endTime - state.startTime,
      version: VERSION
    };

    return {
      metadata,
      deckSize: deckSize(this.config.cards),
      trialCount: completed,
      aborted: state.aborted,
      combinations: state.tallies,
      matchedAnyCount: completed - noMatchCount,
      noMatchCount,
      warnings: this.getWarnings()
    };
  }
}

function validateCombinations(config: SimulationConfig): void {
  config.combinations.forEach((combination, index) => {
    if (!Array.isArray(combination)) {
      throw new InvalidConfigurationError(
        `combinations[${index}]`,
        `Combination ${index} must be a list of card labels.`
      );
    }
    for (const label of combination) {
      if (typeof label !== 'string') {
        throw new InvalidConfigurationError(
          `combinations[${index}]`,
          `Combination ${index} contains a non-string label: ${String(label)}`
        );
      }
    }
  });
}

/**
 * One tally per distinct multiset; equivalent combinations share it and each adds to its hits
 */
function createTallies(config: SimulationConfig): CombinationTally[] {
  const byKey = new Map<string, CombinationTally>();
  for (const combination of config.combinations) {
    const key = canonicalKey(combination);
    const existing = byKey.get(key);
    if (existing) {
      existing.sources.push([...combination]);
    } else {
      byKey.set(key, {
        key,
        labels: canonicalLabels(combination),
        sources: [[...combination]],
        hits: 0
      });
    }
  }
  return [...byKey.values()];
}

function findUndefinedLabels(config: SimulationConfig): SimulationWarning[] {
  const warnings: SimulationWarning[] = [];
  for (const combination of config.combinations) {
    for (const label of new Set(combination)) {
      if (!isDefinedLabel(config.cards, label)) {
        warnings.push({
          code: 'undefined-label',
          label,
          combination: [...combination],
          message: `Card '${label}' in combination ${JSON.stringify(combination)} is not defined in the card definition.`
        });
      }
    }
  }
  return warnings;
}

/**
 * Run identifier built from the start time and the seed ("r" when unseeded)
 */
export function runId(startTime: number, seed?: number): string {
  const suffix = seed !== undefined ? `s${seed}` : 'r';
  return `sim_${startTime.toString(36)}_${suffix}`;
}

/**
 * Convenience function to run a simulation in one call
 */
export function runSimulation(
  config: SimulationConfig,
  options?: SimulatorOptions & RunOptions
): SimulationResult {
  const simulator = new Simulator(config, options);
  return simulator.run(options);
}

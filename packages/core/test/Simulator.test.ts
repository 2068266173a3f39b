import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, InvalidConfigurationError } from '../src/errors/index.js';
import { createRandomSource } from '../src/random/index.js';
import { runId, runSimulation, Simulator } from '../src/simulator/index.js';
import type { SimulationConfig, SimulationResult } from '../src/simulator/index.js';

// With j = 0 at every Fisher-Yates step, { A: 2, B: 2 } always shuffles to [A, B, B, A]
const alwaysZero = () => createRandomSource(() => 0);
// With j = i at every step the deck keeps definition order: [A, A, B, B]
const alwaysTop = () => createRandomSource(() => 0.999);

function config(overrides: Partial<SimulationConfig> = {}): SimulationConfig {
  return {
    cards: { A: 2, B: 2 },
    drawCount: 2,
    combinations: [['A']],
    trials: 1,
    ...overrides
  };
}

function hits(result: SimulationResult): number[] {
  return result.combinations.map(c => c.hits);
}

/** n choose k */
function choose(n: number, k: number): number {
  let result = 1;
  for (let i = 0; i < k; i++) {
    result = result * (n - i) / (i + 1);
  }
  return result;
}

describe('Simulator', () => {
  describe('known draws', () => {
    it('counts a single-card combination present in [A, B]', () => {
      const result = new Simulator(config(), { random: alwaysZero() }).run();

      expect(hits(result)).toEqual([1]);
      expect(result.noMatchCount).toBe(0);
      expect(result.matchedAnyCount).toBe(1);
      expect(result.trialCount).toBe(1);
      expect(result.deckSize).toBe(4);
    });

    it('does not count [A, A] when only one A was drawn', () => {
      const result = new Simulator(config({ combinations: [['A', 'A']] }), { random: alwaysZero() }).run();

      expect(hits(result)).toEqual([0]);
      expect(result.noMatchCount).toBe(1);
    });

    it('counts [A, A] when both copies were drawn', () => {
      const result = new Simulator(config({ combinations: [['A', 'A']] }), { random: alwaysTop() }).run();

      expect(hits(result)).toEqual([1]);
      expect(result.noMatchCount).toBe(0);
    });

    it('rebuilds the deck every trial', () => {
      const result = new Simulator(
        config({ combinations: [['A', 'B'], ['B', 'B']], trials: 5 }),
        { random: alwaysZero() }
      ).run();

      expect(hits(result)).toEqual([5, 0]);
      expect(result.noMatchCount).toBe(0);
    });
  });

  describe('drawCount = 0', () => {
    it('never matches a non-empty combination', () => {
      const result = new Simulator(
        config({ drawCount: 0, combinations: [['A'], ['B', 'B']], trials: 50, seed: 1 })
      ).run();

      expect(hits(result)).toEqual([0, 0]);
      expect(result.noMatchCount).toBe(50);
    });

    it('always matches the empty combination', () => {
      const result = new Simulator(
        config({ drawCount: 0, combinations: [[], ['A']], trials: 50, seed: 1 })
      ).run();

      expect(hits(result)).toEqual([50, 0]);
      expect(result.noMatchCount).toBe(0);
    });
  });

  describe('duplicate combinations', () => {
    it('collapses permutations of the same multiset onto one tally', () => {
      const result = new Simulator(
        config({ combinations: [['A', 'B'], ['B', 'A']], trials: 3 }),
        { random: alwaysZero() }
      ).run();

      // Both configured entries match every [A, B] hand: 2 per trial on the shared tally
      expect(result.combinations).toEqual([
        { key: '["A","B"]', labels: ['A', 'B'], sources: [['A', 'B'], ['B', 'A']], hits: 6 }
      ]);
      expect(result.matchedAnyCount).toBe(3);
      expect(result.noMatchCount).toBe(0);
    });

    it('counts trials, not entries, in the aggregate counters', () => {
      const result = new Simulator(
        config({ combinations: [['A'], ['A'], ['B', 'B']], trials: 2 }),
        { random: alwaysZero() }
      ).run();

      expect(hits(result)).toEqual([4, 0]);
      expect(result.matchedAnyCount).toBe(2);
      expect(result.matchedAnyCount + result.noMatchCount).toBe(result.trialCount);
    });

    it('adds nothing for duplicates that do not match', () => {
      const result = new Simulator(
        config({ combinations: [['A', 'A'], ['A', 'A']], trials: 4 }),
        { random: alwaysZero() }
      ).run();

      expect(hits(result)).toEqual([0]);
      expect(result.noMatchCount).toBe(4);
    });

    it('keeps the position of the first appearance', () => {
      const result = new Simulator(
        config({ combinations: [['B'], ['A'], ['B']], trials: 0 })
      ).run();

      expect(result.combinations.map(c => c.key)).toEqual(['["B"]', '["A"]']);
    });
  });

  describe('warnings', () => {
    it('reports labels missing from the card definition and still runs', () => {
      const simulator = new Simulator(
        config({ combinations: [['A', 'Z', 'Z'], ['A']], trials: 2 }),
        { random: alwaysZero() }
      );

      expect(simulator.getWarnings()).toEqual([
        {
          code: 'undefined-label',
          label: 'Z',
          combination: ['A', 'Z', 'Z'],
          message: 'Card \'Z\' in combination ["A","Z","Z"] is not defined in the card definition.'
        }
      ]);

      const result = simulator.run();
      expect(hits(result)).toEqual([0, 2]);
      expect(result.warnings).toHaveLength(1);
    });

    it('reports nothing when every label is defined', () => {
      expect(new Simulator(config({ combinations: [['A', 'B']] })).getWarnings()).toEqual([]);
    });
  });

  describe('validation', () => {
    it('rejects a negative trial count', () => {
      expect(() => new Simulator(config({ trials: -1 }))).toThrow(InvalidArgumentError);
      expect(() => new Simulator(config({ trials: -1 }))).toThrow(
        'trials must be a non-negative integer. Found: -1'
      );
    });

    it('rejects a negative draw count', () => {
      expect(() => new Simulator(config({ drawCount: -2 }))).toThrow(
        'drawCount must be a non-negative integer. Found: -2'
      );
    });

    it('rejects a malformed card definition before any trial', () => {
      let drawn = 0;
      const random = createRandomSource(() => {
        drawn++;
        return 0;
      });

      expect(() => new Simulator(config({ cards: { A: 2, B: 0 } }), { random })).toThrow(
        InvalidConfigurationError
      );
      expect(drawn).toBe(0);
    });

    it('is not affected by changes to the config after construction', () => {
      const cards: Record<string, number> = { A: 2, B: 2 };
      const combinations = [['A']];
      const simulator = new Simulator(
        { cards, drawCount: 2, combinations, trials: 3 },
        { random: alwaysZero() }
      );

      cards.B = 0;
      cards.C = 5;
      combinations[0].push('C');

      const result = simulator.run();
      expect(hits(result)).toEqual([3]);
      expect(result.deckSize).toBe(4);
      expect(result.metadata.config.cards).toEqual({ A: 2, B: 2 });
      expect(result.metadata.config.combinations).toEqual([['A']]);
    });

    it('returns zero counters for zero trials', () => {
      const result = runSimulation(config({ trials: 0, combinations: [['A'], ['B']] }));

      expect(hits(result)).toEqual([0, 0]);
      expect(result.noMatchCount).toBe(0);
      expect(result.matchedAnyCount).toBe(0);
      expect(result.trialCount).toBe(0);
      expect(result.aborted).toBe(false);
    });
  });

  describe('randomness', () => {
    it('is reproducible with a seed', () => {
      const seeded = config({
        cards: { A: 3, B: 5, C: 12 },
        drawCount: 5,
        combinations: [['A'], ['B', 'B'], ['A', 'C']],
        trials: 2000,
        seed: 42
      });

      const first = runSimulation(seeded);
      const second = runSimulation(seeded);

      expect(first.combinations).toEqual(second.combinations);
      expect(first.noMatchCount).toBe(second.noMatchCount);
    });

    it('converges to the hypergeometric probability of drawing at least one copy', () => {
      const trials = 20000;
      const result = runSimulation({
        cards: { Target: 3, Other: 17 },
        drawCount: 5,
        combinations: [['Target']],
        trials,
        seed: 7
      });

      // P(at least one) = 1 - C(17, 5) / C(20, 5)
      const expected = 1 - choose(17, 5) / choose(20, 5);
      const observed = result.combinations[0].hits / trials;
      expect(Math.abs(observed - expected)).toBeLessThan(0.02);
    });

    it('keeps the counter invariants', () => {
      const result = runSimulation({
        cards: { A: 4, B: 4, C: 4 },
        drawCount: 3,
        combinations: [['A'], ['B'], ['A', 'B', 'C']],
        trials: 1000,
        seed: 99
      });

      expect(result.matchedAnyCount + result.noMatchCount).toBe(1000);
      for (const tally of result.combinations) {
        expect(tally.hits).toBeLessThanOrEqual(1000);
      }
    });
  });

  describe('run control', () => {
    it('reports progress at each interval and at the end', () => {
      const calls: [number, number][] = [];
      new Simulator(config({ trials: 25 }), { random: alwaysZero() }).run({
        progressInterval: 10,
        onProgress: (completed, total) => calls.push([completed, total])
      });

      expect(calls).toEqual([[10, 25], [20, 25], [25, 25]]);
    });

    it('stops between trials once aborted', () => {
      const controller = new AbortController();
      const result = new Simulator(config({ trials: 100 }), { random: alwaysZero() }).run({
        signal: controller.signal,
        progressInterval: 10,
        onProgress: completed => {
          if (completed >= 10) controller.abort();
        }
      });

      expect(result.aborted).toBe(true);
      expect(result.trialCount).toBe(10);
      expect(hits(result)).toEqual([10]);
      expect(result.matchedAnyCount + result.noMatchCount).toBe(10);
    });

    it('runs nothing with an already aborted signal', () => {
      const controller = new AbortController();
      controller.abort();
      const result = new Simulator(config({ trials: 100 })).run({ signal: controller.signal });

      expect(result.aborted).toBe(true);
      expect(result.trialCount).toBe(0);
    });

    it('starts from zero on every run', () => {
      const simulator = new Simulator(config({ trials: 4 }), { random: alwaysZero() });
      simulator.run();

      expect(hits(simulator.run())).toEqual([4]);
    });

    it('gives the same counts asynchronously', async () => {
      const seeded = config({ cards: { A: 5, B: 15 }, drawCount: 4, trials: 3000, seed: 123 });

      const sync = new Simulator(seeded).run();
      const fromAsync = await new Simulator(seeded).runAsync({ progressInterval: 500 });

      expect(fromAsync.combinations).toEqual(sync.combinations);
      expect(fromAsync.noMatchCount).toBe(sync.noMatchCount);
    });

    it('prefers an injected random source over the seed', () => {
      const result = new Simulator(
        config({ combinations: [['A', 'A']], seed: 1, trials: 3 }),
        { random: alwaysTop() }
      ).run();

      expect(hits(result)).toEqual([3]);
    });

    it('records the configuration in the metadata', () => {
      const cfg = config({ trials: 2 });
      const result = runSimulation(cfg);

      expect(result.metadata.config).toEqual(cfg);
      expect(result.metadata.config).not.toBe(cfg);
      expect(result.metadata.id).toMatch(/^sim_[0-9a-z]+_r$/);
      expect(result.metadata.version).toBe('1.0.0');
    });
  });

  describe('runId', () => {
    it('encodes the start time and the seed', () => {
      expect(runId(36, 7)).toBe('sim_10_s7');
      expect(runId(35)).toBe('sim_z_r');
    });

    it('uses the configured seed', () => {
      const result = runSimulation(config({ trials: 1, seed: 3 }));
      expect(result.metadata.id).toMatch(/^sim_[0-9a-z]+_s3$/);
    });
  });
});

import type { CardLabel } from '../cards/index.js';
import type { SimulationResult } from '../simulator/types.js';

/**
 * Observed frequency of one tracked combination
 */
export interface CombinationSummary {
  labels: CardLabel[];
  hits: number;
  percentage: number;
}

export interface CountSummary {
  count: number;
  percentage: number;
}

/**
 * Percentages derived from a simulation result
 */
export interface SimulationSummary {
  deckSize: number;
  trialCount: number;
  combinations: CombinationSummary[];

  /** Trials where at least one tracked combination was met */
  atLeastOne: CountSummary;

  /** Trials where none was met */
  none: CountSummary;
}

/** count / total as a percentage, 0 when nothing was run */
export function percentage(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(2)}%`;
}

/**
 * Divide every counter by the number of completed trials
 */
export function summarizeResult(result: SimulationResult): SimulationSummary {
  const { trialCount } = result;

  return {
    deckSize: result.deckSize,
    trialCount,
    combinations: result.combinations.map(tally => ({
      labels: [...tally.labels],
      hits: tally.hits,
      percentage: percentage(tally.hits, trialCount)
    })),
    atLeastOne: {
      count: result.matchedAnyCount,
      percentage: percentage(result.matchedAnyCount, trialCount)
    },
    none: {
      count: result.noMatchCount,
      percentage: percentage(result.noMatchCount, trialCount)
    }
  };
}

/**
 * Human-readable report, one string per line
 */
export function formatReport(result: SimulationResult): string[] {
  const { config } = result.metadata;
  const summary = summarizeResult(result);
  const lines: string[] = [];

  lines.push(`Card definitions: ${JSON.stringify(config.cards)}`);
  lines.push(`Total deck size: ${summary.deckSize} cards`);
  lines.push(`Cards opened per trial: ${config.drawCount}`);
  lines.push(`Target combinations: ${JSON.stringify(config.combinations)}`);

  lines.push('');
  lines.push('--- Simulation Summary ---');
  lines.push(`Total trials run: ${summary.trialCount}`);
  if (result.aborted) {
    lines.push(`Stopped early after ${summary.trialCount} of ${config.trials} trials.`);
  }

  lines.push('');
  lines.push('--- Individual Combinations ---');
  for (const combo of summary.combinations) {
    lines.push(`Combination ${JSON.stringify(combo.labels)} was met in ${combo.hits} out of ${summary.trialCount} trials.`);
    lines.push(`  Probability: ${formatPercentage(combo.percentage)}`);
  }

  lines.push('');
  lines.push('--- Overall Hand Statistics ---');
  lines.push(`Hands where AT LEAST ONE target combination was met: ${summary.atLeastOne.count} out of ${summary.trialCount} trials.`);
  lines.push(`  Probability: ${formatPercentage(summary.atLeastOne.percentage)}`);
  lines.push(`Hands where NONE of the target combinations were met: ${summary.none.count} out of ${summary.trialCount} trials.`);
  lines.push(`  Probability: ${formatPercentage(summary.none.percentage)}`);

  return lines;
}

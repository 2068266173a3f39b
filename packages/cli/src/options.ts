import {
  type CardLabel,
  type Combination,
  getPreset,
  InvalidArgumentError,
  type SimulationConfig,
  SUPPORTED_PRESETS
} from '@opening-hand/core';

export const VERSION = '1.0.0';

export const DEFAULT_DRAW_COUNT = 5;
export const DEFAULT_TRIALS = 100000;

export type Command = 'simulate' | 'presets' | 'help' | 'version';
export type OutputFormat = 'table' | 'json';

const FORMATS: readonly OutputFormat[] = ['table', 'json'];

export interface CLIOptions {
  command: Command;
  preset?: string;
  cards: [CardLabel, number][];
  combos: CardLabel[][];
  draw?: number;
  trials?: number;
  seed?: number;
  format: OutputFormat;
}

function isOutputFormat(value: string): value is OutputFormat {
  return (FORMATS as readonly string[]).includes(value);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index];
  if (value === undefined) {
    throw new InvalidArgumentError(flag, `Missing value for ${flag}`);
  }
  return value;
}

function parseInteger(flag: string, value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError(flag, `${flag} expects an integer. Found: ${value}`);
  }
  return parseInt(value, 10);
}

/** "Label=3" -> ["Label", 3]; the last '=' separates, so labels may contain '=' */
export function parseCardArg(value: string): [CardLabel, number] {
  const separator = value.lastIndexOf('=');
  if (separator < 0) {
    throw new InvalidArgumentError('--card', `--card expects <label>=<count>. Found: ${value}`);
  }
  const label = value.slice(0, separator).trim();
  const count = value.slice(separator + 1).trim();
  return [label, count.length > 0 ? Number(count) : NaN];
}

/** "A, B,A" -> ["A", "B", "A"] */
export function parseComboArg(value: string): CardLabel[] {
  return value
    .split(',')
    .map(s => s.trim())
    .filter(s => s.length > 0);
}

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    command: 'help',
    cards: [],
    combos: [],
    format: 'table'
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'simulate':
      case 'sim':
        options.command = 'simulate';
        break;

      case 'presets':
        options.command = 'presets';
        break;

      case 'help':
      case '--help':
      case '-h':
        options.command = 'help';
        break;

      case '--version':
      case '-v':
        options.command = 'version';
        break;

      case '--preset':
      case '-p':
        i++;
        options.preset = requireValue(args, i, arg);
        break;

      case '--card':
      case '-c':
        i++;
        options.cards.push(parseCardArg(requireValue(args, i, arg)));
        break;

      case '--combo':
      case '-k':
        i++;
        options.combos.push(parseComboArg(requireValue(args, i, arg)));
        break;

      case '--draw':
      case '-d':
        i++;
        options.draw = parseInteger(arg, requireValue(args, i, arg));
        break;

      case '--trials':
      case '-i':
        i++;
        options.trials = parseInteger(arg, requireValue(args, i, arg));
        break;

      case '--seed':
      case '-s':
        i++;
        options.seed = parseInteger(arg, requireValue(args, i, arg));
        break;

      case '--format':
      case '-f': {
        i++;
        const format = requireValue(args, i, arg);
        if (!isOutputFormat(format)) {
          throw new InvalidArgumentError(arg, `Invalid format: ${format}. Supported: ${FORMATS.join(', ')}`);
        }
        options.format = format;
        break;
      }

      default:
        throw new InvalidArgumentError('arguments', `Unknown argument: ${arg}`);
    }

    i++;
  }

  return options;
}

/**
 * Merge preset and flags into a simulation config.
 * --card entries add to or override preset counts; any --combo replaces the preset's combinations.
 */
export function buildConfig(options: CLIOptions): SimulationConfig {
  const preset = options.preset !== undefined ? getPreset(options.preset) : undefined;

  // fromEntries defines own properties, so labels like "__proto__" survive
  const cards: Record<CardLabel, number> = Object.fromEntries([
    ...Object.entries(preset?.cards ?? {}),
    ...options.cards
  ]);

  const combinations: readonly Combination[] =
    options.combos.length > 0 ? options.combos : preset?.combinations ?? [];

  return {
    cards,
    drawCount: options.draw ?? preset?.drawCount ?? DEFAULT_DRAW_COUNT,
    combinations,
    trials: options.trials ?? DEFAULT_TRIALS,
    seed: options.seed
  };
}

export const HELP_TEXT = `
Opening Hand Simulator CLI v${VERSION}

USAGE:
  opening-hand <command> [options]

COMMANDS:
  simulate, sim    Run Monte Carlo simulation
  presets          List built-in example decks
  help             Show this help message

OPTIONS:
  -p, --preset <name>      Start from a preset: ${SUPPORTED_PRESETS.join(', ')}
  -c, --card <label=n>     Card and its count in the deck (repeatable)
  -k, --combo <a,b,...>    Combination to track (repeatable, duplicates matter)
  -d, --draw <n>           Cards opened per trial (default: ${DEFAULT_DRAW_COUNT})
  -i, --trials <n>         Number of trials (default: ${DEFAULT_TRIALS})
  -s, --seed <n>           Random seed for reproducibility
  -f, --format <format>    Output format: table, json (default: table)

EXAMPLES:
  # Chance of opening a Scout, or Medic + Beacon, in a 20-card deck
  opening-hand simulate -c Scout=3 -c "Field Medic=3" -c "Relay Beacon=2" -c Filler=12 \\
    -k Scout -k "Field Medic,Relay Beacon" -d 5 -i 50000

  # Run a preset with a fixed seed and print JSON
  opening-hand sim --preset combo --seed 42 -f json
`;

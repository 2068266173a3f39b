import type { CardDefinition } from '../cards/index.js';
import { InvalidArgumentError } from '../errors/index.js';
import type { Combination } from '../matcher/index.js';

/**
 * Preset identifier
 */
export type PresetName = 'starter' | 'combo';

/**
 * A ready-made deck with the openers worth tracking
 */
export interface DeckPreset {
  readonly name: PresetName;

  /** Human-readable description */
  readonly description: string;

  readonly cards: CardDefinition;

  /** Cards in an opening hand */
  readonly drawCount: number;

  readonly combinations: readonly Combination[];
}

const STARTER: DeckPreset = {
  name: 'starter',
  description: '20-card starter deck: one-card starters or two-card bridges',
  cards: {
    'Scout': 3,
    'Relay Beacon': 2,
    'Field Medic': 3,
    'Filler': 12
  },
  drawCount: 5,
  combinations: [
    ['Scout'],
    ['Relay Beacon', 'Field Medic'],
    ['Field Medic', 'Field Medic']
  ]
};

const COMBO: DeckPreset = {
  name: 'combo',
  description: '40-card combo deck: engine pieces plus extenders',
  cards: {
    'Tide Caller': 3,
    'Deep Herald': 2,
    'Reef Minstrel': 1,
    'Coral Shrine': 3,
    'Shadow Diver': 3,
    'Lance Rider': 3,
    'Abyssal Oracle': 3,
    'One for One': 1,
    'Non Engine': 21
  },
  drawCount: 5,
  combinations: [
    ['Tide Caller'],
    ['Deep Herald'],
    ['Coral Shrine', 'Reef Minstrel'],
    ['Coral Shrine', 'Shadow Diver'],
    ['Coral Shrine', 'Lance Rider'],
    ['Shadow Diver', 'Shadow Diver'],
    ['Abyssal Oracle', 'Coral Shrine'],
    ['Abyssal Oracle', 'Lance Rider']
  ]
};

const PRESETS: Record<PresetName, DeckPreset> = {
  starter: STARTER,
  combo: COMBO
};

export const SUPPORTED_PRESETS: readonly PresetName[] = ['starter', 'combo'] as const;

export function isPresetName(name: string): name is PresetName {
  return (SUPPORTED_PRESETS as readonly string[]).includes(name);
}

/**
 * Look up a preset by name
 */
export function getPreset(name: string): DeckPreset {
  if (!isPresetName(name)) {
    throw new InvalidArgumentError(
      'preset',
      `Unknown preset: ${name}. Supported: ${SUPPORTED_PRESETS.join(', ')}`
    );
  }
  return PRESETS[name];
}

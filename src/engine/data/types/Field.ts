// ─────────────────────────────────────────────
//  Field State Types
// ─────────────────────────────────────────────

import type { SideId } from './Combatant';

export type Weather = 'none' | 'sun' | 'rain' | 'sand' | 'snow';
export type Terrain = 'none' | 'electric' | 'grassy' | 'psychic' | 'misty';

export interface SideHazards {
  stealthRock: boolean;
  /** 0..3 layers */
  spikes: number;
  /** 0..2 layers */
  toxicSpikes: number;
  stickyWeb: boolean;
}

/** Timed side effects, as turns remaining (0 = inactive) */
export interface SideScreens {
  reflect: number;
  lightScreen: number;
  auroraVeil: number;
  tailwind: number;
}

export interface SideField {
  hazards: SideHazards;
  screens: SideScreens;
}

export interface FieldState {
  weather: Weather;
  terrain: Terrain;
  trickRoom: boolean;
  turn: number;
  sides: Record<SideId, SideField>;
}

export function emptySide(): SideField {
  return {
    hazards: { stealthRock: false, spikes: 0, toxicSpikes: 0, stickyWeb: false },
    screens: { reflect: 0, lightScreen: 0, auroraVeil: 0, tailwind: 0 },
  };
}

export function createField(overrides: Partial<FieldState> = {}): FieldState {
  return {
    weather: 'none',
    terrain: 'none',
    trickRoom: false,
    turn: 1,
    sides: { ours: emptySide(), theirs: emptySide() },
    ...overrides,
  };
}

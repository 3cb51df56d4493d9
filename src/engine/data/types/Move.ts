// ─────────────────────────────────────────────
//  Move Types
// ─────────────────────────────────────────────

import type { PokemonType } from './Combatant';

export type MoveCategory = 'physical' | 'special' | 'status';

/** Condition that selects between a variable-power move's published powers */
export type PowerCondition =
  | 'targetStatused'   // Hex, Infernal Parade
  | 'userStatused'     // Facade
  | 'userNoItem'       // Acrobatics
  | 'targetHasItem'    // Knock Off
  | 'targetWeight';    // Low Kick, Grass Knot — weight is never in the snapshot

export interface VariablePower {
  condition: PowerCondition;
  /** Power when the condition does not hold (the published floor) */
  min: number;
  /** Power when it does */
  max: number;
}

export interface MoveFlags {
  contact?: boolean;
  /** Fixed hit count, or an inclusive [min, max] range */
  multihit?: number | [number, number];
  fixedDamage?: 'level' | 'halfHp';
  ohko?: boolean;
  /** Fraction of damage dealt taken back by the user */
  recoil?: number;
  /** Fraction of damage dealt restored to the user */
  drain?: number;
  variablePower?: VariablePower;
}

/** One record of the static move table — never mutated */
export interface MoveData {
  id: string;
  name: string;
  type: PokemonType;
  category: MoveCategory;
  basePower: number;
  /** 0..100, or true for moves that never miss */
  accuracy: number | true;
  priority: number;
  flags: MoveFlags;
}

export function isDamaging(move: MoveData): boolean {
  return move.category !== 'status';
}

/** Hit chance in [0, 1] */
export function hitChance(move: MoveData): number {
  return move.accuracy === true ? 1 : move.accuracy / 100;
}

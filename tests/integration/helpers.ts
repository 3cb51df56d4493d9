// ─────────────────────────────────────────────
//  Test Helpers
//  Build combatants, fields and snapshots headlessly.
//  Base stats default to 100 across the board (362 HP / 257 elsewhere at L100).
// ─────────────────────────────────────────────

import type { Combatant, MoveSlot, StatBlock } from '@/engine/data/types/Combatant';
import type { FieldState } from '@/engine/data/types/Field';
import { createField } from '@/engine/data/types/Field';
import type { BattleSnapshot } from '@/engine/data/types/Snapshot';
import type { MatchupOutcome } from '@/engine/data/types/Analysis';

export const FLAT_BASE: StatBlock = { hp: 100, atk: 100, def: 100, spa: 100, spd: 100, spe: 100 };

/** Revealed move slots */
export function known(...ids: string[]): MoveSlot[] {
  return ids.map(id => ({ id, revealed: true }));
}

/**
 * A level-100 Normal-type with flat base stats and nothing held.
 * `baseStats` overrides merge over the flat block.
 */
export function makeCombatant(
  id: string,
  overrides: Omit<Partial<Combatant>, 'baseStats'> & { baseStats?: Partial<StatBlock> } = {},
): Combatant {
  const { baseStats, ...rest } = overrides;
  return {
    id,
    side: 'ours',
    species: id,
    types: ['normal'],
    level: 100,
    hpPercent: 100,
    status: 'none',
    boosts: {},
    item: '',
    ability: '',
    moves: [],
    ...rest,
    baseStats: { ...FLAT_BASE, ...baseStats },
  };
}

export function neutralField(overrides: Partial<FieldState> = {}): FieldState {
  return createField(overrides);
}

export function makeSnapshot(overrides: Partial<BattleSnapshot> = {}): BattleSnapshot {
  return {
    ours: { active: null, bench: [] },
    theirs: { active: null, bench: [] },
    field: createField(),
    legalMoves: [],
    lockedMoveId: null,
    ...overrides,
  };
}

/** A fixed outcome, for stubbing matchup lookups */
export function outcome(result: MatchupOutcome['result'], winnerHp: number | null = null): MatchupOutcome {
  return {
    result,
    winnerRemainingHpPercent: winnerHp,
    turnsToResolve: 3,
    note: 'stub',
    aRemainingHpPercent: result === 'a_wins' ? winnerHp ?? 0 : 0,
    bRemainingHpPercent: result === 'b_wins' ? winnerHp ?? 0 : 0,
    aMoveId: null,
    bMoveId: null,
    order: 'a_first',
  };
}

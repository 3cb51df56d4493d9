// ─────────────────────────────────────────────
//  Battle Snapshot — read-only input from the protocol client
// ─────────────────────────────────────────────

import type { Combatant } from './Combatant';
import type { FieldState } from './Field';

export interface SideSnapshot {
  active: Combatant | null;
  /** Non-active team members, fainted ones included */
  bench: Combatant[];
}

export interface BattleSnapshot {
  ours: SideSnapshot;
  theirs: SideSnapshot;
  field: FieldState;
  /** Move ids our active may legally choose this turn */
  legalMoves: string[];
  /** Set when a Choice item has locked the active into one move */
  lockedMoveId: string | null;
}

export type OpponentPrediction =
  | { kind: 'move'; moveId: string; probability: number }
  | { kind: 'switch'; targetId: string; probability: number };

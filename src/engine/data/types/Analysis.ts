// ─────────────────────────────────────────────
//  Analysis Result Types
//  Value objects handed back to the orchestration layer.
// ─────────────────────────────────────────────

import type { StatusCondition } from './Combatant';
import type { EngineIssueCode } from '@/engine/errors';

export interface DamageRange {
  /** Percent of the defender's max HP; may exceed 100 for overkill */
  minPercent: number;
  maxPercent: number;
  /** Fraction of rolls that KO from the defender's current HP */
  koProbability: number;
  /** Mean damage over the roll (and hit-count) distribution */
  expectedPercent: number;
  /** Type-chart multiplier; 0 for any immunity */
  effectiveness: number;
  /** Expected number of hits (1 for single-hit moves) */
  hits: number;
  /** True when a conservative default stood in for missing information */
  estimated: boolean;
  assumptions: string[];
}

export type MatchupResult = 'a_wins' | 'b_wins' | 'draw' | 'undetermined';

export interface MatchupOutcome {
  result: MatchupResult;
  /** Set iff the result names a winner; always in (0, 100] */
  winnerRemainingHpPercent: number | null;
  turnsToResolve: number;
  note: string;
  aRemainingHpPercent: number;
  bRemainingHpPercent: number;
  aMoveId: string | null;
  bMoveId: string | null;
  order: 'a_first' | 'b_first' | 'simultaneous';
}

export interface MatchupKey {
  aId: string;
  bId: string;
  aHpBucket: number;
  bHpBucket: number;
  aStatus: StatusCondition;
  bStatus: StatusCondition;
  aBoosts: string;
  bBoosts: string;
  field: string;
}

/** Shared shape of every ranked recommendation */
export interface RankedOption<TFields> {
  id: string;
  /** 1 = best */
  rank: number;
  fields: TFields;
  reasoning: string;
  /** Stable string compared last so equal options keep a fixed order */
  tieBreakKey: string;
}

export interface Ranking<TOption> {
  options: TOption[];
  /** Present when `options` is empty */
  reason?: EngineIssueCode;
  detail?: string;
}

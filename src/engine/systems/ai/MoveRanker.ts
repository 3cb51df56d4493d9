// ─────────────────────────────────────────────
//  Move Ranker
//  Orders our legal moves by KO tier, then damage to the active,
//  then damage to the likely switch-in, then accuracy.
//  Every reasoning string is built from the numeric fields alone.
// ─────────────────────────────────────────────

import type { Combatant } from '@/engine/data/types/Combatant';
import type { MoveData } from '@/engine/data/types/Move';
import { hitChance } from '@/engine/data/types/Move';
import type { FieldState } from '@/engine/data/types/Field';
import type { DamageRange, RankedOption, Ranking } from '@/engine/data/types/Analysis';
import type { OpponentPrediction } from '@/engine/data/types/Snapshot';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG } from '@/config';
import { InvalidMoveKindError } from '@/engine/errors';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { SpeedResolver } from '@/engine/systems/turn/SpeedResolver';
import type { BattleAction } from '@/engine/systems/turn/SpeedResolver';
import { MoveTable } from '@/engine/loader/MoveTable';
import { Logger } from '@/engine/utils/Logger';

export type MoveTier = 'guaranteed_ko' | 'probable_ko' | 'chip' | 'status' | 'no_effect';

const TIER_ORDER: Record<MoveTier, number> = {
  guaranteed_ko: 0,
  probable_ko:   1,
  chip:          2,
  status:        3,
  no_effect:     4,
};

/** Whether our move lands before the opponent's predicted action */
export type OrderVerdict = 'first' | 'second' | 'undetermined' | 'unknown';

export interface MoveFields {
  tier: MoveTier;
  /** KO chance as the damage calculation reports it */
  koProbability: number;
  /** koProbability times the hit chance; this is what sets the tier */
  koChanceWithAccuracy: number;
  minPercent: number;
  maxPercent: number;
  expectedPercent: number;
  effectiveness: number;
  accuracy: number | true;
  /** Priority bracket after abilities such as Prankster */
  priority: number;
  switchInId: string | null;
  switchInExpectedPercent: number | null;
  order: OrderVerdict;
  estimated: boolean;
}

export type RankedMove = RankedOption<MoveFields>;
export type MoveRanking = Ranking<RankedMove>;

export interface MoveRankInput {
  active: Combatant;
  opponent: Combatant;
  opponentBench: readonly Combatant[];
  field: FieldState;
  legalMoves: readonly string[];
  lockedMoveId: string | null;
  predictions?: readonly OpponentPrediction[];
  config?: EngineConfig;
}

/** Damage range, or null for a status move */
function rangeOf(
  attacker: Combatant,
  move: MoveData,
  defender: Combatant,
  field: FieldState,
  config: EngineConfig,
): DamageRange | null {
  try {
    return DamageCalc.compute(attacker, move, defender, field, config);
  } catch (err) {
    if (err instanceof InvalidMoveKindError) return null;
    throw err;
  }
}

function koChanceOf(move: MoveData, range: DamageRange): number {
  return move.flags.ohko ? range.koProbability : range.koProbability * hitChance(move);
}

function tierOf(move: MoveData, range: DamageRange | null): MoveTier {
  if (!range) return 'status';
  if (range.effectiveness === 0 || range.maxPercent <= 0) return 'no_effect';
  const ko = koChanceOf(move, range);
  if (ko >= 1) return 'guaranteed_ko';
  if (ko > 0) return 'probable_ko';
  return 'chip';
}

/** The opponent's most likely action as a BattleAction, if one can be formed */
function predictedAction(
  input: MoveRankInput,
  config: EngineConfig,
): BattleAction | null {
  const top = input.predictions?.[0];
  if (top?.kind === 'switch') return { kind: 'switch', actor: input.opponent };
  if (top?.kind === 'move') {
    const move = MoveTable.get(top.moveId);
    if (move) return { kind: 'move', actor: input.opponent, move };
  }
  const best = DamageCalc.strongest(
    input.opponent, MoveTable.forCombatant(input.opponent), input.active, input.field, config,
  );
  return best ? { kind: 'move', actor: input.opponent, move: best.move } : null;
}

function orderVerdict(ours: BattleAction, theirs: BattleAction | null, field: FieldState, config: EngineConfig): OrderVerdict {
  if (!theirs) return 'unknown';
  const order = SpeedResolver.resolveOrder(ours, theirs, field, config);
  if (order.kind === 'undetermined') return 'undetermined';
  return order.first === ours ? 'first' : 'second';
}

function likelySwitchIn(input: MoveRankInput): Combatant | null {
  const target = input.predictions?.find(p => p.kind === 'switch');
  if (!target || target.kind !== 'switch') return null;
  return input.opponentBench.find(c => c.id === target.targetId) ?? null;
}

function pct(v: number): string {
  return `${v.toFixed(1)}%`;
}

function reasoningOf(f: MoveFields, opponentName: string): string {
  const parts: string[] = [];
  switch (f.tier) {
    case 'status':
      parts.push('Status move, no direct damage');
      break;
    case 'no_effect':
      parts.push(`No effect on ${opponentName}`);
      break;
    default:
      if (f.koChanceWithAccuracy > 0) parts.push(`KO chance ${Math.round(f.koChanceWithAccuracy * 100)}%`);
      parts.push(`${pct(f.minPercent)}-${pct(f.maxPercent)} (avg ${pct(f.expectedPercent)}) to ${opponentName}`);
      if (f.effectiveness > 1) parts.push(`super effective x${f.effectiveness}`);
      else if (f.effectiveness < 1) parts.push(`resisted x${f.effectiveness}`);
  }
  if (f.switchInId !== null && f.switchInExpectedPercent !== null) {
    parts.push(`avg ${pct(f.switchInExpectedPercent)} to ${f.switchInId} on a switch`);
  }
  if (f.accuracy !== true && f.accuracy < 100) parts.push(`${f.accuracy}% accurate`);
  if (f.priority > 0) parts.push(`+${f.priority} priority`);
  else if (f.priority < 0) parts.push(`${f.priority} priority (moves last)`);
  if (f.order === 'first') parts.push('moves first');
  else if (f.order === 'second') parts.push('moves second');
  else if (f.order === 'undetermined') parts.push('speed tie');
  if (f.estimated) parts.push('estimated');
  return parts.join('; ');
}

function compareMoves(x: RankedMove, y: RankedMove): number {
  const a = x.fields;
  const b = y.fields;
  const accuracyScore = (acc: number | true): number => (acc === true ? 101 : acc);
  return TIER_ORDER[a.tier] - TIER_ORDER[b.tier]
    || b.expectedPercent - a.expectedPercent
    || (b.switchInExpectedPercent ?? -1) - (a.switchInExpectedPercent ?? -1)
    || accuracyScore(b.accuracy) - accuracyScore(a.accuracy)
    || x.tieBreakKey.localeCompare(y.tieBreakKey);
}

export const MoveRanker = {
  rank(input: MoveRankInput): MoveRanking {
    const config = input.config ?? ENGINE_CONFIG;
    const ids = input.lockedMoveId !== null ? [input.lockedMoveId] : input.legalMoves;
    const moves = MoveTable.resolve(ids);

    if (moves.length === 0) {
      return {
        options: [],
        reason: 'EMPTY_CANDIDATE_SET',
        detail: input.lockedMoveId !== null
          ? `Locked move "${input.lockedMoveId}" is not in the move table`
          : 'No legal moves',
      };
    }

    const theirAction = predictedAction(input, config);
    const switchIn = likelySwitchIn(input);

    const options: RankedMove[] = moves.map(move => {
      const ours: BattleAction = { kind: 'move', actor: input.active, move };
      const range = rangeOf(input.active, move, input.opponent, input.field, config);
      const switchRange = switchIn ? rangeOf(input.active, move, switchIn, input.field, config) : null;
      const fields: MoveFields = {
        tier: tierOf(move, range),
        koProbability: range?.koProbability ?? 0,
        koChanceWithAccuracy: range ? koChanceOf(move, range) : 0,
        minPercent: range?.minPercent ?? 0,
        maxPercent: range?.maxPercent ?? 0,
        expectedPercent: range?.expectedPercent ?? 0,
        effectiveness: range?.effectiveness ?? 1,
        accuracy: move.accuracy,
        priority: SpeedResolver.priorityOf(ours),
        switchInId: switchIn?.id ?? null,
        switchInExpectedPercent: switchIn ? switchRange?.expectedPercent ?? 0 : null,
        order: orderVerdict(ours, theirAction, input.field, config),
        estimated: range?.estimated ?? false,
      };
      return {
        id: move.id,
        rank: 0,
        fields,
        reasoning: reasoningOf(fields, input.opponent.species),
        tieBreakKey: move.id,
      };
    });

    const ranked = options
      .sort(compareMoves)
      .map((option, i) => ({ ...option, rank: i + 1 }));

    const top = ranked[0];
    if (top) Logger.log(`Best move: ${top.id} (${top.reasoning})`, 'rank');
    return { options: ranked };
  },
};

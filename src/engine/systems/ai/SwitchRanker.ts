// ─────────────────────────────────────────────
//  Switch Ranker
//  Projects each bench member's HP after hazards and the hit it
//  takes coming in, drops anyone who would not survive entry,
//  then orders survivors by their matchup into the opponent.
// ─────────────────────────────────────────────

import type { Combatant } from '@/engine/data/types/Combatant';
import { isFainted } from '@/engine/data/types/Combatant';
import type { MoveData } from '@/engine/data/types/Move';
import type { FieldState } from '@/engine/data/types/Field';
import type { MatchupResult, RankedOption, Ranking } from '@/engine/data/types/Analysis';
import type { OpponentPrediction } from '@/engine/data/types/Snapshot';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG } from '@/config';
import { InvalidMoveKindError } from '@/engine/errors';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { HazardCalc } from '@/engine/systems/field/HazardCalc';
import { MoveTable } from '@/engine/loader/MoveTable';
import { Logger } from '@/engine/utils/Logger';
import { MathUtils } from '@/engine/utils/MathUtils';
import type { MatchupLookup } from './OpponentPredictor';

const MATCHUP_ORDER: Record<MatchupResult, number> = {
  a_wins:       0,
  draw:         1,
  undetermined: 2,
  b_wins:       3,
};

export interface SwitchFields {
  hazardPercent: number;
  incomingMoveId: string | null;
  incomingPercent: number;
  projectedHpPercent: number;
  /** Candidate's matchup against the opponent active, from the candidate's side */
  matchup: MatchupResult;
  remainingHpPercent: number | null;
  turnsToResolve: number;
}

export type RankedSwitch = RankedOption<SwitchFields>;

export interface EliminatedSwitch {
  id: string;
  hazardPercent: number;
  incomingPercent: number;
  projectedHpPercent: number;
  reasoning: string;
}

export interface SwitchRanking extends Ranking<RankedSwitch> {
  eliminated: EliminatedSwitch[];
}

export interface SwitchRankInput {
  /** Our non-active team members; fainted ones are ignored */
  bench: readonly Combatant[];
  opponent: Combatant;
  field: FieldState;
  predictions?: readonly OpponentPrediction[];
  matchupFor: MatchupLookup;
  config?: EngineConfig;
}

/** The opponent move a candidate is expected to eat on entry */
function incomingMove(
  input: SwitchRankInput,
  candidate: Combatant,
  config: EngineConfig,
): MoveData | null {
  const predicted = input.predictions?.find(p => p.kind === 'move');
  if (predicted && predicted.kind === 'move') {
    const move = MoveTable.get(predicted.moveId);
    if (move) return move;
  }
  const best = DamageCalc.strongest(
    input.opponent, MoveTable.forCombatant(input.opponent), candidate, input.field, config,
  );
  return best?.move ?? null;
}

function incomingPercent(
  move: MoveData | null,
  opponent: Combatant,
  candidate: Combatant,
  field: FieldState,
  config: EngineConfig,
): number {
  if (!move) return 0;
  try {
    return DamageCalc.compute(opponent, move, candidate, field, config).expectedPercent;
  } catch (err) {
    if (err instanceof InvalidMoveKindError) return 0;
    throw err;
  }
}

function describeResult(result: MatchupResult, remaining: number | null): string {
  switch (result) {
    case 'a_wins':       return `Wins the 1v1 with ${(remaining ?? 0).toFixed(1)}% left`;
    case 'b_wins':       return 'Loses the 1v1';
    case 'draw':         return 'Trades 1-for-1';
    case 'undetermined': return 'No KO either way within the turn cap';
  }
}

function reasoningOf(f: SwitchFields): string {
  const parts = [describeResult(f.matchup, f.remainingHpPercent)];
  if (f.hazardPercent > 0) parts.push(`${f.hazardPercent.toFixed(1)}% from hazards`);
  if (f.incomingMoveId !== null) parts.push(`${f.incomingPercent.toFixed(1)}% from ${f.incomingMoveId}`);
  parts.push(`enters at ${f.projectedHpPercent.toFixed(1)}%`);
  return parts.join('; ');
}

function compareSwitches(x: RankedSwitch, y: RankedSwitch): number {
  return MATCHUP_ORDER[x.fields.matchup] - MATCHUP_ORDER[y.fields.matchup]
    || y.fields.projectedHpPercent - x.fields.projectedHpPercent
    || x.tieBreakKey.localeCompare(y.tieBreakKey);
}

export const SwitchRanker = {
  rank(input: SwitchRankInput): SwitchRanking {
    const config = input.config ?? ENGINE_CONFIG;
    const healthy = input.bench.filter(c => !isFainted(c));
    const options: RankedSwitch[] = [];
    const eliminated: EliminatedSwitch[] = [];

    for (const candidate of healthy) {
      const hazards = HazardCalc.entry(candidate, input.field.sides[candidate.side].hazards);
      const afterHazards = candidate.hpPercent - hazards.damagePercent;
      const move = incomingMove(input, candidate, config);
      const entering: Combatant = { ...candidate, hpPercent: Math.max(0, afterHazards) };
      const incoming = afterHazards > 0
        ? incomingPercent(move, input.opponent, entering, input.field, config)
        : 0;
      const projected = MathUtils.round1(afterHazards - incoming);

      if (projected <= 0) {
        eliminated.push({
          id: candidate.id,
          hazardPercent: hazards.damagePercent,
          incomingPercent: incoming,
          projectedHpPercent: projected,
          reasoning: `Dies on switch-in (${hazards.damagePercent.toFixed(1)}% hazards, ${incoming.toFixed(1)}% incoming)`,
        });
        continue;
      }

      const outcome = input.matchupFor({ ...candidate, hpPercent: projected }, input.opponent);
      const fields: SwitchFields = {
        hazardPercent: hazards.damagePercent,
        incomingMoveId: move?.id ?? null,
        incomingPercent: incoming,
        projectedHpPercent: projected,
        matchup: outcome.result,
        remainingHpPercent: outcome.result === 'a_wins' ? outcome.winnerRemainingHpPercent : null,
        turnsToResolve: outcome.turnsToResolve,
      };
      options.push({
        id: candidate.id,
        rank: 0,
        fields,
        reasoning: reasoningOf(fields),
        tieBreakKey: candidate.id,
      });
    }

    if (options.length === 0) {
      const detail = healthy.length === 0
        ? 'No healthy bench members'
        : `Every candidate faints on entry: ${eliminated.map(e => e.id).join(', ')}`;
      Logger.log(`No switch available: ${detail}`, 'rank');
      return { options: [], reason: 'EMPTY_CANDIDATE_SET', detail, eliminated };
    }

    const ranked = options
      .sort(compareSwitches)
      .map((option, i) => ({ ...option, rank: i + 1 }));
    const top = ranked[0];
    if (top) Logger.log(`Best switch: ${top.id} (${top.reasoning})`, 'rank');
    return { options: ranked, eliminated };
  },
};

// ─────────────────────────────────────────────
//  Opponent Predictor — heuristic guess at the opponent's next action
//  Attack with the strongest move; consider a switch when the active
//  is projected to lose and the bench holds a better answer.
// ─────────────────────────────────────────────

import type { Combatant } from '@/engine/data/types/Combatant';
import { isFainted } from '@/engine/data/types/Combatant';
import type { FieldState } from '@/engine/data/types/Field';
import type { MatchupOutcome } from '@/engine/data/types/Analysis';
import type { OpponentPrediction } from '@/engine/data/types/Snapshot';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG } from '@/config';
import { DamageCalc } from '@/engine/systems/combat/DamageCalc';
import { MoveTable } from '@/engine/loader/MoveTable';

/** Outcome of `a` against `b`, normally read through the matchup cache */
export type MatchupLookup = (a: Combatant, b: Combatant) => MatchupOutcome;

/** Chance assigned to a switch when the active is losing and a better answer exists */
const SWITCH_PROBABILITY = 0.4;

const RESULT_SCORE: Record<MatchupOutcome['result'], number> = {
  a_wins:       3,
  draw:         2,
  undetermined: 1,
  b_wins:       0,
};

/** Result first, then how much HP the bench member keeps when it wins */
function scoreOf(outcome: MatchupOutcome): number {
  const kept = outcome.result === 'a_wins' ? outcome.winnerRemainingHpPercent ?? 0 : 0;
  return RESULT_SCORE[outcome.result] * 1000 + kept;
}

export const OpponentPredictor = {
  predict(
    opponent: Combatant,
    ourActive: Combatant,
    opponentBench: readonly Combatant[],
    field: FieldState,
    matchupFor: MatchupLookup,
    config: EngineConfig = ENGINE_CONFIG,
  ): OpponentPrediction[] {
    const best = DamageCalc.strongest(opponent, MoveTable.forCombatant(opponent), ourActive, field, config);
    const activeOutcome = matchupFor(opponent, ourActive);

    let switchTarget: Combatant | null = null;
    if (activeOutcome.result === 'b_wins') {
      let bestScore = scoreOf(activeOutcome);
      for (const candidate of opponentBench) {
        if (isFainted(candidate) || candidate.id === opponent.id) continue;
        const score = scoreOf(matchupFor(candidate, ourActive));
        if (score > bestScore || (score === bestScore && switchTarget && candidate.id < switchTarget.id)) {
          bestScore = score;
          switchTarget = candidate;
        }
      }
    }

    const predictions: OpponentPrediction[] = [];
    if (switchTarget) {
      predictions.push({ kind: 'switch', targetId: switchTarget.id, probability: SWITCH_PROBABILITY });
      if (best) predictions.push({ kind: 'move', moveId: best.move.id, probability: 1 - SWITCH_PROBABILITY });
    } else if (best) {
      predictions.push({ kind: 'move', moveId: best.move.id, probability: 1 });
    }

    return predictions.sort((x, y) => y.probability - x.probability);
  },
};

// ─────────────────────────────────────────────
//  Matchup Simulator — Headless 1v1 projection
//  Both sides repeat their strongest move until one faints
//  or the turn cap is reached. Expected damage only, no dice:
//  the same input always produces the same outcome.
// ─────────────────────────────────────────────

import type { Combatant } from '@/engine/data/types/Combatant';
import { hasType } from '@/engine/data/types/Combatant';
import { hitChance } from '@/engine/data/types/Move';
import type { FieldState } from '@/engine/data/types/Field';
import type { MatchupOutcome, MatchupResult } from '@/engine/data/types/Analysis';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG } from '@/config';
import { DamageCalc, accuracyWeighted } from '@/engine/systems/combat/DamageCalc';
import type { StrongestMove } from '@/engine/systems/combat/DamageCalc';
import { StatCalc } from '@/engine/systems/combat/StatCalc';
import { SpeedResolver } from '@/engine/systems/turn/SpeedResolver';
import type { BattleAction } from '@/engine/systems/turn/SpeedResolver';
import { MoveTable } from '@/engine/loader/MoveTable';
import { MathUtils } from '@/engine/utils/MathUtils';

/** Abilities and types that take no sandstorm chip */
const SAND_IMMUNE_ABILITIES = new Set(['sandveil', 'sandrush', 'sandforce', 'overcoat', 'magicguard']);

interface SimSide {
  readonly combatant: Combatant;
  readonly best: StrongestMove | null;
  readonly maxHp: number;
  /** Expected fraction of turns lost to status */
  readonly skip: number;
  /** Percent of own max HP */
  hp: number;
  toxicCounter: number;
  /** Total percent of the opponent's max HP dealt so far */
  dealt: number;
}

type Order = MatchupOutcome['order'];

function skipChance(c: Combatant, config: EngineConfig): number {
  switch (c.status) {
    case 'par': return config.skipProbability.par;
    case 'slp': return config.skipProbability.slp;
    case 'frz': return config.skipProbability.frz;
    default:    return 0;
  }
}

/** The combatant as it stands mid-simulation */
function current(side: SimSide): Combatant {
  return { ...side.combatant, hpPercent: Math.max(0, side.hp) };
}

function createSide(
  self: Combatant,
  foe: Combatant,
  field: FieldState,
  config: EngineConfig,
): SimSide {
  return {
    combatant: self,
    best: DamageCalc.strongest(self, MoveTable.forCombatant(self), foe, field, config),
    maxHp: StatCalc.maxHp(self, config),
    skip: skipChance(self, config),
    hp: self.hpPercent,
    toxicCounter: 0,
    dealt: 0,
  };
}

/** Expected percent of the defender's max HP one use takes off right now */
function plan(att: SimSide, def: SimSide, field: FieldState, config: EngineConfig): number {
  if (!att.best) return 0;
  const range = DamageCalc.compute(current(att), att.best.move, current(def), field, config);
  return accuracyWeighted(att.best.move, range) * (1 - att.skip);
}

/** Apply one planned hit, then the attacker's recoil, drain and Life Orb */
function land(att: SimSide, def: SimSide, expected: number, config: EngineConfig): void {
  if (!att.best || expected <= 0) return;
  const dealt = Math.min(Math.max(0, def.hp), expected);
  def.hp -= dealt;
  att.dealt += dealt;

  const move = att.best.move;
  const ability = att.combatant.ability;
  const toOwnPercent = (opponentPercent: number): number =>
    ((opponentPercent / 100) * def.maxHp / att.maxHp) * 100;

  if (move.flags.recoil && ability !== 'rockhead' && ability !== 'magicguard') {
    att.hp -= toOwnPercent(dealt * move.flags.recoil);
  }
  if (move.flags.drain) {
    att.hp = Math.min(100, att.hp + toOwnPercent(dealt * move.flags.drain));
  }
  if (att.combatant.item === 'lifeorb' && ability !== 'magicguard') {
    att.hp -= config.residual.lifeOrbRecoil * 100 * hitChance(move) * (1 - att.skip);
  }
}

/** End-of-round weather, item and status effects */
function residual(side: SimSide, field: FieldState, config: EngineConfig): void {
  if (side.hp <= 0) return;
  const c = side.combatant;
  const r = config.residual;
  const guarded = c.ability === 'magicguard';

  if (field.weather === 'sand' && !guarded
    && !hasType(c, 'rock') && !hasType(c, 'ground') && !hasType(c, 'steel')
    && !(c.ability && SAND_IMMUNE_ABILITIES.has(c.ability))
    && c.item !== 'safetygoggles') {
    side.hp -= r.sand * 100;
  }

  if (c.item === 'leftovers' || (c.item === 'blacksludge' && hasType(c, 'poison'))) {
    side.hp = Math.min(100, side.hp + r.leftovers * 100);
  } else if (c.item === 'blacksludge' && !guarded) {
    side.hp -= r.blackSludgeDamage * 100;
  }

  if (guarded) return;
  if (c.status === 'brn') side.hp -= r.burn * 100;
  else if (c.status === 'psn') side.hp -= r.poison * 100;
  else if (c.status === 'tox') {
    side.toxicCounter += 1;
    side.hp -= r.toxicStep * side.toxicCounter * 100;
  }
}

function roundOrder(a: SimSide, b: SimSide, field: FieldState, config: EngineConfig): Order {
  if (a.best && b.best) {
    const actionA: BattleAction = { kind: 'move', actor: current(a), move: a.best.move };
    const actionB: BattleAction = { kind: 'move', actor: current(b), move: b.best.move };
    const turnOrder = SpeedResolver.resolveOrder(actionA, actionB, field, config);
    if (turnOrder.kind === 'undetermined') return 'simultaneous';
    return turnOrder.first === actionA ? 'a_first' : 'b_first';
  }
  if (a.best) return 'a_first';
  if (b.best) return 'b_first';
  return 'simultaneous';
}

function hitsToKo(expected: number, targetHp: number): string {
  if (expected <= 0) return 'cannot damage';
  return `${Math.ceil(targetHp / expected)}HKO`;
}

function describe(a: SimSide, b: SimSide, order: Order, field: FieldState, config: EngineConfig): string {
  const nameA = a.combatant.species;
  const nameB = b.combatant.species;
  const speed = order === 'a_first' ? `${nameA} moves first`
    : order === 'b_first' ? `${nameB} moves first`
    : 'Speed tie';
  const aKo = hitsToKo(plan(a, b, field, config), b.hp);
  const bKo = hitsToKo(plan(b, a, field, config), a.hp);
  return `${speed}; ${nameA} ${aKo}, ${nameB} ${bKo}`;
}

function finish(
  result: MatchupResult,
  a: SimSide,
  b: SimSide,
  turns: number,
  order: Order,
  note: string,
): MatchupOutcome {
  const remaining = (s: SimSide): number => MathUtils.round1(Math.max(0, s.hp));
  const winner = result === 'a_wins' ? a : result === 'b_wins' ? b : null;
  return {
    result,
    winnerRemainingHpPercent: winner ? MathUtils.clamp(remaining(winner), 0.1, 100) : null,
    turnsToResolve: turns,
    note,
    aRemainingHpPercent: remaining(a),
    bRemainingHpPercent: remaining(b),
    aMoveId: a.best?.move.id ?? null,
    bMoveId: b.best?.move.id ?? null,
    order,
  };
}

/** A side with no damaging move is never credited with a win */
function settle(a: SimSide, b: SimSide): MatchupResult | null {
  const aDown = a.hp <= 0;
  const bDown = b.hp <= 0;
  if (aDown && bDown) return 'draw';
  if (bDown) return a.best ? 'a_wins' : 'draw';
  if (aDown) return b.best ? 'b_wins' : 'draw';
  return null;
}

export const MatchupSimulator = {
  /**
   * Project a 1v1 between `a` and `b` on `field`.
   * Returns 'undetermined' when nobody faints within `turnCap` rounds.
   */
  simulate(
    a: Combatant,
    b: Combatant,
    field: FieldState,
    turnCap: number = ENGINE_CONFIG.turnCap,
    config: EngineConfig = ENGINE_CONFIG,
  ): MatchupOutcome {
    const sideA = createSide(a, b, field, config);
    const sideB = createSide(b, a, field, config);
    const firstOrder = roundOrder(sideA, sideB, field, config);

    if (!sideA.best && !sideB.best) {
      return finish('draw', sideA, sideB, 0, firstOrder, 'Neither side can deal damage');
    }

    const note = describe(sideA, sideB, firstOrder, field, config);

    for (let turn = 1; turn <= turnCap; turn++) {
      const order = roundOrder(sideA, sideB, field, config);

      if (order === 'simultaneous') {
        const toB = plan(sideA, sideB, field, config);
        const toA = plan(sideB, sideA, field, config);
        land(sideA, sideB, toB, config);
        land(sideB, sideA, toA, config);
      } else {
        const [first, second]: [SimSide, SimSide] = order === 'a_first' ? [sideA, sideB] : [sideB, sideA];
        land(first, second, plan(first, second, field, config), config);
        if (second.hp > 0 && first.hp > 0) {
          land(second, first, plan(second, first, field, config), config);
        }
      }

      residual(sideA, field, config);
      residual(sideB, field, config);

      const result = settle(sideA, sideB);
      if (result) return finish(result, sideA, sideB, turn, firstOrder, note);
    }

    // Only one side can hurt the other: it wins once damage has landed
    if (sideA.best && !sideB.best && sideA.dealt > 0) {
      return finish('a_wins', sideA, sideB, turnCap, firstOrder, `${note}; ${b.species} cannot fight back`);
    }
    if (sideB.best && !sideA.best && sideB.dealt > 0) {
      return finish('b_wins', sideA, sideB, turnCap, firstOrder, `${note}; ${a.species} cannot fight back`);
    }
    return finish('undetermined', sideA, sideB, turnCap, firstOrder, `${note}; no KO within ${turnCap} turns`);
  },
};

// ─────────────────────────────────────────────
//  Damage Calculation System
//  Pure functions — no side effects, fully deterministic.
// ─────────────────────────────────────────────

import type { Combatant, PokemonType } from '@/engine/data/types/Combatant';
import { hasType, isGrounded } from '@/engine/data/types/Combatant';
import type { MoveData } from '@/engine/data/types/Move';
import { hitChance, isDamaging } from '@/engine/data/types/Move';
import type { FieldState } from '@/engine/data/types/Field';
import type { DamageRange } from '@/engine/data/types/Analysis';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG, ROLL_MAX, ROLL_MIN } from '@/config';
import { InsufficientDataError, InvalidMoveKindError } from '@/engine/errors';
import { TypeChart } from './TypeChart';
import { StatCalc } from './StatCalc';
import { MathUtils } from '@/engine/utils/MathUtils';

/** Abilities that absorb or ignore one attacking type entirely */
const ABILITY_IMMUNITY: Record<string, PokemonType> = {
  levitate:      'ground',
  eartheater:    'ground',
  flashfire:     'fire',
  wellbakedbody: 'fire',
  waterabsorb:   'water',
  stormdrain:    'water',
  dryskin:       'water',
  voltabsorb:    'electric',
  lightningrod:  'electric',
  motordrive:    'electric',
  sapsipper:     'grass',
};

/** Hit-count distribution of a [2, 5] move */
const TWO_TO_FIVE: ReadonlyArray<[number, number]> = [[2, 0.35], [3, 0.35], [4, 0.15], [5, 0.15]];

export interface StrongestMove {
  move: MoveData;
  range: DamageRange;
  /** expectedPercent weighted by hit chance */
  score: number;
}

/**
 * Type multiplier including ability and item immunities.
 * Unknown abilities grant no immunity.
 */
export function effectivenessOf(move: MoveData, defender: Combatant): number {
  if (defender.ability && ABILITY_IMMUNITY[defender.ability] === move.type) return 0;
  if (move.type === 'ground' && !isGrounded(defender)) return 0;
  return TypeChart.effectiveness(move.type, defender.types);
}

/**
 * Power after variable-power conditions.
 * Throws InsufficientDataError when the condition depends on unknown information.
 */
function resolvePower(move: MoveData, attacker: Combatant, defender: Combatant): number {
  const vp = move.flags.variablePower;
  if (!vp) return move.basePower;

  const fallback = `${move.name} assumed at ${vp.min} power`;
  switch (vp.condition) {
    case 'targetStatused':
      return defender.status !== 'none' ? vp.max : vp.min;
    case 'userStatused':
      return attacker.status !== 'none' ? vp.max : vp.min;
    case 'userNoItem':
      if (attacker.item === null) throw new InsufficientDataError(`${attacker.species}'s item is unknown; ${fallback}`);
      return attacker.item === '' ? vp.max : vp.min;
    case 'targetHasItem':
      if (defender.item === null) throw new InsufficientDataError(`${defender.species}'s item is unknown; ${fallback}`);
      return defender.item !== '' ? vp.max : vp.min;
    case 'targetWeight':
      throw new InsufficientDataError(`${defender.species}'s weight is unknown; ${fallback}`);
  }
}

function weatherMultiplier(move: MoveData, field: FieldState): number {
  if (field.weather === 'sun') {
    if (move.type === 'fire') return 1.5;
    if (move.type === 'water') return 0.5;
  }
  if (field.weather === 'rain') {
    if (move.type === 'water') return 1.5;
    if (move.type === 'fire') return 0.5;
  }
  return 1;
}

function terrainMultiplier(move: MoveData, attacker: Combatant, defender: Combatant, field: FieldState): number {
  const boosted: Partial<Record<FieldState['terrain'], PokemonType>> = {
    electric: 'electric',
    grassy:   'grass',
    psychic:  'psychic',
  };
  if (boosted[field.terrain] === move.type && isGrounded(attacker)) return 1.3;
  if (field.terrain === 'misty' && move.type === 'dragon' && isGrounded(defender)) return 0.5;
  if (field.terrain === 'grassy' && move.id === 'earthquake' && isGrounded(defender)) return 0.5;
  return 1;
}

function attackStat(attacker: Combatant, move: MoveData, config: EngineConfig): number {
  const physical = move.category === 'physical';
  let a = StatCalc.boosted(attacker, physical ? 'atk' : 'spa', config);
  let mult = 1;
  if (physical && (attacker.ability === 'hugepower' || attacker.ability === 'purepower')) mult *= 2;
  if (physical && attacker.ability === 'guts' && attacker.status !== 'none') mult *= 1.5;
  if (physical && attacker.item === 'choiceband') mult *= 1.5;
  if (!physical && attacker.item === 'choicespecs') mult *= 1.5;
  a = Math.floor(a * mult);
  return Math.max(1, a);
}

function defenseStat(defender: Combatant, move: MoveData, field: FieldState, config: EngineConfig): number {
  const physical = move.category === 'physical';
  let d = StatCalc.boosted(defender, physical ? 'def' : 'spd', config);
  let mult = 1;
  if (!physical && field.weather === 'sand' && hasType(defender, 'rock')) mult *= 1.5;
  if (physical && field.weather === 'snow' && hasType(defender, 'ice')) mult *= 1.5;
  if (!physical && defender.item === 'assaultvest') mult *= 1.5;
  if (defender.item === 'eviolite') mult *= 1.5;
  d = Math.floor(d * mult);
  return Math.max(1, d);
}

/** Screens, items and abilities applied after type effectiveness */
function finalMultiplier(
  attacker: Combatant,
  move: MoveData,
  defender: Combatant,
  field: FieldState,
  effectiveness: number,
): number {
  const screens = field.sides[defender.side].screens;
  let mult = 1;
  if (screens.auroraVeil > 0) mult *= 0.5;
  else if (move.category === 'physical' && screens.reflect > 0) mult *= 0.5;
  else if (move.category === 'special' && screens.lightScreen > 0) mult *= 0.5;

  if (attacker.item === 'lifeorb') mult *= 1.3;
  if (attacker.item === 'expertbelt' && effectiveness > 1) mult *= 1.2;
  if (defender.ability === 'thickfat' && (move.type === 'fire' || move.type === 'ice')) mult *= 0.5;
  if (defender.ability === 'multiscale' && defender.hpPercent >= 100) mult *= 0.5;
  return mult;
}

/** Hit-count distribution as [hits, probability] pairs */
function hitDistribution(move: MoveData, attacker: Combatant): ReadonlyArray<[number, number]> {
  const mh = move.flags.multihit;
  if (mh === undefined) return [[1, 1]];
  if (typeof mh === 'number') return [[mh, 1]];
  const [lo, hi] = mh;
  if (attacker.ability === 'skilllink') return [[hi, 1]];
  if (lo === 2 && hi === 5) return TWO_TO_FIVE;
  const n = hi - lo + 1;
  return Array.from({ length: n }, (_, i): [number, number] => [lo + i, 1 / n]);
}

/** Probability that the sum of `hits` independent rolls reaches `threshold` */
function sumReachProbability(rolls: readonly number[], hits: number, threshold: number): number {
  let dist = new Map<number, number>([[0, 1]]);
  const p = 1 / rolls.length;
  for (let h = 0; h < hits; h++) {
    const next = new Map<number, number>();
    for (const [sum, prob] of dist) {
      for (const r of rolls) {
        next.set(sum + r, (next.get(sum + r) ?? 0) + prob * p);
      }
    }
    dist = next;
  }
  let reach = 0;
  for (const [sum, prob] of dist) {
    if (sum >= threshold) reach += prob;
  }
  return reach;
}

/**
 * Expected damage per use, folding in accuracy.
 * OHKO ranges already carry the hit chance in their expectation.
 */
export function accuracyWeighted(move: MoveData, range: DamageRange): number {
  return move.flags.ohko ? range.expectedPercent : range.expectedPercent * hitChance(move);
}

function zeroRange(effectiveness: number, assumptions: string[]): DamageRange {
  return {
    minPercent: 0,
    maxPercent: 0,
    koProbability: 0,
    expectedPercent: 0,
    effectiveness,
    hits: 0,
    estimated: assumptions.length > 0,
    assumptions,
  };
}

export const DamageCalc = {
  /**
   * Damage range of `move` from `attacker` into `defender`.
   * Percentages are of the defender's max HP; KO chance is against its current HP.
   *
   * @throws InvalidMoveKindError for status moves
   */
  compute(
    attacker: Combatant,
    move: MoveData,
    defender: Combatant,
    field: FieldState,
    config: EngineConfig = ENGINE_CONFIG,
  ): DamageRange {
    if (!isDamaging(move)) throw new InvalidMoveKindError(move.id);

    const assumptions: string[] = [];
    const effectiveness = effectivenessOf(move, defender);
    if (effectiveness === 0) return zeroRange(0, assumptions);

    const maxHp = StatCalc.maxHp(defender, config);
    const currentHp = StatCalc.currentHp(defender, config);
    const pct = (dmg: number): number => MathUtils.round1((dmg / maxHp) * 100);

    // ── OHKO: all or nothing ──
    if (move.flags.ohko) {
      if (defender.level > attacker.level) return zeroRange(effectiveness, assumptions);
      const chance = hitChance(move);
      return {
        minPercent: 0,
        maxPercent: pct(currentHp),
        koProbability: currentHp > 0 ? chance : 0,
        expectedPercent: pct(currentHp * chance),
        effectiveness,
        hits: 1,
        estimated: false,
        assumptions,
      };
    }

    // ── Fixed damage ignores stats and type multipliers ──
    if (move.flags.fixedDamage) {
      const dmg = move.flags.fixedDamage === 'level'
        ? attacker.level
        : Math.max(1, Math.floor(currentHp / 2));
      return {
        minPercent: pct(dmg),
        maxPercent: pct(dmg),
        koProbability: currentHp > 0 && dmg >= currentHp ? 1 : 0,
        expectedPercent: pct(dmg),
        effectiveness: 1,
        hits: 1,
        estimated: false,
        assumptions,
      };
    }

    // ── Power ──
    let power: number;
    try {
      power = resolvePower(move, attacker, defender);
    } catch (err) {
      if (!(err instanceof InsufficientDataError)) throw err;
      power = move.flags.variablePower?.min ?? move.basePower;
      assumptions.push(err.missing);
    }
    if (attacker.ability === 'technician' && power <= 60) power *= 1.5;

    // ── Base damage ──
    const a = attackStat(attacker, move, config);
    const d = defenseStat(defender, move, field, config);
    const levelFactor = Math.floor((2 * attacker.level) / 5 + 2);
    let base = Math.floor(Math.floor((levelFactor * power * a) / d) / 50) + 2;
    base = Math.floor(base * weatherMultiplier(move, field));
    base = Math.floor(base * terrainMultiplier(move, attacker, defender, field));

    const stab = hasType(attacker, move.type)
      ? (attacker.ability === 'adaptability' ? 2 : 1.5)
      : 1;
    const burned = attacker.status === 'brn'
      && move.category === 'physical'
      && attacker.ability !== 'guts'
      && move.id !== 'facade';
    const finalMult = finalMultiplier(attacker, move, defender, field, effectiveness);

    // ── 16 rolls ──
    const rolls: number[] = [];
    for (let r = ROLL_MIN; r <= ROLL_MAX; r++) {
      let dmg = Math.floor((base * r) / 100);
      dmg = Math.floor(dmg * stab);
      dmg = Math.floor(dmg * effectiveness);
      if (burned) dmg = Math.floor(dmg * 0.5);
      dmg = Math.floor(dmg * finalMult);
      rolls.push(Math.max(1, dmg));
    }

    // ── Fold rolls over the hit-count distribution ──
    const hitDist = hitDistribution(move, attacker);
    const perHitMean = MathUtils.mean(rolls);
    const minRoll = Math.min(...rolls);
    const maxRoll = Math.max(...rolls);
    let koProbability = 0;
    let expected = 0;
    let expectedHits = 0;
    for (const [hits, p] of hitDist) {
      koProbability += p * (currentHp > 0 ? sumReachProbability(rolls, hits, currentHp) : 0);
      expected += p * hits * perHitMean;
      expectedHits += p * hits;
    }
    const minHits = Math.min(...hitDist.map(([h]) => h));
    const maxHits = Math.max(...hitDist.map(([h]) => h));

    return {
      minPercent: pct(minRoll * minHits),
      maxPercent: pct(maxRoll * maxHits),
      koProbability: MathUtils.clamp(koProbability, 0, 1),
      expectedPercent: pct(expected),
      effectiveness,
      hits: expectedHits,
      estimated: assumptions.length > 0,
      assumptions,
    };
  },

  /**
   * The most damaging viable move of `moves` (accuracy-weighted expected damage).
   * Status moves and immune hits are skipped; null when nothing deals damage.
   */
  strongest(
    attacker: Combatant,
    moves: readonly MoveData[],
    defender: Combatant,
    field: FieldState,
    config: EngineConfig = ENGINE_CONFIG,
  ): StrongestMove | null {
    let best: StrongestMove | null = null;
    for (const move of moves) {
      if (!isDamaging(move)) continue;
      const range = DamageCalc.compute(attacker, move, defender, field, config);
      if (range.maxPercent <= 0) continue;
      const score = accuracyWeighted(move, range);
      if (!best || score > best.score || (score === best.score && move.id < best.move.id)) {
        best = { move, range, score };
      }
    }
    return best;
  },
};

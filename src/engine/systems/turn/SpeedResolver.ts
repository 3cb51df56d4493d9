// ─────────────────────────────────────────────
//  Speed / Priority Resolver
//  Decides which of two actions resolves first this turn.
//  Never guesses a speed tie: it reports it as undetermined.
// ─────────────────────────────────────────────

import type { Combatant } from '@/engine/data/types/Combatant';
import { boostOf } from '@/engine/data/types/Combatant';
import type { MoveData } from '@/engine/data/types/Move';
import type { FieldState } from '@/engine/data/types/Field';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG, SWITCH_PRIORITY } from '@/config';
import { StatCalc, boostMultiplier } from '@/engine/systems/combat/StatCalc';
import { MoveTable } from '@/engine/loader/MoveTable';

export type BattleAction =
  | { kind: 'move'; actor: Combatant; move: MoveData }
  | { kind: 'switch'; actor: Combatant };

export type TurnOrder =
  | {
      kind: 'resolved';
      first: BattleAction;
      second: BattleAction;
      decidedBy: 'priority' | 'speed';
      speeds: [number, number];
    }
  | {
      kind: 'undetermined';
      code: 'UNDETERMINED_ORDER';
      actions: [BattleAction, BattleAction];
      speeds: [number, number];
    };

/** A known or suspected move outside the normal priority bracket */
export interface PriorityMove {
  moveId: string;
  priority: number;
  /** True for a move that has not been revealed yet */
  estimated: boolean;
}

export interface SpeedComparison {
  oursSpeed: number;
  theirsSpeed: number;
  /** Opponent speed if its unknown item is a Choice Scarf; null when the item is known */
  theirsScarfSpeed: number | null;
  verdict: 'ours' | 'theirs' | 'tie';
  verdictIfScarf: 'ours' | 'theirs' | 'tie' | null;
  oursPriorityMoves: PriorityMove[];
  theirsPriorityMoves: PriorityMove[];
  notes: string[];
}

const WEATHER_SPEED_ABILITY: Record<string, FieldState['weather']> = {
  swiftswim:   'rain',
  chlorophyll: 'sun',
  sandrush:    'sand',
  slushrush:   'snow',
};

export const SpeedResolver = {
  /** Priority bracket of an action; switches go before every move */
  priorityOf(action: BattleAction): number {
    if (action.kind === 'switch') return SWITCH_PRIORITY;
    const { actor, move } = action;
    let priority = move.priority;
    if (actor.ability === 'prankster' && move.category === 'status') priority += 1;
    if (actor.ability === 'galewings' && move.type === 'flying' && actor.hpPercent >= 100) priority += 1;
    return priority;
  },

  /** Non-zero-priority moves in `c`'s moveset, highest bracket first */
  priorityMoves(c: Combatant): PriorityMove[] {
    const out: PriorityMove[] = [];
    for (const slot of c.moves) {
      const move = MoveTable.get(slot.id);
      if (!move) continue;
      const priority = SpeedResolver.priorityOf({ kind: 'move', actor: c, move });
      if (priority !== 0) out.push({ moveId: move.id, priority, estimated: !slot.revealed });
    }
    return out.sort((x, y) => y.priority - x.priority || x.moveId.localeCompare(y.moveId));
  },

  /** Speed stat after boosts, status, item, ability, tailwind and weather */
  effectiveSpeed(c: Combatant, field: FieldState, config: EngineConfig = ENGINE_CONFIG): number {
    let speed = Math.floor(StatCalc.raw(c, 'spe', config) * boostMultiplier(boostOf(c, 'spe')));

    if (c.ability === 'quickfeet' && c.status !== 'none') speed = Math.floor(speed * 1.5);
    else if (c.status === 'par') speed = Math.floor(speed * 0.5);

    if (c.item === 'choicescarf') speed = Math.floor(speed * 1.5);
    if (c.item === 'ironball') speed = Math.floor(speed * 0.5);

    if (field.sides[c.side].screens.tailwind > 0) speed *= 2;

    const weather = c.ability ? WEATHER_SPEED_ABILITY[c.ability] : undefined;
    if (weather && weather === field.weather) speed *= 2;
    if (c.ability === 'surgesurfer' && field.terrain === 'electric') speed *= 2;

    return speed;
  },

  /**
   * Order two actions. Higher priority always wins; equal priority
   * compares effective speed (inverted under Trick Room); exact ties
   * are returned as undetermined.
   */
  resolveOrder(
    a: BattleAction,
    b: BattleAction,
    field: FieldState,
    config: EngineConfig = ENGINE_CONFIG,
  ): TurnOrder {
    const speedA = SpeedResolver.effectiveSpeed(a.actor, field, config);
    const speedB = SpeedResolver.effectiveSpeed(b.actor, field, config);
    const prioA = SpeedResolver.priorityOf(a);
    const prioB = SpeedResolver.priorityOf(b);

    if (prioA !== prioB) {
      const [first, second]: [BattleAction, BattleAction] = prioA > prioB ? [a, b] : [b, a];
      return { kind: 'resolved', first, second, decidedBy: 'priority', speeds: [speedA, speedB] };
    }

    if (speedA === speedB) {
      return { kind: 'undetermined', code: 'UNDETERMINED_ORDER', actions: [a, b], speeds: [speedA, speedB] };
    }

    const aFaster = speedA > speedB;
    const aFirst = field.trickRoom ? !aFaster : aFaster;
    const [first, second]: [BattleAction, BattleAction] = aFirst ? [a, b] : [b, a];
    return { kind: 'resolved', first, second, decidedBy: 'speed', speeds: [speedA, speedB] };
  },

  /** Speed verdict between two actives, including an unrevealed Choice Scarf scenario */
  compare(
    ours: Combatant,
    theirs: Combatant,
    field: FieldState,
    config: EngineConfig = ENGINE_CONFIG,
  ): SpeedComparison {
    const oursSpeed = SpeedResolver.effectiveSpeed(ours, field, config);
    const theirsSpeed = SpeedResolver.effectiveSpeed(theirs, field, config);
    const theirsScarfSpeed = theirs.item === null
      ? SpeedResolver.effectiveSpeed({ ...theirs, item: 'choicescarf' }, field, config)
      : null;

    const verdictOf = (o: number, t: number): SpeedComparison['verdict'] => {
      if (o === t) return 'tie';
      const oursFaster = o > t;
      return (field.trickRoom ? !oursFaster : oursFaster) ? 'ours' : 'theirs';
    };

    const notes: string[] = [];
    if (ours.status === 'par') notes.push('Our active is paralyzed (speed halved)');
    if (theirs.status === 'par') notes.push('Opponent is paralyzed (speed halved)');
    if (field.trickRoom) notes.push('Trick Room is active (slower side moves first)');
    if (field.sides.ours.screens.tailwind > 0) notes.push('Our Tailwind is active (speed doubled)');
    if (field.sides.theirs.screens.tailwind > 0) notes.push("Opponent's Tailwind is active (speed doubled)");
    if (theirsScarfSpeed !== null) notes.push('Opponent item unknown: could be Choice Scarf');

    const oursPriorityMoves = SpeedResolver.priorityMoves(ours);
    const theirsPriorityMoves = SpeedResolver.priorityMoves(theirs);
    const positive = theirsPriorityMoves.filter(m => m.priority > 0);
    if (positive.length > 0) {
      notes.push(`Opponent priority: ${positive.map(m => `${m.moveId} (+${m.priority}${m.estimated ? ', estimated' : ''})`).join(', ')}`);
    }

    return {
      oursSpeed,
      theirsSpeed,
      theirsScarfSpeed,
      verdict: verdictOf(oursSpeed, theirsSpeed),
      verdictIfScarf: theirsScarfSpeed === null ? null : verdictOf(oursSpeed, theirsScarfSpeed),
      oursPriorityMoves,
      theirsPriorityMoves,
      notes,
    };
  },
};

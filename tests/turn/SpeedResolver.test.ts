import { describe, it, expect } from 'vitest';
import { SpeedResolver } from '@/engine/systems/turn/SpeedResolver';
import type { BattleAction } from '@/engine/systems/turn/SpeedResolver';
import { MoveTable } from '@/engine/loader/MoveTable';
import type { MoveData } from '@/engine/data/types/Move';
import type { Combatant } from '@/engine/data/types/Combatant';
import { known, makeCombatant, neutralField } from '../integration/helpers';

function move(id: string): MoveData {
  const m = MoveTable.get(id);
  if (!m) throw new Error(`missing move ${id}`);
  return m;
}

function use(actor: Combatant, id: string): BattleAction {
  return { kind: 'move', actor, move: move(id) };
}

function mulberry32(seed: number): () => number {
  let a = seed;
  return () => {
    a = (a + 0x6d2b79f5) | 0;
    let t = Math.imul(a ^ (a >>> 15), 1 | a);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

// Base 100 Speed → 257; base 120 → 297
const slow = makeCombatant('p1:slow');
const fast = makeCombatant('p2:fast', { side: 'theirs', baseStats: { spe: 120 } });

describe('SpeedResolver', () => {
  it('faster combatant moves first at equal priority', () => {
    const a = use(slow, 'tackle');
    const b = use(fast, 'tackle');
    const order = SpeedResolver.resolveOrder(a, b, neutralField());
    expect(order.kind).toBe('resolved');
    if (order.kind !== 'resolved') return;
    expect(order.first).toBe(b);
    expect(order.decidedBy).toBe('speed');
    expect(order.speeds).toEqual([257, 297]);
  });

  it('higher priority beats higher speed', () => {
    const a = use(slow, 'quickattack');
    const b = use(fast, 'tackle');
    const order = SpeedResolver.resolveOrder(a, b, neutralField());
    expect(order.kind === 'resolved' && order.first).toBe(a);
    expect(order.kind === 'resolved' && order.decidedBy).toBe('priority');
  });

  it('switches go before any move', () => {
    const a: BattleAction = { kind: 'switch', actor: slow };
    const b = use(fast, 'protect');
    const order = SpeedResolver.resolveOrder(a, b, neutralField());
    expect(order.kind === 'resolved' && order.first).toBe(a);
  });

  it('Trick Room inverts the speed comparison only', () => {
    const field = neutralField({ trickRoom: true });
    const bySpeed = SpeedResolver.resolveOrder(use(slow, 'tackle'), use(fast, 'tackle'), field);
    expect(bySpeed.kind === 'resolved' && bySpeed.first.actor.id).toBe('p1:slow');

    const byPriority = SpeedResolver.resolveOrder(use(slow, 'tackle'), use(fast, 'quickattack'), field);
    expect(byPriority.kind === 'resolved' && byPriority.first.actor.id).toBe('p2:fast');
  });

  it('exact ties are undetermined', () => {
    const twin = makeCombatant('p2:twin', { side: 'theirs' });
    const order = SpeedResolver.resolveOrder(use(slow, 'tackle'), use(twin, 'tackle'), neutralField());
    expect(order.kind).toBe('undetermined');
    if (order.kind !== 'undetermined') return;
    expect(order.code).toBe('UNDETERMINED_ORDER');
    expect(order.speeds).toEqual([257, 257]);
  });

  it('paralysis halves speed; Quick Feet boosts instead', () => {
    expect(SpeedResolver.effectiveSpeed({ ...slow, status: 'par' }, neutralField())).toBe(128);
    expect(SpeedResolver.effectiveSpeed({ ...slow, status: 'par', ability: 'quickfeet' }, neutralField())).toBe(385);
  });

  it('boosts, scarf and tailwind stack', () => {
    const field = neutralField();
    field.sides.ours.screens.tailwind = 3;
    const boosted = { ...slow, boosts: { spe: 1 }, item: 'choicescarf' };
    // floor(257 * 1.5) = 385 → floor(385 * 1.5) = 577 → ×2
    expect(SpeedResolver.effectiveSpeed(boosted, field)).toBe(1154);
  });

  it('weather speed abilities only work in their weather', () => {
    const swimmer = { ...slow, ability: 'swiftswim' };
    expect(SpeedResolver.effectiveSpeed(swimmer, neutralField())).toBe(257);
    expect(SpeedResolver.effectiveSpeed(swimmer, neutralField({ weather: 'rain' }))).toBe(514);
  });

  it('Prankster raises status move priority', () => {
    const prankster = { ...slow, ability: 'prankster' };
    expect(SpeedResolver.priorityOf(use(prankster, 'thunderwave'))).toBe(1);
    expect(SpeedResolver.priorityOf(use(prankster, 'tackle'))).toBe(0);
  });

  it('compare reports the Choice Scarf scenario for an unknown item', () => {
    const mystery = { ...fast, item: null };
    const report = SpeedResolver.compare(slow, mystery, neutralField());
    expect(report.verdict).toBe('theirs');
    expect(report.theirsScarfSpeed).toBe(445);
    expect(report.verdictIfScarf).toBe('theirs');
    expect(report.notes).toContain('Opponent item unknown: could be Choice Scarf');
  });

  it('compare omits the scarf scenario for a known item', () => {
    const report = SpeedResolver.compare(slow, fast, neutralField());
    expect(report.theirsScarfSpeed).toBeNull();
    expect(report.verdictIfScarf).toBeNull();
  });

  it('lists priority moves, marking unrevealed ones as estimated', () => {
    const priority = makeCombatant('p2:priority', {
      side: 'theirs',
      moves: [
        { id: 'quickattack', revealed: true },
        { id: 'extremespeed', revealed: false },
        { id: 'tackle', revealed: true },
        { id: 'trickroom', revealed: true },
      ],
    });
    const report = SpeedResolver.compare(slow, priority, neutralField());
    expect(report.theirsPriorityMoves).toEqual([
      { moveId: 'extremespeed', priority: 2, estimated: true },
      { moveId: 'quickattack', priority: 1, estimated: false },
      { moveId: 'trickroom', priority: -7, estimated: false },
    ]);
    expect(report.oursPriorityMoves).toEqual([]);
    expect(report.notes).toContain('Opponent priority: extremespeed (+2, estimated), quickattack (+1)');
  });

  it('priority moves include ability-granted priority', () => {
    const prankster = makeCombatant('p1:prankster', {
      ability: 'prankster',
      moves: known('thunderwave', 'tackle'),
    });
    expect(SpeedResolver.priorityMoves(prankster)).toEqual([
      { moveId: 'thunderwave', priority: 1, estimated: false },
    ]);
  });

  it('order is consistent across 1000 random pairings', () => {
    const rand = mulberry32(42);
    const moves = ['tackle', 'quickattack', 'extremespeed', 'protect', 'trickroom'];
    const pick = (): string => moves[Math.floor(rand() * moves.length)] ?? 'tackle';

    for (let i = 0; i < 1000; i++) {
      const field = neutralField({ trickRoom: rand() < 0.3 });
      const a = makeCombatant('p1:a', {
        baseStats: { spe: 20 + Math.floor(rand() * 130) },
        boosts: { spe: Math.floor(rand() * 13) - 6 },
      });
      const b = makeCombatant('p2:b', {
        side: 'theirs',
        baseStats: { spe: 20 + Math.floor(rand() * 130) },
        status: rand() < 0.2 ? 'par' : 'none',
      });
      const actA = use(a, pick());
      const actB = use(b, pick());
      const order = SpeedResolver.resolveOrder(actA, actB, field);
      const swapped = SpeedResolver.resolveOrder(actB, actA, field);

      const prioA = SpeedResolver.priorityOf(actA);
      const prioB = SpeedResolver.priorityOf(actB);
      const speedA = SpeedResolver.effectiveSpeed(a, field);
      const speedB = SpeedResolver.effectiveSpeed(b, field);

      if (prioA === prioB && speedA === speedB) {
        expect(order.kind).toBe('undetermined');
        expect(swapped.kind).toBe('undetermined');
        continue;
      }
      expect(order.kind).toBe('resolved');
      expect(swapped.kind).toBe('resolved');
      if (order.kind !== 'resolved' || swapped.kind !== 'resolved') continue;

      // Swapping the arguments never changes who goes first
      expect(order.first).toBe(swapped.first);

      const expectedFirst = prioA !== prioB
        ? (prioA > prioB ? actA : actB)
        : ((speedA > speedB) !== field.trickRoom ? actA : actB);
      expect(order.first).toBe(expectedFirst);
    }
  });
});

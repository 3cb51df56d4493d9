import { describe, it, expect } from 'vitest';
import { MoveRanker } from '@/engine/systems/ai/MoveRanker';
import type { MoveRankInput } from '@/engine/systems/ai/MoveRanker';
import { known, makeCombatant, neutralField } from '../integration/helpers';

const chomp = makeCombatant('p1:chomp', {
  types: ['ground', 'dragon'],
  baseStats: { atk: 130 },
});
const volt = makeCombatant('p2:volt', {
  side: 'theirs',
  types: ['electric'],
  baseStats: { hp: 69 },
});

function input(overrides: Partial<MoveRankInput> = {}): MoveRankInput {
  return {
    active: chomp,
    opponent: volt,
    opponentBench: [],
    field: neutralField(),
    legalMoves: ['swordsdance', 'earthquake'],
    lockedMoveId: null,
    ...overrides,
  };
}

describe('MoveRanker', () => {
  it('ranks the edge-of-KO hit above a status move', () => {
    const { options } = MoveRanker.rank(input());
    expect(options.map(o => o.id)).toEqual(['earthquake', 'swordsdance']);

    const [eq, sd] = options;
    expect(eq?.rank).toBe(1);
    expect(eq?.fields).toMatchObject({
      tier: 'probable_ko',
      koProbability: 0.3125,
      koChanceWithAccuracy: 0.3125,
      minPercent: 88.7,
      maxPercent: 104.7,
      expectedPercent: 96.4,
      effectiveness: 2,
      order: 'unknown',
    });
    expect(eq?.reasoning).toBe('KO chance 31%; 88.7%-104.7% (avg 96.4%) to p2:volt; super effective x2');
    expect(sd?.fields.tier).toBe('status');
    expect(sd?.reasoning).toBe('Status move, no direct damage');
  });

  it('orders guaranteed KO > probable KO > chip > status > no effect', () => {
    const bird = makeCombatant('p2:bird', { side: 'theirs', types: ['flying'], hpPercent: 20 });
    const { options } = MoveRanker.rank(input({
      opponent: bird,
      legalMoves: ['earthquake', 'swordsdance', 'tackle', 'outrage'],
    }));
    expect(options.map(o => [o.id, o.fields.tier])).toEqual([
      ['outrage', 'guaranteed_ko'],
      ['tackle', 'chip'],
      ['swordsdance', 'status'],
      ['earthquake', 'no_effect'],
    ]);
    expect(options.map(o => o.rank)).toEqual([1, 2, 3, 4]);
  });

  it('a sure KO that can miss stays a probable KO', () => {
    const bird = makeCombatant('p2:bird', { side: 'theirs', types: ['flying'], hpPercent: 20 });
    const { options } = MoveRanker.rank(input({ opponent: bird, legalMoves: ['stoneedge'] }));
    expect(options[0]?.fields).toMatchObject({
      tier: 'probable_ko',
      koProbability: 1,
      koChanceWithAccuracy: 0.8,
      accuracy: 80,
    });
  });

  it('states priority in the reasoning', () => {
    const { options } = MoveRanker.rank(input({ legalMoves: ['extremespeed', 'trickroom'] }));
    const espeed = options.find(o => o.id === 'extremespeed');
    const room = options.find(o => o.id === 'trickroom');
    expect(espeed?.fields.priority).toBe(2);
    expect(espeed?.reasoning.endsWith('; +2 priority')).toBe(true);
    expect(room?.fields.priority).toBe(-7);
    expect(room?.reasoning).toBe('Status move, no direct damage; -7 priority (moves last)');
  });

  it('collapses to the locked move', () => {
    const { options } = MoveRanker.rank(input({ lockedMoveId: 'earthquake', legalMoves: ['earthquake', 'tackle'] }));
    expect(options.map(o => o.id)).toEqual(['earthquake']);
  });

  it('reports an empty candidate set', () => {
    const ranking = MoveRanker.rank(input({ legalMoves: [] }));
    expect(ranking.options).toEqual([]);
    expect(ranking.reason).toBe('EMPTY_CANDIDATE_SET');
    expect(ranking.detail).toBe('No legal moves');
  });

  it('skips unknown move ids', () => {
    const { options } = MoveRanker.rank(input({ legalMoves: ['notamove', 'tackle'] }));
    expect(options.map(o => o.id)).toEqual(['tackle']);
  });

  it('order verdict follows the predicted move', () => {
    const predictedPriority = MoveRanker.rank(input({
      legalMoves: ['earthquake'],
      predictions: [{ kind: 'move', moveId: 'quickattack', probability: 1 }],
    }));
    expect(predictedPriority.options[0]?.fields.order).toBe('second');
    expect(predictedPriority.options[0]?.reasoning.endsWith('moves second')).toBe(true);

    const predictedTie = MoveRanker.rank(input({
      legalMoves: ['earthquake'],
      predictions: [{ kind: 'move', moveId: 'tackle', probability: 1 }],
    }));
    expect(predictedTie.options[0]?.fields.order).toBe('undetermined');
  });

  it('falls back to the opponent strongest move for the order verdict', () => {
    const quick = { ...volt, baseStats: { ...volt.baseStats, spe: 50 }, moves: known('surf') };
    const { options } = MoveRanker.rank(input({ opponent: quick, legalMoves: ['earthquake'] }));
    expect(options[0]?.fields.order).toBe('first');
  });

  it('scores damage into the predicted switch-in', () => {
    const bird = makeCombatant('p2:bird', { side: 'theirs', types: ['flying'] });
    const { options } = MoveRanker.rank(input({
      legalMoves: ['earthquake', 'tackle'],
      opponentBench: [bird],
      predictions: [
        { kind: 'move', moveId: 'tackle', probability: 0.6 },
        { kind: 'switch', targetId: 'p2:bird', probability: 0.4 },
      ],
    }));
    const eq = options.find(o => o.id === 'earthquake');
    const tackle = options.find(o => o.id === 'tackle');
    expect(eq?.fields.switchInId).toBe('p2:bird');
    expect(eq?.fields.switchInExpectedPercent).toBe(0);
    expect(tackle?.fields.switchInExpectedPercent).toBeGreaterThan(0);
  });

  it('breaks full ties by move id', () => {
    const { options } = MoveRanker.rank(input({ legalMoves: ['swordsdance', 'calmmind', 'dragondance'] }));
    expect(options.map(o => o.id)).toEqual(['calmmind', 'dragondance', 'swordsdance']);
  });
});

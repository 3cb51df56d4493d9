import { describe, it, expect, vi, afterEach } from 'vitest';
import { MatchupCache } from '@/engine/systems/matchup/MatchupCache';
import { MatchupKeys } from '@/engine/systems/matchup/MatchupKey';
import { EventBus } from '@/engine/utils/EventBus';
import { makeCombatant, neutralField, outcome } from '../integration/helpers';

const a = makeCombatant('p1:a');
const b = makeCombatant('p2:b', { side: 'theirs' });
const c = makeCombatant('p2:c', { side: 'theirs' });
const keyAB = MatchupKeys.fromCombatants(a, b, neutralField());
const keyAC = MatchupKeys.fromCombatants(a, c, neutralField());

describe('MatchupCache', () => {
  afterEach(() => {
    EventBus.clear();
  });

  it('returns what was put', () => {
    const cache = new MatchupCache();
    cache.put(keyAB, outcome('a_wins', 40));
    expect(cache.get(keyAB)?.result).toBe('a_wins');
    expect(cache.size).toBe(1);
  });

  it('misses once a combatant crosses an HP bucket', () => {
    const cache = new MatchupCache();
    cache.put(keyAB, outcome('a_wins', 40));
    const hurt = MatchupKeys.fromCombatants({ ...a, hpPercent: 60 }, b, neutralField());
    expect(cache.get(hurt)).toBeUndefined();
  });

  it('misses when the field changes', () => {
    const cache = new MatchupCache();
    cache.put(keyAB, outcome('a_wins', 40));
    const rainy = MatchupKeys.fromCombatants(a, b, neutralField({ weather: 'rain' }));
    expect(cache.has(rainy)).toBe(false);
  });

  it('stores frozen outcomes', () => {
    const cache = new MatchupCache();
    cache.put(keyAB, outcome('draw'));
    const stored = cache.get(keyAB);
    expect(stored && Object.isFrozen(stored)).toBe(true);
  });

  it('last writer wins', () => {
    const cache = new MatchupCache();
    cache.put(keyAB, outcome('a_wins', 40));
    cache.put(keyAB, outcome('b_wins', 10));
    expect(cache.get(keyAB)?.result).toBe('b_wins');
    expect(cache.size).toBe(1);
  });

  it('invalidate drops only entries touching the combatant', () => {
    const cache = new MatchupCache();
    const events: number[] = [];
    EventBus.on('cacheInvalidated', e => events.push(e.removed));
    cache.put(keyAB, outcome('a_wins', 40));
    cache.put(keyAC, outcome('draw'));

    expect(cache.invalidate('p2:b')).toBe(1);
    expect(cache.has(keyAB)).toBe(false);
    expect(cache.has(keyAC)).toBe(true);
    expect(cache.invalidate('p1:a')).toBe(1);
    expect(cache.size).toBe(0);
    expect(events).toEqual([1, 1]);
  });

  it('getOrCompute computes once', () => {
    const cache = new MatchupCache();
    const compute = vi.fn(() => outcome('a_wins', 55));
    expect(cache.getOrCompute(keyAB, compute).winnerRemainingHpPercent).toBe(55);
    expect(cache.getOrCompute(keyAB, compute).winnerRemainingHpPercent).toBe(55);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it('emits hit and miss events', () => {
    const cache = new MatchupCache();
    const seen: string[] = [];
    EventBus.on('cacheHit', () => seen.push('hit'));
    EventBus.on('cacheMiss', () => seen.push('miss'));
    cache.get(keyAB);
    cache.put(keyAB, outcome('draw'));
    cache.get(keyAB);
    expect(seen).toEqual(['miss', 'hit']);
  });

  it('a read-through miss emits exactly one event', () => {
    const cache = new MatchupCache();
    const seen: string[] = [];
    EventBus.on('cacheHit', () => seen.push('hit'));
    EventBus.on('cacheMiss', () => seen.push('miss'));
    cache.getOrCompute(keyAB, () => outcome('draw'));
    expect(seen).toEqual(['miss']);
    cache.getOrCompute(keyAB, () => outcome('draw'));
    expect(seen).toEqual(['miss', 'hit']);
  });

  it('invalidate bumps the combatant generation', () => {
    const cache = new MatchupCache();
    expect(cache.generationOf('p2:b')).toBe(0);
    cache.invalidate('p2:b');
    cache.invalidate('p2:b');
    expect(cache.generationOf('p2:b')).toBe(2);
    expect(cache.generationOf('p1:a')).toBe(0);
  });

  it('dispose clears entries and ignores later puts', () => {
    const cache = new MatchupCache();
    cache.put(keyAB, outcome('draw'));
    cache.dispose();
    expect(cache.size).toBe(0);
    cache.put(keyAB, outcome('draw'));
    expect(cache.has(keyAB)).toBe(false);
    expect(cache.isDisposed).toBe(true);
  });

  it('warm skips keys already present', async () => {
    const cache = new MatchupCache();
    cache.put(keyAB, outcome('a_wins', 40));
    const computeAB = vi.fn(() => outcome('b_wins', 5));
    const computeAC = vi.fn(() => outcome('draw'));

    const report = await cache.warm([
      { key: keyAB, compute: computeAB },
      { key: keyAC, compute: computeAC },
    ]);

    expect(report).toEqual({ computed: 1, skipped: 1, stale: 0, aborted: false });
    expect(computeAB).not.toHaveBeenCalled();
    expect(cache.get(keyAB)?.result).toBe('a_wins');
    expect(cache.get(keyAC)?.result).toBe('draw');
  });

  it('warm skips keys computed in the foreground while it runs', async () => {
    const cache = new MatchupCache();
    const background = vi.fn(() => outcome('b_wins', 5));
    const pending = cache.warm([{ key: keyAB, compute: background }]);
    cache.put(keyAB, outcome('a_wins', 40));
    const report = await pending;
    expect(report.skipped).toBe(1);
    expect(background).not.toHaveBeenCalled();
  });

  it('warm drops jobs for a combatant invalidated after it started', async () => {
    const cache = new MatchupCache();
    const computeAB = vi.fn(() => outcome('draw'));
    const computeAC = vi.fn(() => outcome('a_wins', 30));
    const pending = cache.warm([
      { key: keyAB, compute: computeAB },
      { key: keyAC, compute: computeAC },
    ]);
    cache.invalidate('p2:b');
    const report = await pending;

    expect(report).toEqual({ computed: 1, skipped: 0, stale: 1, aborted: false });
    expect(computeAB).not.toHaveBeenCalled();
    expect(cache.has(keyAB)).toBe(false);
    expect(cache.get(keyAC)?.result).toBe('a_wins');
  });

  it('warm stops when the cache is disposed', async () => {
    const cache = new MatchupCache();
    const compute = vi.fn(() => outcome('draw'));
    const pending = cache.warm([{ key: keyAB, compute }, { key: keyAC, compute }]);
    cache.dispose();
    const report = await pending;
    expect(report).toEqual({ computed: 0, skipped: 0, stale: 0, aborted: true });
    expect(compute).not.toHaveBeenCalled();
  });
});

// ─────────────────────────────────────────────
//  Stat Calculation
//  Pure functions — raw stats from base stats, level and spread.
// ─────────────────────────────────────────────

import type { BoostKey, Combatant, StatKey } from '@/engine/data/types/Combatant';
import { boostOf } from '@/engine/data/types/Combatant';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG } from '@/config';

export function evBonus(ev: number): number {
  return Math.floor(ev / 4);
}

export function calcHpMax(base: number, level: number, ev: number, iv: number): number {
  return Math.floor(((2 * base + iv + evBonus(ev)) * level) / 100) + level + 10;
}

export function calcNonHpStat(base: number, level: number, ev: number, iv: number): number {
  return Math.floor(((2 * base + iv + evBonus(ev)) * level) / 100) + 5;
}

/** Stage multiplier: +n → (2+n)/2, −n → 2/(2+n) */
export function boostMultiplier(stage: number): number {
  const s = Math.max(-6, Math.min(6, Math.trunc(stage)));
  return s >= 0 ? (2 + s) / 2 : 2 / (2 - s);
}

export const StatCalc = {
  /** Raw (unboosted) stat, preferring exact stats from the snapshot */
  raw(c: Combatant, key: StatKey, config: EngineConfig = ENGINE_CONFIG): number {
    if (c.stats) return c.stats[key];
    const ev = c.evs?.[key] ?? config.evs[key];
    const iv = c.ivs?.[key] ?? config.ivs[key];
    const base = c.baseStats[key];
    return key === 'hp'
      ? calcHpMax(base, c.level, ev, iv)
      : calcNonHpStat(base, c.level, ev, iv);
  },

  maxHp(c: Combatant, config: EngineConfig = ENGINE_CONFIG): number {
    return StatCalc.raw(c, 'hp', config);
  },

  /** Current HP in points, from the snapshot's percentage */
  currentHp(c: Combatant, config: EngineConfig = ENGINE_CONFIG): number {
    if (c.hpPercent <= 0) return 0;
    return Math.max(1, Math.floor((StatCalc.maxHp(c, config) * c.hpPercent) / 100));
  },

  /** Stat with the current stage applied */
  boosted(c: Combatant, key: BoostKey, config: EngineConfig = ENGINE_CONFIG): number {
    return Math.floor(StatCalc.raw(c, key, config) * boostMultiplier(boostOf(c, key)));
  },
};

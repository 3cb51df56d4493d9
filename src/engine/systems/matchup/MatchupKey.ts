// ─────────────────────────────────────────────
//  Matchup Keys
//  Everything a simulated outcome depends on, coarsened so that
//  near-identical states share a cache entry.
// ─────────────────────────────────────────────

import type { Combatant } from '@/engine/data/types/Combatant';
import { BOOST_KEYS, boostOf } from '@/engine/data/types/Combatant';
import type { FieldState, SideField } from '@/engine/data/types/Field';
import type { MatchupKey } from '@/engine/data/types/Analysis';
import type { EngineConfig } from '@/config';
import { ENGINE_CONFIG } from '@/config';
import { MathUtils } from '@/engine/utils/MathUtils';

/** Non-zero boosts in fixed stat order, e.g. "atk+2,spe-1"; "" when unboosted */
export function boostSignature(c: Combatant): string {
  return BOOST_KEYS
    .filter(k => boostOf(c, k) !== 0)
    .map(k => {
      const stage = boostOf(c, k);
      return `${k}${stage > 0 ? '+' : ''}${stage}`;
    })
    .join(',');
}

function sideSignature(side: SideField): string {
  const s = side.screens;
  const flags = [
    s.reflect > 0 ? 'R' : '',
    s.lightScreen > 0 ? 'L' : '',
    s.auroraVeil > 0 ? 'V' : '',
    s.tailwind > 0 ? 'T' : '',
  ].join('');
  return flags || '-';
}

/** Weather, terrain, Trick Room and both sides' screens / tailwind */
export function fieldSignature(field: FieldState): string {
  return [
    field.weather,
    field.terrain,
    field.trickRoom ? 'tr' : '-',
    sideSignature(field.sides.ours),
    sideSignature(field.sides.theirs),
  ].join('/');
}

export const MatchupKeys = {
  fromCombatants(
    a: Combatant,
    b: Combatant,
    field: FieldState,
    config: EngineConfig = ENGINE_CONFIG,
  ): MatchupKey {
    return {
      aId: a.id,
      bId: b.id,
      aHpBucket: MathUtils.bucket(a.hpPercent, config.hpBucket),
      bHpBucket: MathUtils.bucket(b.hpPercent, config.hpBucket),
      aStatus: a.status,
      bStatus: b.status,
      aBoosts: boostSignature(a),
      bBoosts: boostSignature(b),
      field: fieldSignature(field),
    };
  },

  serialize(key: MatchupKey): string {
    return [
      key.aId, key.bId,
      key.aHpBucket, key.bHpBucket,
      key.aStatus, key.bStatus,
      key.aBoosts, key.bBoosts,
      key.field,
    ].join('|');
  },

  /** True when either side of the key is the given combatant */
  involves(key: MatchupKey, combatantId: string): boolean {
    return key.aId === combatantId || key.bId === combatantId;
  },
};

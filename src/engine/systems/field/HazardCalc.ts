// ─────────────────────────────────────────────
//  Entry Hazards — damage taken on switching in
// ─────────────────────────────────────────────

import type { Combatant } from '@/engine/data/types/Combatant';
import { isGrounded } from '@/engine/data/types/Combatant';
import type { SideHazards } from '@/engine/data/types/Field';
import { TypeChart } from '@/engine/systems/combat/TypeChart';

/** Spikes damage by layer count, as percent of max HP */
const SPIKES_PERCENT: Record<number, number> = { 0: 0, 1: 100 / 8, 2: 100 / 6, 3: 100 / 4 };

export interface HazardReport {
  damagePercent: number;
  notes: string[];
}

export const HazardCalc = {
  entry(c: Combatant, hazards: SideHazards): HazardReport {
    const notes: string[] = [];
    if (c.item === 'heavydutyboots' || c.ability === 'magicguard') {
      return { damagePercent: 0, notes };
    }

    let damage = 0;
    if (hazards.stealthRock) {
      damage += 12.5 * TypeChart.effectiveness('rock', c.types);
    }
    const grounded = isGrounded(c);
    if (grounded && hazards.spikes > 0) {
      damage += SPIKES_PERCENT[Math.min(3, hazards.spikes)] ?? 0;
    }
    if (grounded && hazards.toxicSpikes > 0 && c.status === 'none'
      && !c.types.includes('poison') && !c.types.includes('steel')) {
      notes.push(hazards.toxicSpikes >= 2 ? 'Toxic Spikes will badly poison' : 'Toxic Spikes will poison');
    }
    if (grounded && hazards.stickyWeb) notes.push('Sticky Web will lower Speed');

    return { damagePercent: damage, notes };
  },
};

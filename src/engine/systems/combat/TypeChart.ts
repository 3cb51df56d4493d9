// ─────────────────────────────────────────────
//  Type effectiveness chart
//  Flat (attacking > defending) → multiplier map; missing pairs are neutral.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { PokemonType } from '@/engine/data/types/Combatant';
import chartJson from '@/assets/data/typechart.json';

const ChartSchema = z.record(
  z.string().regex(/^[a-z]+>[a-z]+$/),
  z.union([z.literal(0), z.literal(0.5), z.literal(2)]),
);

const TABLE: Record<string, number> = ChartSchema.parse(chartJson);

export const TypeChart = {
  /**
   * Returns the damage multiplier when an attack of `atkType`
   * hits a single `defType`.
   */
  get(atkType: PokemonType, defType: PokemonType): number {
    return TABLE[`${atkType}>${defType}`] ?? 1.0;
  },

  /** Product over every type of a (possibly dual-typed) defender */
  effectiveness(atkType: PokemonType, defTypes: readonly PokemonType[]): number {
    return defTypes.reduce((mult, t) => mult * TypeChart.get(atkType, t), 1);
  },
};

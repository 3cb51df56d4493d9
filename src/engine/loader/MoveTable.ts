// ─────────────────────────────────────────────
//  MoveTable
//  One record per move, loaded from assets/data/moves.json
//  and validated once at import time.
// ─────────────────────────────────────────────

import { z } from 'zod';
import type { MoveData } from '@/engine/data/types/Move';
import type { Combatant } from '@/engine/data/types/Combatant';
import { POKEMON_TYPES } from '@/engine/data/types/Combatant';
import movesJson from '@/assets/data/moves.json';
import { Logger } from '@/engine/utils/Logger';

const FlagsSchema = z.object({
  contact: z.boolean().optional(),
  multihit: z.union([
    z.number().int().positive(),
    z.tuple([z.number().int().positive(), z.number().int().positive()]),
  ]).optional(),
  fixedDamage: z.enum(['level', 'halfHp']).optional(),
  ohko: z.boolean().optional(),
  recoil: z.number().min(0).max(1).optional(),
  drain: z.number().min(0).max(1).optional(),
  variablePower: z.object({
    condition: z.enum(['targetStatused', 'userStatused', 'userNoItem', 'targetHasItem', 'targetWeight']),
    min: z.number().positive(),
    max: z.number().positive(),
  }).optional(),
});

const MoveRecordSchema = z.object({
  name: z.string(),
  type: z.enum(POKEMON_TYPES),
  category: z.enum(['physical', 'special', 'status']),
  basePower: z.number().min(0),
  accuracy: z.union([z.number().min(0).max(100), z.literal(true)]),
  priority: z.number().int(),
  flags: FlagsSchema,
});

export const MoveTableSchema = z.record(z.string(), MoveRecordSchema);

/** Validate a raw move table and key it by normalised id */
export function parseMoveTable(raw: unknown): Map<string, MoveData> {
  const parsed = MoveTableSchema.parse(raw);
  const table = new Map<string, MoveData>();
  for (const [id, rec] of Object.entries(parsed)) {
    table.set(toMoveId(id), { id: toMoveId(id), ...rec });
  }
  return table;
}

/** "Double-Edge" → "doubleedge" */
export function toMoveId(name: string): string {
  return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

const TABLE = parseMoveTable(movesJson);

export const MoveTable = {
  get(id: string): MoveData | undefined {
    return TABLE.get(toMoveId(id));
  },

  has(id: string): boolean {
    return TABLE.has(toMoveId(id));
  },

  all(): MoveData[] {
    return [...TABLE.values()];
  },

  /** Resolve a list of ids, skipping (and logging) any the table does not know */
  resolve(ids: readonly string[]): MoveData[] {
    const out: MoveData[] = [];
    for (const id of ids) {
      const move = MoveTable.get(id);
      if (move) out.push(move);
      else Logger.log(`Unknown move "${id}" skipped`, 'warn');
    }
    return out;
  },

  /** Every known move of a combatant, revealed and inferred */
  forCombatant(c: Combatant): MoveData[] {
    return MoveTable.resolve(c.moves.map(m => m.id));
  },
};

// ─────────────────────────────────────────────
//  Combatant Types
// ─────────────────────────────────────────────

export const POKEMON_TYPES = [
  'normal', 'fire', 'water', 'electric', 'grass', 'ice',
  'fighting', 'poison', 'ground', 'flying', 'psychic', 'bug',
  'rock', 'ghost', 'dragon', 'dark', 'steel', 'fairy',
] as const;

export type PokemonType = typeof POKEMON_TYPES[number];

export type StatusCondition = 'none' | 'par' | 'brn' | 'psn' | 'slp' | 'frz' | 'tox';

export type SideId = 'ours' | 'theirs';

export interface StatBlock {
  hp: number;
  atk: number;
  def: number;
  spa: number;
  spd: number;
  spe: number;
}

export type StatKey = keyof StatBlock;
export type BoostKey = Exclude<StatKey, 'hp'>;
export type BoostTable = Partial<Record<BoostKey, number>>;

export const BOOST_KEYS: readonly BoostKey[] = ['atk', 'def', 'spa', 'spd', 'spe'];

/** A move slot on a combatant; inferred slots come from set data, not from the battle log */
export interface MoveSlot {
  readonly id: string;
  readonly revealed: boolean;
}

/**
 * Read-only view of one combatant for the duration of an analysis pass.
 * `item` / `ability`: null = unknown, '' = known to be absent.
 */
export interface Combatant {
  /** Battle-unique identity, e.g. `p1:garchomp` */
  readonly id: string;
  readonly side: SideId;
  readonly species: string;
  readonly types: readonly PokemonType[];
  readonly level: number;
  readonly baseStats: StatBlock;
  /** Exact stats when the snapshot knows them (our own side) */
  readonly stats?: Readonly<StatBlock>;
  readonly evs?: Readonly<Partial<StatBlock>>;
  readonly ivs?: Readonly<Partial<StatBlock>>;
  /** 0..100 */
  readonly hpPercent: number;
  readonly status: StatusCondition;
  readonly boosts: Readonly<BoostTable>;
  readonly item: string | null;
  readonly ability: string | null;
  readonly moves: readonly MoveSlot[];
}

export function isFainted(c: Combatant): boolean {
  return c.hpPercent <= 0;
}

export function hasType(c: Combatant, type: PokemonType): boolean {
  return c.types.includes(type);
}

export function boostOf(c: Combatant, key: BoostKey): number {
  return c.boosts[key] ?? 0;
}

/** Flying types, Levitate holders and Air Balloon holders are not grounded */
export function isGrounded(c: Combatant): boolean {
  if (hasType(c, 'flying')) return false;
  if (c.ability === 'levitate') return false;
  if (c.item === 'airballoon') return false;
  return true;
}

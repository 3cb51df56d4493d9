import type { StatBlock } from '@/engine/data/types/Combatant';

export const DEFAULT_LEVEL = 100;

/** Random-battle spread: 84 EVs and 31 IVs everywhere, neutral nature */
export const DEFAULT_EV = 84;
export const DEFAULT_IV = 31;

/** Every damage roll is one of these 16 percentages */
export const ROLL_MIN = 85;
export const ROLL_MAX = 100;

/** Switches resolve ahead of every move priority bracket */
export const SWITCH_PRIORITY = 7;

export interface EngineConfig {
  level: number;
  evs: StatBlock;
  ivs: StatBlock;
  /** HP granularity of matchup keys, in percent */
  hpBucket: number;
  /** Rounds the matchup simulator plays before giving up */
  turnCap: number;
  /** Expected chance to lose a turn, per status */
  skipProbability: { par: number; slp: number; frz: number };
  /** End-of-round HP fractions */
  residual: {
    burn: number;
    poison: number;
    /** Toxic deals toxicStep × n on the n-th round */
    toxicStep: number;
    sand: number;
    leftovers: number;
    blackSludgeDamage: number;
    lifeOrbRecoil: number;
  };
  logToConsole: boolean;
}

function spread(v: number): StatBlock {
  return { hp: v, atk: v, def: v, spa: v, spd: v, spe: v };
}

export const ENGINE_CONFIG: EngineConfig = {
  level: DEFAULT_LEVEL,
  evs: spread(DEFAULT_EV),
  ivs: spread(DEFAULT_IV),
  hpBucket: 5,
  turnCap: 20,
  skipProbability: { par: 0.25, slp: 0.5, frz: 0.8 },
  residual: {
    burn: 1 / 16,
    poison: 1 / 8,
    toxicStep: 1 / 16,
    sand: 1 / 16,
    leftovers: 1 / 16,
    blackSludgeDamage: 1 / 8,
    lifeOrbRecoil: 1 / 10,
  },
  logToConsole: process.env['BATTLE_ENGINE_LOG'] === '1',
};

/** Merge per-session overrides over the defaults (one level deep) */
export function resolveConfig(overrides: Partial<EngineConfig> = {}): EngineConfig {
  return {
    ...ENGINE_CONFIG,
    ...overrides,
    evs: { ...ENGINE_CONFIG.evs, ...overrides.evs },
    ivs: { ...ENGINE_CONFIG.ivs, ...overrides.ivs },
    skipProbability: { ...ENGINE_CONFIG.skipProbability, ...overrides.skipProbability },
    residual: { ...ENGINE_CONFIG.residual, ...overrides.residual },
  };
}

// ─────────────────────────────────────────────
//  Public API
// ─────────────────────────────────────────────

export * from '@/engine/data/types/Combatant';
export * from '@/engine/data/types/Move';
export * from '@/engine/data/types/Field';
export type * from '@/engine/data/types/Analysis';
export type * from '@/engine/data/types/Snapshot';
export * from '@/engine/errors';
export { ENGINE_CONFIG, resolveConfig } from '@/config';
export type { EngineConfig } from '@/config';

export { MoveTable, toMoveId } from '@/engine/loader/MoveTable';
export { TypeChart } from '@/engine/systems/combat/TypeChart';
export { StatCalc } from '@/engine/systems/combat/StatCalc';
export { DamageCalc } from '@/engine/systems/combat/DamageCalc';
export { SpeedResolver } from '@/engine/systems/turn/SpeedResolver';
export type { BattleAction, TurnOrder, SpeedComparison, PriorityMove } from '@/engine/systems/turn/SpeedResolver';
export { HazardCalc } from '@/engine/systems/field/HazardCalc';
export { MatchupSimulator } from '@/engine/systems/matchup/MatchupSimulator';
export { MatchupKeys } from '@/engine/systems/matchup/MatchupKey';
export { MatchupCache } from '@/engine/systems/matchup/MatchupCache';
export type { WarmJob, WarmReport } from '@/engine/systems/matchup/MatchupCache';
export { OpponentPredictor } from '@/engine/systems/ai/OpponentPredictor';
export { MoveRanker } from '@/engine/systems/ai/MoveRanker';
export type { MoveRanking, MoveRankInput, RankedMove } from '@/engine/systems/ai/MoveRanker';
export { SwitchRanker } from '@/engine/systems/ai/SwitchRanker';
export type { SwitchRanking, SwitchRankInput, RankedSwitch } from '@/engine/systems/ai/SwitchRanker';
export { AnalysisSession } from '@/engine/state/AnalysisSession';
export { EventBus } from '@/engine/utils/EventBus';
export type { EngineEventMap } from '@/engine/utils/EventBus';

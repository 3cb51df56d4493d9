// ─────────────────────────────────────────────
//  Analysis Session — one battle's analysis state
//  Holds the latest snapshot and the battle's matchup cache,
//  and wires predictor, rankers and simulator together.
// ─────────────────────────────────────────────

import type { Draft } from 'immer';
import { produce } from 'immer';
import type { Combatant } from '@/engine/data/types/Combatant';
import { isFainted } from '@/engine/data/types/Combatant';
import type { BattleSnapshot, OpponentPrediction } from '@/engine/data/types/Snapshot';
import type { MatchupKey, MatchupOutcome } from '@/engine/data/types/Analysis';
import type { EngineConfig } from '@/config';
import { resolveConfig } from '@/config';
import { MatchupCache } from '@/engine/systems/matchup/MatchupCache';
import type { WarmJob, WarmReport } from '@/engine/systems/matchup/MatchupCache';
import { MatchupKeys } from '@/engine/systems/matchup/MatchupKey';
import { MatchupSimulator } from '@/engine/systems/matchup/MatchupSimulator';
import { SpeedResolver } from '@/engine/systems/turn/SpeedResolver';
import type { SpeedComparison } from '@/engine/systems/turn/SpeedResolver';
import { OpponentPredictor } from '@/engine/systems/ai/OpponentPredictor';
import { MoveRanker } from '@/engine/systems/ai/MoveRanker';
import type { MoveRanking } from '@/engine/systems/ai/MoveRanker';
import { SwitchRanker } from '@/engine/systems/ai/SwitchRanker';
import type { SwitchRanking } from '@/engine/systems/ai/SwitchRanker';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

function everyone(snapshot: BattleSnapshot): Combatant[] {
  const out: Combatant[] = [];
  for (const side of [snapshot.ours, snapshot.theirs]) {
    if (side.active) out.push(side.active);
    out.push(...side.bench);
  }
  return out;
}

function alive(side: BattleSnapshot['ours']): Combatant[] {
  return [side.active, ...side.bench].filter((c): c is Combatant => c !== null && !isFainted(c));
}

/** Both sides at the HP their key bucket stands for, so every writer of a key agrees */
function atKeyHp(a: Combatant, b: Combatant, key: MatchupKey): [Combatant, Combatant] {
  return [{ ...a, hpPercent: key.aHpBucket }, { ...b, hpPercent: key.bHpBucket }];
}

function moveSignature(c: Combatant): string {
  return c.moves.map(m => `${m.id}:${m.revealed ? 1 : 0}`).sort().join(',');
}

/** Information whose change can alter any matchup involving `c`, whatever its HP */
function revealedChanged(prev: Combatant, next: Combatant): boolean {
  return moveSignature(prev) !== moveSignature(next)
    || prev.item !== next.item
    || prev.ability !== next.ability
    || prev.types.join('/') !== next.types.join('/')
    || isFainted(prev) !== isFainted(next);
}

export class AnalysisSession {
  readonly battleId: string;
  readonly config: EngineConfig;
  private snapshot: BattleSnapshot;
  private readonly cache = new MatchupCache();

  constructor(battleId: string, snapshot: BattleSnapshot, overrides: Partial<EngineConfig> = {}) {
    this.battleId = battleId;
    this.snapshot = snapshot;
    this.config = resolveConfig(overrides);
    Logger.log(`Analysis session ${battleId} opened`, 'system');
  }

  getSnapshot(): BattleSnapshot {
    return this.snapshot;
  }

  get matchupCache(): MatchupCache {
    return this.cache;
  }

  /**
   * Replace the snapshot. Combatants whose revealed information changed
   * (or who left the snapshot) have their cached matchups dropped.
   * Returns the ids that were invalidated.
   */
  update(next: BattleSnapshot): string[] {
    const before = new Map(everyone(this.snapshot).map(c => [c.id, c]));
    const after = new Map(everyone(next).map(c => [c.id, c]));
    const touched: string[] = [];

    for (const [id, prev] of before) {
      const now = after.get(id);
      if (!now || revealedChanged(prev, now)) touched.push(id);
    }

    this.snapshot = next;
    for (const id of touched) this.cache.invalidate(id);
    return touched;
  }

  /** Edit the snapshot in place through an immer recipe */
  apply(recipe: (draft: Draft<BattleSnapshot>) => void): string[] {
    return this.update(produce(this.snapshot, recipe));
  }

  /**
   * Outcome of `a` vs `b` on the current field, read through the cache.
   * Simulated at the HP bucket ceiling, not the exact HP.
   */
  matchup(a: Combatant, b: Combatant): MatchupOutcome {
    const key = MatchupKeys.fromCombatants(a, b, this.snapshot.field, this.config);
    return this.cache.getOrCompute(key, () => this.simulate(...atKeyHp(a, b, key)));
  }

  /** Background-populate every living ours × theirs pairing */
  warm(): Promise<WarmReport> {
    const field = this.snapshot.field;
    const jobs: WarmJob[] = [];
    for (const a of alive(this.snapshot.ours)) {
      for (const b of alive(this.snapshot.theirs)) {
        const key = MatchupKeys.fromCombatants(a, b, field, this.config);
        const [simA, simB] = atKeyHp(a, b, key);
        jobs.push({ key, compute: () => this.simulate(simA, simB, field) });
      }
    }
    return this.cache.warm(jobs);
  }

  speedReport(): SpeedComparison | null {
    const ours = this.snapshot.ours.active;
    const theirs = this.snapshot.theirs.active;
    if (!ours || !theirs) return null;
    return SpeedResolver.compare(ours, theirs, this.snapshot.field, this.config);
  }

  predictOpponent(): OpponentPrediction[] {
    const ours = this.snapshot.ours.active;
    const theirs = this.snapshot.theirs.active;
    if (!ours || !theirs) return [];
    return OpponentPredictor.predict(
      theirs, ours, this.snapshot.theirs.bench, this.snapshot.field,
      (a, b) => this.matchup(a, b), this.config,
    );
  }

  rankMoves(predictions: readonly OpponentPrediction[] = this.predictOpponent()): MoveRanking {
    const ours = this.snapshot.ours.active;
    const theirs = this.snapshot.theirs.active;
    if (!ours || !theirs) {
      return { options: [], reason: 'EMPTY_CANDIDATE_SET', detail: 'Both sides need an active combatant' };
    }
    return MoveRanker.rank({
      active: ours,
      opponent: theirs,
      opponentBench: this.snapshot.theirs.bench,
      field: this.snapshot.field,
      legalMoves: this.snapshot.legalMoves,
      lockedMoveId: this.snapshot.lockedMoveId,
      predictions,
      config: this.config,
    });
  }

  rankSwitches(predictions: readonly OpponentPrediction[] = this.predictOpponent()): SwitchRanking {
    const theirs = this.snapshot.theirs.active;
    if (!theirs) {
      return { options: [], reason: 'EMPTY_CANDIDATE_SET', detail: 'Opponent has no active combatant', eliminated: [] };
    }
    return SwitchRanker.rank({
      bench: this.snapshot.ours.bench,
      opponent: theirs,
      field: this.snapshot.field,
      predictions,
      matchupFor: (a, b) => this.matchup(a, b),
      config: this.config,
    });
  }

  /** Battle over: drop the cache and stop any warm-up in flight */
  dispose(): void {
    this.cache.dispose();
    EventBus.emit('sessionDisposed', { battleId: this.battleId });
    Logger.log(`Analysis session ${this.battleId} closed`, 'system');
  }

  private simulate(a: Combatant, b: Combatant, field = this.snapshot.field): MatchupOutcome {
    const outcome = MatchupSimulator.simulate(a, b, field, this.config.turnCap, this.config);
    EventBus.emit('matchupSimulated', { aId: a.id, bId: b.id, outcome });
    Logger.log(`${a.species} vs ${b.species}: ${outcome.result} (${outcome.note})`, 'matchup');
    return outcome;
  }
}

// ─────────────────────────────────────────────
//  Matchup Cache — one instance per battle
//  Entries are frozen outcomes keyed by MatchupKey. A changed
//  combatant produces a different key, so stale entries are simply
//  never looked up again; invalidate() prunes them eagerly and
//  bumps the combatant's generation so background jobs queued
//  before the change cannot write their outcome back.
// ─────────────────────────────────────────────

import { freeze } from 'immer';
import type { MatchupKey, MatchupOutcome } from '@/engine/data/types/Analysis';
import { MatchupKeys } from './MatchupKey';
import { EventBus } from '@/engine/utils/EventBus';
import { Logger } from '@/engine/utils/Logger';

interface CacheEntry {
  key: MatchupKey;
  outcome: MatchupOutcome;
}

export interface WarmJob {
  key: MatchupKey;
  compute: () => MatchupOutcome;
}

export interface WarmReport {
  computed: number;
  skipped: number;
  /** Jobs dropped because a combatant was invalidated after warm() started */
  stale: number;
  /** True when dispose() cut the run short */
  aborted: boolean;
}

/** Let pending foreground work run between background jobs */
function yieldToEventLoop(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

export class MatchupCache {
  private entries = new Map<string, CacheEntry>();
  private generations = new Map<string, number>();
  private disposed = false;

  get size(): number {
    return this.entries.size;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  has(key: MatchupKey): boolean {
    return this.entries.has(MatchupKeys.serialize(key));
  }

  /** Bumped by every invalidate() of the combatant */
  generationOf(combatantId: string): number {
    return this.generations.get(combatantId) ?? 0;
  }

  get(key: MatchupKey): MatchupOutcome | undefined {
    const id = MatchupKeys.serialize(key);
    const entry = this.entries.get(id);
    EventBus.emit(entry ? 'cacheHit' : 'cacheMiss', { key: id });
    return entry?.outcome;
  }

  /** Last writer wins. Ignored once the cache is disposed. */
  put(key: MatchupKey, outcome: MatchupOutcome): void {
    if (this.disposed) return;
    this.entries.set(MatchupKeys.serialize(key), {
      key,
      outcome: freeze({ ...outcome }, true),
    });
  }

  /** Read-through: compute and store on a miss */
  getOrCompute(key: MatchupKey, compute: () => MatchupOutcome): MatchupOutcome {
    const cached = this.get(key);
    if (cached) return cached;
    const outcome = compute();
    this.put(key, outcome);
    return this.entries.get(MatchupKeys.serialize(key))?.outcome ?? outcome;
  }

  /** Drop every entry with `combatantId` on either side; returns how many */
  invalidate(combatantId: string): number {
    this.generations.set(combatantId, this.generationOf(combatantId) + 1);
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (MatchupKeys.involves(entry.key, combatantId)) {
        this.entries.delete(id);
        removed++;
      }
    }
    EventBus.emit('cacheInvalidated', { combatantId, removed });
    if (removed > 0) Logger.log(`Invalidated ${removed} matchup(s) for ${combatantId}`, 'cache');
    return removed;
  }

  /**
   * Populate the cache in the background, one job per event-loop turn.
   * Keys computed in the meantime (foreground reads) are skipped, and
   * jobs for a combatant invalidated since the call are dropped.
   */
  async warm(jobs: readonly WarmJob[]): Promise<WarmReport> {
    const stamps = jobs.map(job => this.stampOf(job.key));
    let computed = 0;
    let skipped = 0;
    let stale = 0;
    for (const [i, job] of jobs.entries()) {
      await yieldToEventLoop();
      if (this.disposed) {
        return { computed, skipped, stale, aborted: true };
      }
      if (this.stampOf(job.key) !== stamps[i]) {
        stale++;
        continue;
      }
      if (this.has(job.key)) {
        skipped++;
        continue;
      }
      this.put(job.key, job.compute());
      computed++;
    }
    EventBus.emit('cacheWarmed', { computed, skipped, stale });
    Logger.log(`Warmed ${computed} matchup(s), ${skipped} already cached, ${stale} stale`, 'cache');
    return { computed, skipped, stale, aborted: false };
  }

  private stampOf(key: MatchupKey): string {
    return `${this.generationOf(key.aId)}:${this.generationOf(key.bId)}`;
  }

  /** Battle over: drop everything and refuse further writes */
  dispose(): void {
    this.entries.clear();
    this.disposed = true;
  }
}

// ─────────────────────────────────────────────
//  Typed Event Bus
//  Engine systems report what they computed through events;
//  callers subscribe for tracing and tests.
// ─────────────────────────────────────────────

import type { MatchupOutcome } from '@/engine/data/types/Analysis';

/** Centralised map of all engine events and their payload types */
export interface EngineEventMap {
  // Matchups
  matchupSimulated: { aId: string; bId: string; outcome: MatchupOutcome };

  // Cache
  cacheHit:         { key: string };
  cacheMiss:        { key: string };
  cacheInvalidated: { combatantId: string; removed: number };
  cacheWarmed:      { computed: number; skipped: number; stale: number };

  // Session lifecycle
  sessionDisposed:  { battleId: string };

  // Logging
  logMessage:       { text: string; cls: string };
}

type Listener<T> = (payload: T) => void;

type ListenerTable = { [K in keyof EngineEventMap]?: Listener<EngineEventMap[K]>[] };

class TypedEventBus {
  private listeners: ListenerTable = {};

  on<K extends keyof EngineEventMap>(event: K, listener: Listener<EngineEventMap[K]>): void {
    const arr: NonNullable<ListenerTable[K]> = this.listeners[event] ?? [];
    arr.push(listener);
    this.listeners[event] = arr;
  }

  off<K extends keyof EngineEventMap>(event: K, listener: Listener<EngineEventMap[K]>): void {
    const arr: Listener<EngineEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    const idx = arr.indexOf(listener);
    if (idx !== -1) arr.splice(idx, 1);
  }

  emit<K extends keyof EngineEventMap>(event: K, payload: EngineEventMap[K]): void {
    const arr: Listener<EngineEventMap[K]>[] | undefined = this.listeners[event];
    if (!arr) return;
    // Iterate a copy so listeners can safely remove themselves
    [...arr].forEach(fn => fn(payload));
  }

  /** Remove all listeners */
  clear(): void {
    this.listeners = {};
  }
}

/** Singleton event bus — carries no battle state, only notifications */
export const EventBus = new TypedEventBus();

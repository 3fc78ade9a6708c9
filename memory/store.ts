// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { isLive, remainingTtlMs } from "../common/backend.js";

/** Message of the error raised while a store is offline */
export const STORE_OFFLINE_MESSAGE = "Memory store is offline";

type Entry = { value: string; expiresAtMs: number | null };

/**
 * Options for {@link createMemoryStore}.
 */
export interface MemoryStoreOptions {
  /** Clock used for expiry (default: Date.now) */
  now?: () => number;
}

/**
 * A string key-value store with millisecond TTLs, living in this process.
 *
 * Each `run()` callback executes synchronously, so nothing interleaves with
 * it: this is what makes the memory backend's compare-and-act operations
 * atomic with respect to every client sharing the store.
 */
export interface MemoryStore {
  /** Current time on the store clock */
  now(): number;
  /** Whether the store accepts operations */
  readonly online: boolean;
  /** Takes the store offline/online to simulate an outage */
  setOnline(online: boolean): void;
  /** Liveness check; throws while offline */
  ping(): "PONG";
  /** Runs `fn` as one indivisible step; throws while offline */
  run<T>(fn: (tx: MemoryTransaction) => T): T;
  /** Number of live keys */
  readonly size: number;
}

/**
 * Commands available inside {@link MemoryStore.run}.
 */
export interface MemoryTransaction {
  get(key: string): string | null;
  /** Remaining TTL in ms; -2 when absent, -1 when the key has no expiry */
  pttl(key: string): number;
  set(key: string, value: string, ttlMs?: number): void;
  /** Sets only when absent (or expired); returns whether it wrote */
  setIfAbsent(key: string, value: string, ttlMs: number): boolean;
  del(...keys: string[]): number;
}

/**
 * Creates an empty in-process store.
 */
export function createMemoryStore(
  options: MemoryStoreOptions = {},
): MemoryStore {
  const now = options.now ?? Date.now;
  const entries = new Map<string, Entry>();
  let online = true;

  const ensureOnline = (): void => {
    if (!online) {
      throw new Error(STORE_OFFLINE_MESSAGE);
    }
  };

  // Expired entries are dropped lazily on access, like Redis passive expiry
  const live = (key: string, nowMs: number): Entry | undefined => {
    const entry = entries.get(key);
    if (
      entry &&
      entry.expiresAtMs !== null &&
      !isLive(entry.expiresAtMs, nowMs)
    ) {
      entries.delete(key);
      return undefined;
    }
    return entry;
  };

  const transaction = (nowMs: number): MemoryTransaction => ({
    get: (key) => live(key, nowMs)?.value ?? null,

    pttl(key) {
      const entry = live(key, nowMs);
      if (!entry) {
        return -2;
      }
      return entry.expiresAtMs === null
        ? -1
        : remainingTtlMs(entry.expiresAtMs, nowMs);
    },

    set(key, value, ttlMs) {
      entries.set(key, {
        value,
        expiresAtMs: ttlMs === undefined ? null : nowMs + ttlMs,
      });
    },

    setIfAbsent(key, value, ttlMs) {
      if (live(key, nowMs)) {
        return false;
      }
      entries.set(key, { value, expiresAtMs: nowMs + ttlMs });
      return true;
    },

    del(...keys) {
      let deleted = 0;
      for (const key of keys) {
        if (live(key, nowMs) && entries.delete(key)) {
          deleted++;
        }
      }
      return deleted;
    },
  });

  return {
    now,

    get online() {
      return online;
    },

    setOnline(value: boolean): void {
      online = value;
    },

    ping() {
      ensureOnline();
      return "PONG";
    },

    run<T>(fn: (tx: MemoryTransaction) => T): T {
      ensureOnline();
      // One clock reading per step: every command in it sees the same instant
      return fn(transaction(now()));
    },

    get size() {
      const nowMs = now();
      let count = 0;
      for (const key of [...entries.keys()]) {
        if (live(key, nowMs)) {
          count++;
        }
      }
      return count;
    },
  };
}

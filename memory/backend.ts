// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  BACKEND_LIMITS,
  DATA_KEY_SUFFIX,
  type LockBackend,
  type LockSnapshot,
  RESERVE_BYTES,
  makeStorageKey,
} from "../common/backend.js";
import { mapMemoryError } from "./errors.js";
import type { MemoryStore, MemoryTransaction } from "./store.js";
import type { MemoryCapabilities } from "./types.js";

/**
 * Creates the in-process store primitives for one client.
 *
 * Same key layout and semantics as the Redis backend: owner at
 * `{namespace}:{name}` with a TTL, payload at `{namespace}:{name}:data`.
 * Every operation is a single `store.run()` step, which gives acquire,
 * release and refresh the same indivisibility the Redis scripts have.
 *
 * @param getStore - Returns the attached store, or throws "ConnectionError"
 * @param namespace - Key namespace of the owning client
 */
export function createMemoryBackend(
  getStore: () => MemoryStore,
  namespace: string,
): LockBackend<MemoryCapabilities> {
  const capabilities: Readonly<MemoryCapabilities> = {
    backend: "memory",
    timeAuthority: "client",
  };

  const keysFor = (name: string) => {
    const ownerKey = makeStorageKey(
      namespace,
      name,
      BACKEND_LIMITS.REDIS,
      RESERVE_BYTES.REDIS,
    );
    return { ownerKey, dataKey: `${ownerKey}${DATA_KEY_SUFFIX}` };
  };

  const step = <T>(
    name: string,
    fn: (tx: MemoryTransaction, ownerKey: string, dataKey: string) => T,
  ): Promise<T> => {
    try {
      const { ownerKey, dataKey } = keysFor(name);
      return Promise.resolve(
        getStore().run((tx) => fn(tx, ownerKey, dataKey)),
      );
    } catch (error) {
      return Promise.reject(mapMemoryError(error));
    }
  };

  return {
    acquire: (opts) =>
      step(opts.name, (tx, ownerKey, dataKey) => {
        if (!tx.setIfAbsent(ownerKey, opts.ownerId, opts.ttlMs)) {
          return { ok: false, reason: "locked" } as const;
        }
        tx.set(dataKey, opts.data);
        return { ok: true } as const;
      }),

    release: (opts) =>
      step(opts.name, (tx, ownerKey, dataKey) => {
        if (tx.get(ownerKey) !== opts.ownerId) {
          return { ok: false } as const;
        }
        tx.del(ownerKey, dataKey);
        return { ok: true } as const;
      }),

    refresh: (opts) =>
      step(opts.name, (tx, ownerKey, dataKey) => {
        if (tx.get(ownerKey) !== opts.ownerId) {
          return { ok: false } as const;
        }
        tx.set(ownerKey, opts.ownerId, opts.ttlMs);
        tx.set(dataKey, opts.data);
        return { ok: true } as const;
      }),

    inspect: (opts) =>
      step(opts.name, (tx, ownerKey, dataKey): LockSnapshot => {
        const pttl = tx.pttl(ownerKey);
        return {
          owner: tx.get(ownerKey) ?? "",
          ttlMs: pttl > 0 ? pttl : 0,
          data: tx.get(dataKey) ?? "",
        };
      }),

    capabilities,
  };
}

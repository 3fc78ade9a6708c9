// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LockError } from "./errors.js";
import type { Lock, LockBackend, LockInfo } from "./types.js";
import { normalizeAndValidateName, validateTtl } from "./validation.js";

/**
 * Creates the stateful lock handle shared by all backends.
 *
 * The handle keeps only the ttl and data it will (re)apply. Ownership is the
 * client's ID read at call time, so `setId()` on the owning client affects
 * every later operation, including on locks acquired under the old ID.
 *
 * Contention and non-ownership come back from the backend as results and are
 * thrown here as "LockHeldByOtherClient" / "LockNotOwned". Store failures
 * propagate unchanged. Nothing is retried.
 *
 * @param name - Lock name as given by the caller
 * @param owner - Back-reference to the owning client (identity only)
 * @param backend - Store primitives of the owning client
 * @throws {LockError} InvalidArgument for an empty or oversized name
 */
export function createLockHandle(
  name: string,
  owner: { id(): string },
  backend: LockBackend,
): Lock {
  const storeName = normalizeAndValidateName(name);
  let ttlMs = 0;
  let data = "";

  const context = () => ({ name, clientId: owner.id() });

  const refresh = async (): Promise<void> => {
    validateTtl(ttlMs, name);
    const result = await backend.refresh({
      name: storeName,
      ownerId: owner.id(),
      ttlMs,
      data,
    });
    if (!result.ok) {
      throw new LockError(
        "LockNotOwned",
        `Lock "${name}" is not owned by this client`,
        context(),
      );
    }
  };

  return {
    name,

    get ttlMs() {
      return ttlMs;
    },

    get data() {
      return data;
    },

    async acquire(newTtlMs: number): Promise<void> {
      // Rejected before any store round trip
      validateTtl(newTtlMs, name);

      const result = await backend.acquire({
        name: storeName,
        ownerId: owner.id(),
        ttlMs: newTtlMs,
        data,
      });
      if (!result.ok) {
        throw new LockError(
          "LockHeldByOtherClient",
          `Lock "${name}" is held by another client`,
          context(),
        );
      }
      ttlMs = newTtlMs;
    },

    async release(): Promise<void> {
      const result = await backend.release({
        name: storeName,
        ownerId: owner.id(),
      });
      if (!result.ok) {
        throw new LockError(
          "LockNotOwned",
          `Lock "${name}" is not owned by this client`,
          context(),
        );
      }
    },

    refresh,

    async refreshTTL(newTtlMs: number): Promise<void> {
      validateTtl(newTtlMs, name);
      ttlMs = newTtlMs;
      await refresh();
    },

    async info(): Promise<LockInfo> {
      const snapshot = await backend.inspect({ name: storeName });
      const acquired = snapshot.ttlMs > 0;
      return {
        name,
        acquired,
        owner: snapshot.owner,
        ttlMs: acquired ? snapshot.ttlMs : 0,
        data: snapshot.data,
      };
    },

    setData(newData: string): void {
      data = newData;
    },
  };
}

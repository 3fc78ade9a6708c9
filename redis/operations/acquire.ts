// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis } from "ioredis";
import {
  type AcquireResult,
  type LeaseOp,
  LockError,
  logWarning,
} from "../../common/backend.js";
import { makeRedisKeys } from "../config.js";
import { mapRedisError } from "../errors.js";
import { runReleaseScript } from "./release.js";

/**
 * Creates Redis acquire operation.
 *
 * Flow:
 * 1. `SET ownerKey ownerId PX ttl NX`: the only point of mutual exclusion
 * 2. `SET dataKey data`: payload for introspection
 *
 * If step 2 fails the owner key is removed again with the release script
 * (owner-checked, so a lease that already expired and moved on is left alone)
 * and the data write error is thrown. A failed rollback is logged; the lease
 * then simply runs out.
 */
export function createAcquireOperation(
  getConnection: () => Redis,
  namespace: string,
) {
  return async (opts: LeaseOp): Promise<AcquireResult> => {
    try {
      const redis = getConnection();
      const keys = makeRedisKeys(namespace, opts.name);

      const reply = await redis.set(
        keys.ownerKey,
        opts.ownerId,
        "PX",
        opts.ttlMs,
        "NX",
      );

      // NX rejected: owner key exists
      if (reply === null) {
        return { ok: false, reason: "locked" };
      }

      try {
        await redis.set(keys.dataKey, opts.data);
      } catch (error) {
        try {
          await runReleaseScript(redis, keys, opts.ownerId);
        } catch (rollbackError) {
          logWarning("Failed to roll back lock after data write failure", {
            name: opts.name,
            clientId: opts.ownerId,
            error: rollbackError,
          });
        }
        throw error;
      }

      return { ok: true };
    } catch (error) {
      if (error instanceof LockError) {
        throw error;
      }
      throw mapRedisError(error);
    }
  };
}

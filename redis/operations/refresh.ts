// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis } from "ioredis";
import {
  type LeaseOp,
  LockError,
  type RefreshResult,
} from "../../common/backend.js";
import { makeRedisKeys } from "../config.js";
import { hasScriptCommand } from "../connection.js";
import { mapRedisError } from "../errors.js";
import { REFRESH_SCRIPT, SCRIPT_COMMANDS } from "../scripts.js";

/**
 * Creates refresh operation that atomically re-arms the lease (TTL replaced
 * entirely, not additive) and overwrites the payload.
 * @see redis/scripts.ts
 */
export function createRefreshOperation(
  getConnection: () => Redis,
  namespace: string,
) {
  return async (opts: LeaseOp): Promise<RefreshResult> => {
    try {
      const redis = getConnection();
      const { ownerKey, dataKey } = makeRedisKeys(namespace, opts.name);
      const ttlMs = opts.ttlMs.toString();

      const scriptResult = hasScriptCommand(redis, SCRIPT_COMMANDS.refresh)
        ? await redis[SCRIPT_COMMANDS.refresh](
            ownerKey,
            dataKey,
            opts.ownerId,
            ttlMs,
            opts.data,
          )
        : await redis.eval(
            REFRESH_SCRIPT,
            2,
            ownerKey,
            dataKey,
            opts.ownerId,
            ttlMs,
            opts.data,
          );

      // Script returns: 1=renewed, 0=absent or owned by another ID
      return scriptResult === 1 ? { ok: true } : { ok: false };
    } catch (error) {
      if (error instanceof LockError) {
        throw error;
      }
      throw mapRedisError(error);
    }
  };
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis } from "ioredis";
import {
  LockError,
  type OwnerOp,
  type ReleaseResult,
} from "../../common/backend.js";
import { makeRedisKeys } from "../config.js";
import { hasScriptCommand } from "../connection.js";
import { mapRedisError } from "../errors.js";
import { RELEASE_SCRIPT, SCRIPT_COMMANDS } from "../scripts.js";
import type { RedisLockKeys } from "../types.js";

/**
 * Runs the release script, preferring the cached command over EVAL.
 * @returns Raw script reply (1 = deleted, 0 = not owned)
 */
export function runReleaseScript(
  redis: Redis,
  keys: RedisLockKeys,
  ownerId: string,
): Promise<unknown> {
  return hasScriptCommand(redis, SCRIPT_COMMANDS.release)
    ? redis[SCRIPT_COMMANDS.release](keys.ownerKey, keys.dataKey, ownerId)
    : redis.eval(RELEASE_SCRIPT, 2, keys.ownerKey, keys.dataKey, ownerId);
}

/**
 * Creates release operation with atomic ownership verification and deletion.
 * @see redis/scripts.ts
 */
export function createReleaseOperation(
  getConnection: () => Redis,
  namespace: string,
) {
  return async (opts: OwnerOp): Promise<ReleaseResult> => {
    try {
      const redis = getConnection();
      const keys = makeRedisKeys(namespace, opts.name);

      const scriptResult = await runReleaseScript(redis, keys, opts.ownerId);

      // Script returns: 1=deleted, 0=absent or owned by another ID
      return scriptResult === 1 ? { ok: true } : { ok: false };
    } catch (error) {
      if (error instanceof LockError) {
        throw error;
      }
      throw mapRedisError(error);
    }
  };
}

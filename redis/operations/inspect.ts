// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis } from "ioredis";
import {
  LockError,
  type LockSnapshot,
  type NameOp,
} from "../../common/backend.js";
import { makeRedisKeys } from "../config.js";
import { mapRedisError } from "../errors.js";

const EMPTY_SNAPSHOT: LockSnapshot = { owner: "", ttlMs: 0, data: "" };

/**
 * Creates inspect operation: `MULTI / GET owner / PTTL owner / GET data / EXEC`.
 *
 * The three reads run as one transaction so a concurrent release or acquire
 * cannot land between them. PTTL's -2 (absent) and -1 (no expiry) both
 * report a ttl of 0.
 */
export function createInspectOperation(
  getConnection: () => Redis,
  namespace: string,
) {
  return async (opts: NameOp): Promise<LockSnapshot> => {
    try {
      const redis = getConnection();
      const { ownerKey, dataKey } = makeRedisKeys(namespace, opts.name);

      const replies = await redis
        .multi()
        .get(ownerKey)
        .pttl(ownerKey)
        .get(dataKey)
        .exec();

      // Aborted transaction: report as not acquired
      if (!replies) {
        return { ...EMPTY_SNAPSHOT };
      }

      const values = replies.map(([error, value]) => {
        if (error) {
          throw error;
        }
        return value;
      });
      if (values.length !== 3) {
        throw new LockError(
          "StoreError",
          `Malformed transaction reply: expected [owner, pttl, data]`,
        );
      }
      const [owner, pttl, data] = values;

      return {
        owner: typeof owner === "string" ? owner : "",
        ttlMs: typeof pttl === "number" && pttl > 0 ? pttl : 0,
        data: typeof data === "string" ? data : "",
      };
    } catch (error) {
      if (error instanceof LockError) {
        throw error;
      }
      throw mapRedisError(error);
    }
  };
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis } from "ioredis";
import type { LockBackend } from "../common/backend.js";
import {
  createAcquireOperation,
  createInspectOperation,
  createRefreshOperation,
  createReleaseOperation,
} from "./operations/index.js";
import type { RedisCapabilities } from "./types.js";

/**
 * Creates the Redis store primitives for one client.
 *
 * Storage: owner at `{namespace}:{name}` (value = client ID, PX ttl),
 * payload at `{namespace}:{name}:data` (no TTL).
 *
 * @param getConnection - Returns the client's current connection, or throws
 * "ConnectionError" when disconnected; called once per operation so
 * reconnects take effect immediately
 * @param namespace - Key namespace of the owning client
 */
export function createRedisBackend(
  getConnection: () => Redis,
  namespace: string,
): LockBackend<RedisCapabilities> {
  const capabilities: Readonly<RedisCapabilities> = {
    backend: "redis",
    timeAuthority: "server",
  };

  return {
    acquire: createAcquireOperation(getConnection, namespace),
    release: createReleaseOperation(getConnection, namespace),
    refresh: createRefreshOperation(getConnection, namespace),
    inspect: createInspectOperation(getConnection, namespace),
    capabilities,
  };
}

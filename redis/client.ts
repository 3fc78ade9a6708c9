// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis } from "ioredis";
import {
  LockError,
  createLockHandle,
  validateClientId,
} from "../common/backend.js";
import { createRedisBackend } from "./backend.js";
import { createRedisConfig } from "./config.js";
import { registerScripts } from "./connection.js";
import { mapConnectionError } from "./errors.js";
import type {
  RedisClientOptions,
  RedisConfig,
  RedisLockClient,
} from "./types.js";

/**
 * Creates a Redis lock client and connects it.
 *
 * @param options - Network, address, identity, namespace and dial config
 * @returns Connected client (the initial PING succeeded)
 * @throws {LockError} "ConnectionError" if Redis is unreachable or fails
 * the connection check; "InvalidArgument" for invalid options
 *
 * @example
 * ```typescript
 * const client = await createRedisClient({ address: "localhost:6379" });
 * const lock = client.newLock("job-7");
 * await lock.acquire(5_000);
 * ```
 */
export async function createRedisClient(
  options: RedisClientOptions = {},
): Promise<RedisLockClient> {
  const client = buildRedisClient(createRedisConfig(options));
  await client.reconnect();
  return client;
}

/**
 * Builds a disconnected client over a resolved configuration.
 */
function buildRedisClient(config: RedisConfig): RedisLockClient {
  let connection: Redis | null = null;
  let clientId = config.clientId;

  const getConnection = (): Redis => {
    if (!connection) {
      throw new LockError("ConnectionError", "Redis client is not connected", {
        clientId,
      });
    }
    return connection;
  };

  const disconnect = (): void => {
    // disconnect() is synchronous and does not throw
    connection?.disconnect();
    connection = null;
  };

  const backend = createRedisBackend(getConnection, config.namespace);

  const client: RedisLockClient = {
    capabilities: backend.capabilities,
    namespace: config.namespace,

    get connected() {
      return connection !== null;
    },

    id: () => clientId,

    setId(id: string): void {
      validateClientId(id);
      clientId = id;
    },

    clone: () => buildRedisClient({ ...config, clientId }),

    async reconnect(): Promise<void> {
      disconnect();

      let next: Redis;
      try {
        next = await config.connect(
          config.network,
          config.address,
          config.redisOptions,
        );
      } catch (error) {
        throw mapConnectionError(error);
      }

      try {
        registerScripts(next);
        await next.ping();
      } catch (error) {
        next.disconnect();
        throw mapConnectionError(error);
      }

      connection = next;
    },

    async close(): Promise<void> {
      disconnect();
    },

    newLock: (name: string) => createLockHandle(name, client, backend),
  };

  return client;
}

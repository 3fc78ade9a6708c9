// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import {
  LockError,
  createLockHandle,
  logWarning,
  validateClientId,
} from "../common/backend.js";
import { createPostgresBackend } from "./backend.js";
import { createPostgresConfig } from "./config.js";
import { mapPostgresConnectionError } from "./errors.js";
import type {
  PostgresClientOptions,
  PostgresConfig,
  PostgresLockClient,
} from "./types.js";

/**
 * Creates a PostgreSQL lock client and checks the connection with `SELECT 1`.
 * A pool passed as `sql` stays open on `close()`; pools opened through
 * `connect` are ended by the client.
 *
 * IMPORTANT: Call setupSchema() once before acquiring locks.
 *
 * @throws {LockError} "ConnectionError" if the server is unreachable or
 * fails the connection check; "InvalidArgument" for invalid options
 *
 * @example
 * ```typescript
 * const client = await createPostgresClient({
 *   url: "postgresql://localhost:5432/myapp",
 * });
 * const lock = client.newLock("nightly-report");
 * await lock.acquire(60_000);
 * ```
 */
export async function createPostgresClient(
  options: PostgresClientOptions = {},
): Promise<PostgresLockClient> {
  const client = buildPostgresClient(createPostgresConfig(options));
  await client.reconnect();
  return client;
}

function buildPostgresClient(config: PostgresConfig): PostgresLockClient {
  let connection: Sql | null = null;
  let clientId = config.clientId;
  const ownsConnection = config.sql === undefined;

  const getSql = (): Sql => {
    if (!connection) {
      throw new LockError(
        "ConnectionError",
        "PostgreSQL client is not connected",
        { clientId },
      );
    }
    return connection;
  };

  const end = async (sql: Sql): Promise<void> => {
    try {
      await sql.end({ timeout: 0 });
    } catch (error) {
      logWarning("Failed to close PostgreSQL connection", {
        clientId,
        error,
      });
    }
  };

  const disconnect = async (): Promise<void> => {
    const previous = connection;
    connection = null;
    if (previous && ownsConnection) {
      await end(previous);
    }
  };

  const backend = createPostgresBackend(getSql, config);

  const client: PostgresLockClient = {
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

    clone: () => buildPostgresClient({ ...config, clientId }),

    async reconnect(): Promise<void> {
      await disconnect();

      let next: Sql;
      try {
        next =
          config.sql ??
          (await config.connect(config.url, config.postgresOptions));
      } catch (error) {
        throw mapPostgresConnectionError(error);
      }

      try {
        await next`SELECT 1`;
      } catch (error) {
        if (ownsConnection) {
          await end(next);
        }
        throw mapPostgresConnectionError(error);
      }

      connection = next;
    },

    close: disconnect,

    newLock: (name: string) => createLockHandle(name, client, backend),
  };

  return client;
}

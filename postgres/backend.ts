// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import type { LockBackend } from "../common/backend.js";
import {
  createAcquireOperation,
  createInspectOperation,
  createRefreshOperation,
  createReleaseOperation,
} from "./operations/index.js";
import type { PostgresCapabilities, PostgresConfig } from "./types.js";

/**
 * Creates PostgreSQL store primitives for one client.
 *
 * Storage: one row per lock in `{tableName}` keyed by `{namespace}:{name}`
 * with owner, server-clock expiry and payload. Every primitive is a single
 * statement, so each is atomic without an explicit transaction.
 *
 * IMPORTANT: Call setupSchema() once before using the backend.
 *
 * @param getSql - Returns the client's current pool, or throws "ConnectionError"
 * @param config - Namespace and table of the owning client
 */
export function createPostgresBackend(
  getSql: () => Sql,
  config: Pick<PostgresConfig, "namespace" | "tableName">,
): LockBackend<PostgresCapabilities> {
  const capabilities: Readonly<PostgresCapabilities> = {
    backend: "postgres",
    timeAuthority: "server",
  };

  return {
    acquire: createAcquireOperation(getSql, config),
    release: createReleaseOperation(getSql, config),
    refresh: createRefreshOperation(getSql, config),
    inspect: createInspectOperation(getSql, config),
    capabilities,
  };
}

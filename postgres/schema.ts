// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import { LockError } from "../common/backend.js";
import { POSTGRES_DEFAULTS, SQL_IDENTIFIER_PATTERN } from "./config.js";

/**
 * Sets up the lock table for the PostgreSQL backend.
 *
 * Creates (if not exist):
 * - Lock table keyed by `<namespace>:<name>`, holding owner, absolute expiry
 *   (server clock, ms) and payload
 * - Index on `expires_at_ms` for cleanup queries and monitoring
 *
 * Idempotent. Call once during application initialization.
 *
 * @example
 * ```typescript
 * const sql = postgres("postgresql://localhost:5432/myapp");
 * await setupSchema(sql);
 * const client = await createPostgresClient({ sql });
 * ```
 */
export async function setupSchema(
  sql: Sql,
  options: { tableName?: string } = {},
): Promise<void> {
  const tableName = options.tableName ?? POSTGRES_DEFAULTS.tableName;
  if (!SQL_IDENTIFIER_PATTERN.test(tableName)) {
    throw new LockError(
      "InvalidArgument",
      "Invalid table name - must be a valid SQL identifier",
    );
  }

  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS ${tableName} (
      key TEXT PRIMARY KEY,
      owner TEXT NOT NULL,
      expires_at_ms BIGINT NOT NULL,
      data TEXT NOT NULL DEFAULT ''
    )
  `);

  await sql.unsafe(`
    CREATE INDEX IF NOT EXISTS idx_${tableName}_expires
    ON ${tableName}(expires_at_ms)
  `);
}

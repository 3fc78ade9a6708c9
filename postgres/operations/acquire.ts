// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import type { AcquireResult, LeaseOp } from "../../common/backend.js";
import { makePostgresKey } from "../config.js";
import { mapPostgresError } from "../errors.js";
import type { PostgresConfig } from "../types.js";

/**
 * Creates PostgreSQL acquire operation.
 *
 * One statement: insert the row, or take over an existing row only if its
 * lease has expired on the server clock. The conflicting row is locked while
 * the WHERE clause is evaluated, so two clients can never both win. Owner and
 * payload are written together; there is no separate data write.
 */
export function createAcquireOperation(
  getSql: () => Sql,
  config: Pick<PostgresConfig, "namespace" | "tableName">,
) {
  return async (opts: LeaseOp): Promise<AcquireResult> => {
    try {
      const sql = getSql();
      const key = makePostgresKey(config.namespace, opts.name);
      const table = sql(config.tableName);

      const rows = await sql<Array<{ key: string }>>`
        INSERT INTO ${table} (key, owner, expires_at_ms, data)
        VALUES (
          ${key},
          ${opts.ownerId},
          (EXTRACT(EPOCH FROM clock_timestamp()) * 1000)::bigint + ${opts.ttlMs}::bigint,
          ${opts.data}
        )
        ON CONFLICT (key) DO UPDATE SET
          owner = EXCLUDED.owner,
          expires_at_ms = EXCLUDED.expires_at_ms,
          data = EXCLUDED.data
        WHERE ${table}.expires_at_ms <= (EXTRACT(EPOCH FROM clock_timestamp()) * 1000)::bigint
        RETURNING key
      `;

      return rows.length === 1 ? { ok: true } : { ok: false, reason: "locked" };
    } catch (error) {
      throw mapPostgresError(error);
    }
  };
}

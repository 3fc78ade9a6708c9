// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import type { LockSnapshot, NameOp } from "../../common/backend.js";
import { makePostgresKey } from "../config.js";
import { mapPostgresError } from "../errors.js";
import type { InspectRow, PostgresConfig } from "../types.js";

/**
 * Creates PostgreSQL inspect operation. One SELECT reads owner, remaining
 * lease and payload from the same row version.
 *
 * An expired row reports no owner and a ttl of 0 but keeps its payload,
 * matching a Redis data key that outlives its owner key.
 */
export function createInspectOperation(
  getSql: () => Sql,
  config: Pick<PostgresConfig, "namespace" | "tableName">,
) {
  return async (opts: NameOp): Promise<LockSnapshot> => {
    try {
      const sql = getSql();
      const key = makePostgresKey(config.namespace, opts.name);

      const rows = await sql<Array<InspectRow>>`
        SELECT
          owner,
          data,
          expires_at_ms - (EXTRACT(EPOCH FROM clock_timestamp()) * 1000)::bigint AS ttl_ms
        FROM ${sql(config.tableName)}
        WHERE key = ${key}
      `;

      const row = rows[0];
      if (!row) {
        return { owner: "", ttlMs: 0, data: "" };
      }

      const ttlMs = Number(row.ttl_ms);
      if (!(ttlMs > 0)) {
        return { owner: "", ttlMs: 0, data: row.data };
      }

      return { owner: row.owner, ttlMs, data: row.data };
    } catch (error) {
      throw mapPostgresError(error);
    }
  };
}

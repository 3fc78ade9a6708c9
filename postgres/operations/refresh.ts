// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import type { LeaseOp, RefreshResult } from "../../common/backend.js";
import { makePostgresKey } from "../config.js";
import { mapPostgresError } from "../errors.js";
import type { PostgresConfig } from "../types.js";

/**
 * Creates PostgreSQL refresh operation: a single owner-checked UPDATE that
 * replaces the expiry (not additive) and the payload.
 */
export function createRefreshOperation(
  getSql: () => Sql,
  config: Pick<PostgresConfig, "namespace" | "tableName">,
) {
  return async (opts: LeaseOp): Promise<RefreshResult> => {
    try {
      const sql = getSql();
      const key = makePostgresKey(config.namespace, opts.name);

      const rows = await sql<Array<{ key: string }>>`
        UPDATE ${sql(config.tableName)}
        SET
          expires_at_ms = (EXTRACT(EPOCH FROM clock_timestamp()) * 1000)::bigint + ${opts.ttlMs}::bigint,
          data = ${opts.data}
        WHERE key = ${key}
          AND owner = ${opts.ownerId}
          AND expires_at_ms > (EXTRACT(EPOCH FROM clock_timestamp()) * 1000)::bigint
        RETURNING key
      `;

      return rows.length === 1 ? { ok: true } : { ok: false };
    } catch (error) {
      throw mapPostgresError(error);
    }
  };
}

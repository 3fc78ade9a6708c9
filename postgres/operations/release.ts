// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Sql } from "postgres";
import type { OwnerOp, ReleaseResult } from "../../common/backend.js";
import { makePostgresKey } from "../config.js";
import { mapPostgresError } from "../errors.js";
import type { PostgresConfig } from "../types.js";

/**
 * Creates PostgreSQL release operation: a single owner-checked DELETE.
 * An expired row is not owned by anyone and is left for the next acquire.
 */
export function createReleaseOperation(
  getSql: () => Sql,
  config: Pick<PostgresConfig, "namespace" | "tableName">,
) {
  return async (opts: OwnerOp): Promise<ReleaseResult> => {
    try {
      const sql = getSql();
      const key = makePostgresKey(config.namespace, opts.name);

      const rows = await sql<Array<{ key: string }>>`
        DELETE FROM ${sql(config.tableName)}
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

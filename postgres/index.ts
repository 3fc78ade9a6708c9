// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * PostgreSQL backend for leaselock.
 *
 * Uses postgres.js (porsager/postgres) with one table row per lock and the
 * server clock as time authority.
 *
 * @module leaselock/postgres
 */

export { createPostgresBackend } from "./backend.js";
export { createPostgresClient } from "./client.js";
export {
  POSTGRES_DEFAULTS,
  createPostgresConfig,
  makePostgresKey,
} from "./config.js";
export { setupSchema } from "./schema.js";
export type {
  PostgresCapabilities,
  PostgresClientOptions,
  PostgresConfig,
  PostgresConnectFn,
  PostgresLockClient,
} from "./types.js";

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import postgres from "postgres";
import {
  BACKEND_LIMITS,
  LockError,
  RESERVE_BYTES,
  makeStorageKey,
  mergeClientConfig,
} from "../common/backend.js";
import type {
  PostgresClientOptions,
  PostgresConfig,
  PostgresConnectFn,
} from "./types.js";

/**
 * Default configuration for PostgreSQL backend.
 */
export const POSTGRES_DEFAULTS = {
  tableName: "leaselock_locks",
} as const;

export const SQL_IDENTIFIER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/** Default connect function: a lazily connecting postgres.js pool */
const connectPostgres: PostgresConnectFn = (url, postgresOptions) =>
  url === undefined
    ? postgres(postgresOptions)
    : postgres(url, postgresOptions);

/**
 * Creates and validates PostgreSQL backend configuration.
 *
 * @throws {LockError} If configuration is invalid
 */
export function createPostgresConfig(
  options: PostgresClientOptions = {},
): PostgresConfig {
  const tableName = options.tableName || POSTGRES_DEFAULTS.tableName;

  // Basic SQL identifier safety: table names are interpolated in DDL
  if (!SQL_IDENTIFIER_PATTERN.test(tableName)) {
    throw new LockError(
      "InvalidArgument",
      "Invalid table name - must be a valid SQL identifier",
    );
  }

  return {
    ...mergeClientConfig(options),
    url: options.url,
    tableName,
    postgresOptions: options.postgresOptions ?? {},
    connect: options.connect ?? connectPostgres,
    sql: options.sql,
  };
}

/**
 * Primary key of a lock row: `<namespace>:<name>`, hashed when too long.
 */
export function makePostgresKey(namespace: string, name: string): string {
  return makeStorageKey(
    namespace,
    name,
    BACKEND_LIMITS.POSTGRES,
    RESERVE_BYTES.POSTGRES,
  );
}

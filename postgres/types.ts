// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Options, Sql } from "postgres";
import type {
  BackendCapabilities,
  ClientOptions,
  LockClient,
} from "../common/backend.js";

/**
 * PostgreSQL backend capabilities with server-side time authority.
 */
export interface PostgresCapabilities extends BackendCapabilities {
  backend: "postgres";
  timeAuthority: "server"; // Uses PostgreSQL server clock
}

/**
 * Opens a postgres.js instance. The default is `postgres(url, options)`.
 */
export type PostgresConnectFn = (
  url: string | undefined,
  postgresOptions: Options<{}>,
) => Promise<Sql> | Sql;

/**
 * Configuration options for PostgreSQL backend.
 */
export interface PostgresClientOptions extends ClientOptions {
  /** Connection URL; postgres.js falls back to PG* environment variables */
  url?: string;
  /** Low-level postgres.js options (pool size, timeouts, ssl...) */
  postgresOptions?: Options<{}>;
  /**
   * Custom connect function. Must return a pool of its own: the client ends
   * it on `reconnect()` and `close()`.
   */
  connect?: PostgresConnectFn;
  /**
   * Shared postgres.js instance owned by the caller. Used instead of
   * `connect`; the client never ends it.
   */
  sql?: Sql;
  /**
   * Table name for lock storage.
   * @default "leaselock_locks"
   */
  tableName?: string;
}

/**
 * Internal configuration after applying defaults and validation.
 */
export interface PostgresConfig {
  url: string | undefined;
  clientId: string;
  namespace: string;
  tableName: string;
  postgresOptions: Options<{}>;
  connect: PostgresConnectFn;
  sql: Sql | undefined;
}

/**
 * Row returned by the inspect query.
 */
export interface InspectRow {
  owner: string;
  data: string;
  ttl_ms: string; // BIGINT as string
}

/** Client bound to a PostgreSQL store */
export type PostgresLockClient = LockClient<PostgresCapabilities>;

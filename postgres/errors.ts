// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LockError } from "../common/backend.js";

/**
 * PostgreSQL error codes that mean the connection itself is unusable.
 * Based on https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
const PG_CONNECTION_CODES = new Set([
  "08000", // connection_exception
  "08003", // connection_does_not_exist
  "08006", // connection_failure
  "08001", // sqlclient_unable_to_establish_sqlconnection
  "08004", // sqlserver_rejected_establishment_of_sqlconnection
  "28000", // invalid_authorization_specification
  "28P01", // invalid_password
  "57P01", // admin_shutdown
  "57P03", // cannot_connect_now
]);

const NETWORK_MARKERS = [
  "ECONNREFUSED",
  "ENOTFOUND",
  "ETIMEDOUT",
  "ECONNRESET",
];

function pgCodeOf(error: unknown): string | undefined {
  if (error && typeof error === "object" && "code" in error) {
    const { code } = error;
    return typeof code === "string" ? code : undefined;
  }
  return undefined;
}

/**
 * Maps errors raised while connecting or probing to "ConnectionError".
 */
export function mapPostgresConnectionError(error: unknown): LockError {
  if (error instanceof LockError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new LockError(
    "ConnectionError",
    `PostgreSQL connection error: ${message}`,
    { cause: error },
  );
}

/**
 * Maps PostgreSQL errors from lock operations to LockError instances:
 * connection-class SQLSTATEs and socket errors become "ConnectionError",
 * everything else "StoreError".
 *
 * @param error - Error from postgres.js
 */
export function mapPostgresError(error: unknown): LockError {
  if (error instanceof LockError) {
    return error;
  }

  const code = pgCodeOf(error);
  const message = error instanceof Error ? error.message : String(error);

  if (
    (code !== undefined && PG_CONNECTION_CODES.has(code)) ||
    NETWORK_MARKERS.some((marker) => message.includes(marker))
  ) {
    return mapPostgresConnectionError(error);
  }

  return new LockError(
    "StoreError",
    code
      ? `PostgreSQL error ${code}: ${message}`
      : `PostgreSQL error: ${message}`,
    { cause: error },
  );
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LockError } from "../common/backend.js";

const CONNECTION_MARKERS = [
  "ECONNRESET",
  "ENOTFOUND",
  "ECONNREFUSED",
  "EHOSTUNREACH",
  "ETIMEDOUT",
  "Connection is closed",
  "connect ETIMEDOUT",
];

const AUTH_MARKERS = ["NOAUTH", "WRONGPASS", "NOPERM"];

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Maps errors raised while connecting or probing to "ConnectionError".
 *
 * @param error - ioredis or custom connect function error
 */
export function mapConnectionError(error: unknown): LockError {
  if (error instanceof LockError) {
    return error;
  }

  const errorMessage = messageOf(error);

  if (AUTH_MARKERS.some((marker) => errorMessage.includes(marker))) {
    return new LockError(
      "ConnectionError",
      `Redis authentication error: ${errorMessage}`,
      { cause: error },
    );
  }

  return new LockError(
    "ConnectionError",
    `Redis connection error: ${errorMessage}`,
    { cause: error },
  );
}

/**
 * Maps errors raised by lock operations to standardized LockError codes:
 * lost connections become "ConnectionError", everything else "StoreError".
 *
 * @param error - Redis client error or string
 */
export function mapRedisError(error: unknown): LockError {
  if (error instanceof LockError) {
    return error;
  }

  const errorMessage = messageOf(error);

  if (CONNECTION_MARKERS.some((marker) => errorMessage.includes(marker))) {
    return mapConnectionError(error);
  }

  if (errorMessage.includes("timeout")) {
    return new LockError("StoreError", `Redis timeout: ${errorMessage}`, {
      cause: error,
    });
  }

  if (AUTH_MARKERS.some((marker) => errorMessage.includes(marker))) {
    return new LockError(
      "StoreError",
      `Redis authentication error: ${errorMessage}`,
      { cause: error },
    );
  }

  if (
    errorMessage.includes("NOSCRIPT") ||
    errorMessage.includes("ERR Error running script")
  ) {
    return new LockError("StoreError", `Redis script error: ${errorMessage}`, {
      cause: error,
    });
  }

  return new LockError("StoreError", `Redis error: ${errorMessage}`, {
    cause: error,
  });
}

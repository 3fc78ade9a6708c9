// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Time predicates for backends that store an absolute expiry instead of a
 * native key TTL (memory, PostgreSQL). Redis expires keys itself.
 */

/**
 * Liveness check: a lease is live strictly before its expiry instant.
 *
 * @param expiresAtMs - Lease expiry timestamp from storage
 * @param nowMs - Current time from the backend's authority (server/client)
 */
export function isLive(expiresAtMs: number, nowMs: number): boolean {
  return expiresAtMs > nowMs;
}

/**
 * Remaining lease in whole milliseconds, never negative.
 */
export function remainingTtlMs(expiresAtMs: number, nowMs: number): number {
  return isLive(expiresAtMs, nowMs) ? Math.ceil(expiresAtMs - nowMs) : 0;
}

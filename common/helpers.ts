// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Lock, LockClient } from "./types.js";

// ============================================================================
// Ownership
// ============================================================================

/**
 * Checks whether `client` currently owns `lock` (acquired, owner matches the
 * client's current ID). Diagnostic only: the answer can be stale by the time
 * it returns. Correctness relies on release/refresh, never on this check.
 *
 * @throws {LockError} "StoreError" on store failure
 */
export async function owns(
  lock: Lock,
  client: Pick<LockClient, "id">,
): Promise<boolean> {
  const info = await lock.info();
  return info.acquired && info.owner === client.id();
}

// ============================================================================
// Logging
// ============================================================================

/**
 * Logs a library warning to the console.
 * Lock names and client IDs are omitted unless LEASELOCK_DEBUG=true.
 *
 * @internal Used by backend implementations
 */
export function logWarning(
  message: string,
  details: { name?: string; clientId?: string; error?: unknown } = {},
): void {
  const includeIdentifiers = process.env.LEASELOCK_DEBUG === "true";
  const { error } = details;

  console.warn(`[leaselock] ${message}`, {
    error: error instanceof Error ? error.message : error,
    ...(includeIdentifiers
      ? { name: details.name, clientId: details.clientId }
      : {}),
  });
}

// ============================================================================
// Utilities
// ============================================================================

/** Creates a delay promise for refresh loops and tests. */
export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

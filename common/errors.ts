// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Thrown by all lock and client operations.
 * Use `code` to distinguish error kinds and `context` for debugging details.
 */
export class LockError extends Error {
  constructor(
    public code:
      | "InvalidTTL" // ttl not an integer or below 1ms
      | "InvalidArgument" // Invalid name, namespace, client ID or option
      | "LockHeldByOtherClient" // Acquire rejected: another client holds the lock
      | "LockNotOwned" // Release/refresh by a non-owner (often after expiry)
      | "ConnectionError" // Store unreachable, connection check failed or client disconnected
      | "StoreError", // Any other store communication or protocol failure
    message?: string,
    /** Debugging context: lock name, client ID, and underlying error */
    public context?: { name?: string; clientId?: string; cause?: unknown },
  ) {
    super(message ?? code);
    this.name = "LockError";
  }
}

/** Type guard for a specific {@link LockError} code. */
export function isLockError(
  error: unknown,
  code?: LockError["code"],
): error is LockError {
  return (
    error instanceof LockError && (code === undefined || error.code === code)
  );
}

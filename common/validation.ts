// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { MAX_NAME_LENGTH_BYTES, MIN_TTL_MS } from "./constants.js";
import { LockError } from "./errors.js";

/**
 * Validates a client ID: a non-empty string without whitespace.
 * The ID is compared byte-for-byte by the store scripts, so anything else goes.
 *
 * @throws {LockError} InvalidArgument
 */
export function validateClientId(clientId: string): void {
  if (typeof clientId !== "string" || !/^\S+$/.test(clientId)) {
    throw new LockError(
      "InvalidArgument",
      `Invalid client ID. Expected a non-empty string without whitespace, got: ${clientId || "empty"}`,
    );
  }
}

/**
 * Validates a key namespace. Empty is allowed (callers substitute the default).
 *
 * @throws {LockError} InvalidArgument
 */
export function validateNamespace(namespace: string): void {
  if (typeof namespace !== "string" || /\s/.test(namespace)) {
    throw new LockError(
      "InvalidArgument",
      `Invalid namespace "${namespace}": must not contain whitespace`,
    );
  }
}

/**
 * Validates a lease duration in milliseconds.
 *
 * @throws {LockError} InvalidTTL for non-integers and values below 1ms
 */
export function validateTtl(ttlMs: number, name?: string): void {
  if (!Number.isInteger(ttlMs) || ttlMs < MIN_TTL_MS) {
    throw new LockError(
      "InvalidTTL",
      `ttlMs must be an integer of at least ${MIN_TTL_MS}ms, got: ${ttlMs}`,
      { name },
    );
  }
}

/**
 * Normalizes a lock name to Unicode NFC and validates length constraints.
 * Prevents encoding-based collisions (e.g., "café" vs "cafe\u0301").
 *
 * @returns Normalized name safe for key derivation
 * @throws {LockError} InvalidArgument for empty/oversized names (max 512 bytes after NFC normalization)
 */
export function normalizeAndValidateName(name: string): string {
  if (typeof name !== "string") {
    throw new LockError("InvalidArgument", "Name must be a string");
  }

  if (name.length === 0) {
    throw new LockError("InvalidArgument", "Name must not be empty");
  }

  const normalized = name.normalize("NFC");
  const utf8Bytes = new TextEncoder().encode(normalized);

  if (utf8Bytes.length > MAX_NAME_LENGTH_BYTES) {
    throw new LockError(
      "InvalidArgument",
      `Name exceeds maximum length of ${MAX_NAME_LENGTH_BYTES} bytes after normalization`,
      { name },
    );
  }

  return normalized;
}

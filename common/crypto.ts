// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { createHash, randomBytes } from "node:crypto";
import { LockError } from "./errors.js";

// Reusable TextEncoder instance (stateless, safe to share)
const encoder = new TextEncoder();

const SEPARATOR = ":" as const;

/**
 * Converts bytes to base64url encoding.
 * @returns Base64url string (padding removed, +/→-_)
 */
function toBase64Url(bytes: Uint8Array): string {
  return Buffer.from(bytes)
    .toString("base64")
    .replace(/\+/g, "-")
    .replace(/\//g, "_")
    .replace(/=+$/g, "");
}

/**
 * Generates a client ID (22-char base64url from 16 CSPRNG bytes).
 */
export function generateClientId(): string {
  return toBase64Url(randomBytes(16));
}

/**
 * 96-bit hash for names and client IDs (NFC normalized, 24 hex chars).
 *
 * @remarks Non-cryptographic, for redaction in telemetry and logs only.
 */
export function hashKey(value: string): string {
  const normalizedValue = value.normalize("NFC");

  // Triple-hash (3x32-bit = 96 bits)
  let h1 = 0,
    h2 = 0,
    h3 = 0;

  for (let i = 0; i < normalizedValue.length; i++) {
    const char = normalizedValue.charCodeAt(i);
    h1 = ((h1 << 5) - h1 + char) | 0;
    h2 = ((h2 << 7) - h2 + char * 3) | 0;
    h3 = ((h3 << 11) - h3 + char * 7) | 0;
  }

  const p1 = (h1 >>> 0).toString(16).padStart(8, "0");
  const p2 = (h2 >>> 0).toString(16).padStart(8, "0");
  const p3 = (h3 >>> 0).toString(16).padStart(8, "0");

  return p1 + p2 + p3;
}

/**
 * Builds the storage key for a lock name under a namespace.
 *
 * Returns `prefix:name` when it fits `backendLimitBytes - reserveBytes`
 * (UTF-8 bytes). Longer keys become `prefix:` + base64url of the first
 * 128 bits of SHA-256 over the full prefixed key, so distinct namespaces
 * never collide after hashing.
 *
 * @param prefix - Namespace, used verbatim (`a:` and `a` are distinct);
 *   may be empty
 * @param name - Normalized lock name; must not be empty
 * @param backendLimitBytes - Store key limit
 * @param reserveBytes - Room kept for derived-key suffixes (e.g. ":data")
 * @throws {LockError} "InvalidArgument" if the prefix alone leaves no room
 */
export function makeStorageKey(
  prefix: string,
  name: string,
  backendLimitBytes: number,
  reserveBytes: number,
): string {
  if (!name) {
    throw new LockError("InvalidArgument", "Name must not be empty");
  }

  name = name.normalize("NFC");

  const prefixBytes = encoder.encode(prefix).byteLength;
  const separatorBytes = prefix ? 1 : 0;
  if (prefixBytes + separatorBytes + reserveBytes > backendLimitBytes) {
    throw new LockError(
      "InvalidArgument",
      "Namespace exceeds backend key limit after accounting for reserved bytes. Use a shorter namespace.",
    );
  }

  const prefixed = prefix ? `${prefix}${SEPARATOR}${name}` : name;
  const prefixedUtf8 = encoder.encode(prefixed);
  if (prefixedUtf8.byteLength + reserveBytes <= backendLimitBytes) {
    return prefixed;
  }

  const digest = createHash("sha256").update(prefixedUtf8).digest();
  const hashed = toBase64Url(digest.subarray(0, 16));
  const storageKey = prefix ? `${prefix}${SEPARATOR}${hashed}` : hashed;

  if (encoder.encode(storageKey).byteLength + reserveBytes > backendLimitBytes) {
    throw new LockError(
      "InvalidArgument",
      "Key exceeds backend limits even after hashing (namespace too long).",
    );
  }

  return storageKey;
}

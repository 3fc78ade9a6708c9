// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Configuration constants and defaults for the leaselock library.
 */

/**
 * Max lock name length after NFC normalization + UTF-8 encoding, before namespacing.
 */
export const MAX_NAME_LENGTH_BYTES = 512;

/** Smallest lease accepted by acquire/refresh, in milliseconds. */
export const MIN_TTL_MS = 1;

/** Suffix appended to the owner key to form the data key. */
export const DATA_KEY_SUFFIX = ":data";

/**
 * Backend-specific byte limits for storage keys.
 */
export const BACKEND_LIMITS = {
  /** Redis key length limit (practical maximum) */
  REDIS: 1000,
  /**
   * PostgreSQL TEXT primary key limit based on B-tree index tuple size
   * (~2704 bytes theoretical, kept well below for tuple header and UTF-8 headroom).
   */
  POSTGRES: 1700,
} as const;

/**
 * Reserve bytes for derived keys.
 *
 * Redis derives the data key from the owner key (`<owner key>:data`), so the
 * owner key must leave room for the 5-byte suffix. PostgreSQL stores owner
 * and data in one row and derives nothing.
 */
export const RESERVE_BYTES = {
  REDIS: DATA_KEY_SUFFIX.length,
  POSTGRES: 0,
} as const;

/**
 * Client defaults shared by every backend.
 */
export const CLIENT_DEFAULTS = {
  /** Key namespace applied when none (or an empty one) is given */
  namespace: "glock",
} as const;

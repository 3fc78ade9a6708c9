// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { LockError } from "./errors.js";

/**
 * Core type definitions for the leaselock library.
 * Defines the client and lock capabilities, the backend contract, and result types.
 */

// ============================================================================
// Backend Capabilities
// ============================================================================

/**
 * Backend capability declaration for feature detection.
 */
export interface BackendCapabilities {
  /** Backend type discriminant */
  backend: string;
  /** Time authority model: store server clock, or the client process clock */
  timeAuthority: "server" | "client";
}

// ============================================================================
// Operation Parameter Types
// ============================================================================

/** Params for name-based reads */
export type NameOp = Readonly<{ name: string }>;

/** Params for ownership-checked operations */
export type OwnerOp = Readonly<{ name: string; ownerId: string }>;

/** Params for operations that (re)arm a lease */
export type LeaseOp = OwnerOp & Readonly<{ ttlMs: number; data: string }>;

// ============================================================================
// Result Types
// ============================================================================

/**
 * Acquire result: success or contention indicator.
 */
export type AcquireResult = { ok: true } | { ok: false; reason: "locked" };

/**
 * Release result: no distinction between mismatch, expired and absent.
 */
export type ReleaseResult = { ok: true } | { ok: false };

/**
 * Refresh result: no distinction between mismatch, expired and absent.
 */
export type RefreshResult = { ok: true } | { ok: false };

/**
 * Raw stored state of one lock, read as a single consistent point.
 * `owner` is empty and `ttlMs` is 0 when the owner key is absent.
 */
export type LockSnapshot = {
  owner: string;
  ttlMs: number;
  data: string;
};

// ============================================================================
// Lock Information Types
// ============================================================================

/**
 * Snapshot returned by {@link Lock.info}.
 */
export type LockInfo = {
  /** Lock name as given to newLock() */
  name: string;
  /** True while the owner key exists with positive remaining TTL */
  acquired: boolean;
  /** Current owner's client ID, empty when not acquired */
  owner: string;
  /** Remaining lease in milliseconds, 0 when not acquired */
  ttlMs: number;
  /** Stored payload (meaningless once the lease is gone) */
  data: string;
};

// ============================================================================
// Backend Interface
// ============================================================================

/**
 * Store-side lock primitives. Each method is a single atomic store operation.
 * Stateless: the lock handle in common/lock.ts carries ttl and data.
 *
 * Negative outcomes (contention, non-owner) are results, not errors.
 * Store failures throw {@link LockError} ("StoreError" or "ConnectionError").
 */
export interface LockBackend<
  C extends BackendCapabilities = BackendCapabilities,
> {
  /** Set-if-absent of the owner key, then write the payload */
  acquire: (opts: LeaseOp) => Promise<AcquireResult>;

  /** Compare-and-delete of owner and data keys */
  release: (opts: OwnerOp) => Promise<ReleaseResult>;

  /** Compare-and-rearm of the lease, overwriting the payload */
  refresh: (opts: LeaseOp) => Promise<RefreshResult>;

  /** Consistent read of owner, remaining TTL and payload */
  inspect: (opts: NameOp) => Promise<LockSnapshot>;

  /** Capability introspection */
  readonly capabilities: Readonly<C>;
}

// ============================================================================
// Client & Lock Capabilities
// ============================================================================

/**
 * A named, leasable mutual-exclusion handle bound to one client.
 *
 * Holds only the ttl and data it intends to (re)apply; all lock state lives
 * in the store. Reusable across any number of acquire/release cycles.
 */
export interface Lock {
  /** Name given to newLock() */
  readonly name: string;
  /** Lease applied by the next refresh(); 0 until acquire/refreshTTL sets it */
  readonly ttlMs: number;
  /** Payload written on the next successful acquire/refresh */
  readonly data: string;

  /**
   * Acquires the lock for `ttlMs`. Non-blocking.
   * @throws {LockError} "InvalidTTL", "LockHeldByOtherClient", "StoreError"
   */
  acquire(ttlMs: number): Promise<void>;

  /**
   * Releases the lock if owned by this client.
   * @throws {LockError} "LockNotOwned", "StoreError"
   */
  release(): Promise<void>;

  /**
   * Re-arms the lease with the current ttl and writes the current data.
   * @throws {LockError} "InvalidTTL", "LockNotOwned", "StoreError"
   */
  refresh(): Promise<void>;

  /** Sets a new ttl, then behaves as refresh(). */
  refreshTTL(ttlMs: number): Promise<void>;

  /** Reads a consistent snapshot; an absent lock is not an error. */
  info(): Promise<LockInfo>;

  /** Local only; stored on the next successful acquire or refresh. */
  setData(data: string): void;
}

/**
 * A session against one store: identity, namespace, connection lifecycle,
 * and lock factory.
 *
 * Not safe for concurrent use by several callers in one process; use
 * clone() to get an independent session under the same identity.
 */
export interface LockClient<
  C extends BackendCapabilities = BackendCapabilities,
> {
  readonly capabilities: Readonly<C>;
  /** Prefix applied to every key this client creates */
  readonly namespace: string;
  /** Whether a connection is currently held */
  readonly connected: boolean;

  /** Ownership token written into the store */
  id(): string;

  /**
   * Replaces the ownership token. Locks acquired under the previous ID are
   * not reassociated: this client can no longer release or refresh them.
   */
  setId(id: string): void;

  /** Disconnected copy sharing configuration and identity. */
  clone(): LockClient<C>;

  /**
   * Closes any existing connection, opens a new one and checks it.
   * @throws {LockError} "ConnectionError"
   */
  reconnect(): Promise<void>;

  /** Releases the connection if present. Never rejects. */
  close(): Promise<void>;

  /** Creates a lock handle. No store I/O. */
  newLock(name: string): Lock;
}

/**
 * Options shared by every backend's client factory.
 */
export interface ClientOptions {
  /** Ownership token; generated when omitted */
  clientId?: string;
  /** Key namespace (default: "glock"; empty string means default) */
  namespace?: string;
}

// ============================================================================
// Telemetry Types
// ============================================================================

/**
 * Minimal event structure for telemetry. Hashes computed on-demand.
 */
export type LockEvent = {
  type: "acquire" | "release" | "refresh" | "info";
  /** Hashed lock name */
  nameHash: string;
  /** Hashed client ID of the caller */
  clientIdHash: string;
  result: "ok" | "fail";
  /** LockError code on failure */
  reason?: LockError["code"];
  /** Raw lock name (only when includeRaw allows) */
  name?: string;
  /** Raw client ID (only when includeRaw allows) */
  clientId?: string;
};

/**
 * Telemetry configuration for withTelemetry().
 */
export type TelemetryOptions = {
  /** Event callback; errors thrown here never affect lock operations */
  onEvent: (event: LockEvent) => void;
  /** Include raw name/client ID in events (default: false) */
  includeRaw?: boolean | ((event: LockEvent) => boolean);
};

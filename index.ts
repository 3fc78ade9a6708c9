// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * leaselock - Distributed lease locks on a shared key-value store
 *
 * Core exports for custom backend implementations and the client/lock API.
 * Backends live in `leaselock/redis`, `leaselock/postgres`, `leaselock/memory`.
 */

// Core Types

export type {
  AcquireResult,
  BackendCapabilities,
  ClientOptions,
  LeaseOp,
  Lock,
  LockBackend,
  LockClient,
  LockEvent,
  LockInfo,
  LockSnapshot,
  NameOp,
  OwnerOp,
  RefreshResult,
  ReleaseResult,
  TelemetryOptions,
} from "./common/types.js";

// Configuration Constants

export {
  BACKEND_LIMITS,
  CLIENT_DEFAULTS,
  DATA_KEY_SUFFIX,
  MAX_NAME_LENGTH_BYTES,
  MIN_TTL_MS,
  RESERVE_BYTES,
} from "./common/constants.js";

// Core Functions

export { LockError, isLockError } from "./common/errors.js";

export { mergeClientConfig } from "./common/config.js";

export {
  normalizeAndValidateName,
  validateClientId,
  validateNamespace,
  validateTtl,
} from "./common/validation.js";

export { generateClientId, hashKey, makeStorageKey } from "./common/crypto.js";

// Lock handle shared by all backends
export { createLockHandle } from "./common/lock.js";

// Diagnostic helpers
export { delay, owns } from "./common/helpers.js";

// Telemetry - Opt-in observability decorator
export { withTelemetry } from "./common/telemetry.js";

// Time predicates for backends that store absolute expiries
export { isLive, remainingTtlMs } from "./common/time-predicates.js";

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * In-process backend for leaselock: tests, and locks between clients of a
 * single process.
 *
 * @module leaselock/memory
 */

export { createMemoryBackend } from "./backend.js";
export { createMemoryClient } from "./client.js";
export { createMemoryStore } from "./store.js";
export type {
  MemoryStore,
  MemoryStoreOptions,
  MemoryTransaction,
} from "./store.js";
export type {
  MemoryCapabilities,
  MemoryClientOptions,
  MemoryConfig,
  MemoryLockClient,
} from "./types.js";

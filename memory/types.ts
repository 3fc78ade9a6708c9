// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  BackendCapabilities,
  ClientOptions,
  LockClient,
} from "../common/backend.js";
import type { MemoryStore } from "./store.js";

/**
 * In-process backend capabilities
 */
export interface MemoryCapabilities extends BackendCapabilities {
  backend: "memory";
  /** Expiry uses the store's clock (process time by default) */
  timeAuthority: "client";
}

/**
 * Configuration options for the in-process backend
 */
export interface MemoryClientOptions extends ClientOptions {
  /**
   * Store shared by every client that should contend for the same locks.
   * @default a new private store
   */
  store?: MemoryStore;
}

/**
 * Internal configuration after applying defaults.
 */
export interface MemoryConfig {
  clientId: string;
  namespace: string;
  store: MemoryStore;
}

/** Client bound to an in-process store */
export type MemoryLockClient = LockClient<MemoryCapabilities>;

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  LockError,
  createLockHandle,
  mergeClientConfig,
  validateClientId,
} from "../common/backend.js";
import { createMemoryBackend } from "./backend.js";
import { mapMemoryError } from "./errors.js";
import { type MemoryStore, createMemoryStore } from "./store.js";
import type {
  MemoryClientOptions,
  MemoryConfig,
  MemoryLockClient,
} from "./types.js";

/**
 * Creates an in-process lock client attached to `options.store`.
 *
 * Clients that share a store contend for the same locks; give each its own
 * client ID (or let one be generated).
 *
 * @throws {LockError} "ConnectionError" if the store is offline
 *
 * @example
 * ```typescript
 * const store = createMemoryStore();
 * const a = await createMemoryClient({ store, clientId: "a1" });
 * const b = await createMemoryClient({ store, clientId: "b2" });
 * ```
 */
export async function createMemoryClient(
  options: MemoryClientOptions = {},
): Promise<MemoryLockClient> {
  const client = buildMemoryClient({
    ...mergeClientConfig(options),
    store: options.store ?? createMemoryStore(),
  });
  await client.reconnect();
  return client;
}

function buildMemoryClient(config: MemoryConfig): MemoryLockClient {
  let attached: MemoryStore | null = null;
  let clientId = config.clientId;

  const getStore = (): MemoryStore => {
    if (!attached) {
      throw new LockError("ConnectionError", "Memory client is not connected", {
        clientId,
      });
    }
    return attached;
  };

  const backend = createMemoryBackend(getStore, config.namespace);

  const client: MemoryLockClient = {
    capabilities: backend.capabilities,
    namespace: config.namespace,

    get connected() {
      return attached !== null;
    },

    id: () => clientId,

    setId(id: string): void {
      validateClientId(id);
      clientId = id;
    },

    clone: () => buildMemoryClient({ ...config, clientId }),

    async reconnect(): Promise<void> {
      attached = null;
      try {
        config.store.ping();
      } catch (error) {
        throw mapMemoryError(error);
      }
      attached = config.store;
    },

    async close(): Promise<void> {
      attached = null;
    },

    newLock: (name: string) => createLockHandle(name, client, backend),
  };

  return client;
}

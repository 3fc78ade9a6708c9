// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import {
  BACKEND_LIMITS,
  DATA_KEY_SUFFIX,
  LockError,
  RESERVE_BYTES,
  makeStorageKey,
  mergeClientConfig,
} from "../common/backend.js";
import { dialRedis } from "./connection.js";
import type { RedisClientOptions, RedisConfig, RedisLockKeys } from "./types.js";

/**
 * Default configuration for Redis backend.
 */
export const REDIS_DEFAULTS = {
  network: "tcp",
  address: "localhost:6379",
} as const;

/**
 * Merges user options with defaults and validates configuration.
 * @throws {LockError} InvalidArgument for an unknown network, empty address,
 * or malformed namespace/client ID
 */
export function createRedisConfig(
  options: RedisClientOptions = {},
): RedisConfig {
  const network = options.network ?? REDIS_DEFAULTS.network;
  if (network !== "tcp" && network !== "unix") {
    throw new LockError(
      "InvalidArgument",
      `Unsupported network "${String(network)}": expected "tcp" or "unix"`,
    );
  }

  const address = options.address ?? REDIS_DEFAULTS.address;
  if (!address) {
    throw new LockError("InvalidArgument", "Redis address must not be empty");
  }

  return {
    ...mergeClientConfig(options),
    network,
    address,
    redisOptions: options.redisOptions ?? {},
    connect: options.connect ?? dialRedis,
  };
}

/**
 * Derives the owner key (`<namespace>:<name>`) and data key
 * (`<namespace>:<name>:data`) for a normalized lock name.
 */
export function makeRedisKeys(namespace: string, name: string): RedisLockKeys {
  const ownerKey = makeStorageKey(
    namespace,
    name,
    BACKEND_LIMITS.REDIS,
    RESERVE_BYTES.REDIS,
  );
  return { ownerKey, dataKey: `${ownerKey}${DATA_KEY_SUFFIX}` };
}

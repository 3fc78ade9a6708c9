// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Redis backend for leaselock, via the ioredis client.
 *
 * @module leaselock/redis
 */

export { createRedisBackend } from "./backend.js";
export { createRedisClient } from "./client.js";
export { REDIS_DEFAULTS, createRedisConfig, makeRedisKeys } from "./config.js";
export { dialRedis, parseTcpAddress } from "./connection.js";
export { REFRESH_SCRIPT, RELEASE_SCRIPT } from "./scripts.js";
export type {
  RedisCapabilities,
  RedisClientOptions,
  RedisConfig,
  RedisConnectFn,
  RedisLockClient,
  RedisLockKeys,
  RedisNetwork,
} from "./types.js";

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { Redis, RedisOptions } from "ioredis";
import type {
  BackendCapabilities,
  ClientOptions,
  LockClient,
} from "../common/backend.js";

/**
 * Redis-specific backend capabilities
 */
export interface RedisCapabilities extends BackendCapabilities {
  /** Backend type discriminant */
  backend: "redis";
  /** Key expiry is enforced by the Redis server */
  timeAuthority: "server";
}

/** Transport used to reach Redis */
export type RedisNetwork = "tcp" | "unix";

/**
 * Opens a connection. Must resolve to a connected ioredis instance or reject.
 * The default uses `new Redis({ ...redisOptions, host, port | path })`.
 */
export type RedisConnectFn = (
  network: RedisNetwork,
  address: string,
  redisOptions: RedisOptions,
) => Promise<Redis> | Redis;

/**
 * Configuration options specific to Redis backend
 */
export interface RedisClientOptions extends ClientOptions {
  /** Transport (default: "tcp") */
  network?: RedisNetwork;
  /** "host:port" for tcp, socket path for unix (default: "localhost:6379") */
  address?: string;
  /** Low-level ioredis options (auth, db, tls, timeouts...) */
  redisOptions?: RedisOptions;
  /** Custom connect function (default: ioredis dial) */
  connect?: RedisConnectFn;
}

/**
 * Internal configuration with defaults applied
 */
export interface RedisConfig {
  network: RedisNetwork;
  address: string;
  clientId: string;
  namespace: string;
  redisOptions: RedisOptions;
  connect: RedisConnectFn;
}

/** Owner and data keys of one lock */
export interface RedisLockKeys {
  ownerKey: string;
  dataKey: string;
}

/** Client bound to a Redis store */
export type RedisLockClient = LockClient<RedisCapabilities>;

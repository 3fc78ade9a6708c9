// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { Redis, type RedisOptions } from "ioredis";
import { LockError, logWarning } from "../common/backend.js";
import {
  REFRESH_SCRIPT,
  RELEASE_SCRIPT,
  SCRIPT_COMMANDS,
} from "./scripts.js";
import type { RedisNetwork } from "./types.js";

const DEFAULT_PORT = 6379;

/**
 * Parses "host:port", "[ipv6]:port" or "host" (default port 6379).
 * @throws {LockError} InvalidArgument for a non-numeric or out-of-range port
 */
export function parseTcpAddress(address: string): {
  host: string;
  port: number;
} {
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(address);
  let host: string;
  let portText: string | undefined;

  if (bracketed) {
    host = bracketed[1] ?? "";
    portText = bracketed[2];
  } else {
    const separator = address.lastIndexOf(":");
    // A bare IPv6 address has several colons and no port
    if (separator === -1 || address.indexOf(":") !== separator) {
      host = address;
    } else {
      host = address.slice(0, separator);
      portText = address.slice(separator + 1);
    }
  }

  const port = portText === undefined ? DEFAULT_PORT : Number(portText);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new LockError(
      "InvalidArgument",
      `Invalid port in Redis address "${address}"`,
    );
  }

  return { host: host || "localhost", port };
}

/**
 * Default connect function: opens an ioredis connection and waits for it.
 * A connection that fails to open is torn down before the error propagates,
 * so ioredis does not keep reconnecting in the background. Connection errors
 * emitted later are logged instead of surfacing as unhandled "error" events.
 */
export async function dialRedis(
  network: RedisNetwork,
  address: string,
  redisOptions: RedisOptions,
): Promise<Redis> {
  const target =
    network === "unix" ? { path: address } : parseTcpAddress(address);
  const redis = new Redis({ ...redisOptions, ...target, lazyConnect: true });
  redis.on("error", (error: unknown) => {
    logWarning("Redis connection error", { error });
  });

  try {
    await redis.connect();
  } catch (error) {
    redis.disconnect();
    throw error;
  }

  return redis;
}

/**
 * Registers the Lua scripts on a connection for server-side caching
 * (EVALSHA with automatic EVAL fallback). Connections without
 * `defineCommand` fall back to plain EVAL in the operations.
 */
export function registerScripts(redis: Redis): void {
  if (typeof redis.defineCommand !== "function") {
    return;
  }

  redis.defineCommand(SCRIPT_COMMANDS.release, {
    numberOfKeys: 2,
    lua: RELEASE_SCRIPT,
  });

  redis.defineCommand(SCRIPT_COMMANDS.refresh, {
    numberOfKeys: 2,
    lua: REFRESH_SCRIPT,
  });
}

/** Cached script command added by `defineCommand` */
type ScriptCommand = (...args: string[]) => Promise<unknown>;

/**
 * Type guard for a script command registered with `defineCommand`.
 */
export function hasScriptCommand<T extends object, K extends string>(
  redis: T,
  command: K,
): redis is T & Record<K, ScriptCommand> {
  return typeof Reflect.get(redis, command) === "function";
}

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { hashKey } from "./crypto.js";
import { LockError } from "./errors.js";
import type {
  BackendCapabilities,
  Lock,
  LockClient,
  LockEvent,
  TelemetryOptions,
} from "./types.js";

/**
 * Wraps a LockClient with telemetry hooks for observability.
 * Every lock minted by the wrapped client (and its clones) reports events.
 * Unwrapped clients carry no telemetry code path.
 *
 * @param client - Client to instrument
 * @param options - Telemetry configuration with event callback
 * @returns Instrumented client with same capabilities
 */
export function withTelemetry<C extends BackendCapabilities>(
  client: LockClient<C>,
  options: TelemetryOptions,
): LockClient<C> {
  /**
   * Emits telemetry event, swallowing errors to prevent affecting lock operations.
   */
  const emitEvent = (event: LockEvent): void => {
    try {
      options.onEvent(event);
    } catch {
      // Telemetry failures must not impact lock operations
    }
  };

  /**
   * Raw identifiers are redacted unless includeRaw allows them.
   */
  const shouldIncludeRaw = (event: LockEvent): boolean => {
    if (typeof options.includeRaw === "function") {
      try {
        return options.includeRaw(event);
      } catch {
        return false; // Fail-safe: redact on predicate errors
      }
    }
    return options.includeRaw ?? false;
  };

  const instrument = async <T>(
    type: LockEvent["type"],
    name: string,
    operation: () => Promise<T>,
  ): Promise<T> => {
    const clientId = client.id();
    const report = (
      result: LockEvent["result"],
      reason?: LockError["code"],
    ): void => {
      const event: LockEvent = {
        type,
        nameHash: hashKey(name),
        clientIdHash: hashKey(clientId),
        result,
      };
      if (reason) {
        event.reason = reason;
      }
      if (shouldIncludeRaw(event)) {
        event.name = name;
        event.clientId = clientId;
      }
      emitEvent(event);
    };

    try {
      const value = await operation();
      report("ok");
      return value;
    } catch (error) {
      report("fail", error instanceof LockError ? error.code : undefined);
      throw error;
    }
  };

  const wrapLock = (lock: Lock): Lock => ({
    get name() {
      return lock.name;
    },
    get ttlMs() {
      return lock.ttlMs;
    },
    get data() {
      return lock.data;
    },
    acquire: (ttlMs) =>
      instrument("acquire", lock.name, () => lock.acquire(ttlMs)),
    release: () => instrument("release", lock.name, () => lock.release()),
    refresh: () => instrument("refresh", lock.name, () => lock.refresh()),
    refreshTTL: (ttlMs) =>
      instrument("refresh", lock.name, () => lock.refreshTTL(ttlMs)),
    info: () => instrument("info", lock.name, () => lock.info()),
    setData: (data) => lock.setData(data),
  });

  return {
    get capabilities() {
      return client.capabilities;
    },
    get namespace() {
      return client.namespace;
    },
    get connected() {
      return client.connected;
    },
    id: () => client.id(),
    setId: (id) => client.setId(id),
    clone: () => withTelemetry(client.clone(), options),
    reconnect: () => client.reconnect(),
    close: () => client.close(),
    newLock: (name) => wrapLock(client.newLock(name)),
  };
}

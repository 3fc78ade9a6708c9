// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Atomic lock release with ownership verification.
 * Flow: compare owner → delete owner and data keys
 *
 * @returns 1 on success, 0 when the owner key is absent or held by another ID
 *
 * KEYS: [ownerKey, dataKey]
 * ARGV: [ownerId]
 */
export const RELEASE_SCRIPT = `
local ownerKey = KEYS[1]
local dataKey = KEYS[2]
local ownerId = ARGV[1]

if redis.call('GET', ownerKey) == ownerId then
  redis.call('DEL', ownerKey)
  redis.call('DEL', dataKey)
  return 1
end
return 0
`;

/**
 * Atomic lease renewal with ownership verification.
 * Flow: compare owner → re-set owner key with new TTL (replaces, not additive)
 * → overwrite payload. The owner key is never observably absent in between.
 *
 * @returns 1 on success, 0 when the owner key is absent or held by another ID
 *
 * KEYS: [ownerKey, dataKey]
 * ARGV: [ownerId, ttlMs, data]
 */
export const REFRESH_SCRIPT = `
local ownerKey = KEYS[1]
local dataKey = KEYS[2]
local ownerId = ARGV[1]
local ttlMs = ARGV[2]
local data = ARGV[3]

if redis.call('GET', ownerKey) == ownerId then
  redis.call('SET', ownerKey, ownerId, 'PX', ttlMs)
  redis.call('SET', dataKey, data)
  return 1
end
return 0
`;

/** Names under which the scripts are registered with `defineCommand`. */
export const SCRIPT_COMMANDS = {
  release: "releaseLock",
  refresh: "refreshLock",
} as const;

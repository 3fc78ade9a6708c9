// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Core module exports for LockBackend implementations.
 * Import from `leaselock/common` to build custom backends.
 */

export * from "./config.js";
export * from "./constants.js";
export * from "./crypto.js";
export * from "./errors.js";
export * from "./helpers.js";
export * from "./lock.js";
export * from "./telemetry.js";
export * from "./time-predicates.js";
export * from "./types.js";
export * from "./validation.js";

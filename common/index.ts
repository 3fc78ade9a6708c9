// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * Common module re-exports for leaselock backends.
 * Everything lives in backend.ts; this index is the `leaselock/common` entry.
 */

export * from "./backend.js";

// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LockError } from "../common/backend.js";
import { STORE_OFFLINE_MESSAGE } from "./store.js";

/**
 * Maps in-process store errors to LockError: an offline store is a
 * "ConnectionError", anything else a "StoreError".
 */
export function mapMemoryError(error: unknown): LockError {
  if (error instanceof LockError) {
    return error;
  }

  const errorMessage = error instanceof Error ? error.message : String(error);

  if (errorMessage === STORE_OFFLINE_MESSAGE) {
    return new LockError("ConnectionError", errorMessage, { cause: error });
  }

  return new LockError("StoreError", `Memory store error: ${errorMessage}`, {
    cause: error,
  });
}

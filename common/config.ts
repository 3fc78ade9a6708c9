// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { CLIENT_DEFAULTS } from "./constants.js";
import { generateClientId } from "./crypto.js";
import type { ClientOptions } from "./types.js";
import { validateClientId, validateNamespace } from "./validation.js";

/**
 * Applies client defaults: empty/missing namespace becomes "glock",
 * missing client ID is generated.
 * @see ./constants.ts for default values
 * @throws {LockError} InvalidArgument for malformed namespace or client ID
 */
export function mergeClientConfig(
  options: ClientOptions = {},
): Required<ClientOptions> {
  const namespace = options.namespace || CLIENT_DEFAULTS.namespace;
  validateNamespace(namespace);

  const clientId = options.clientId ?? generateClientId();
  validateClientId(clientId);

  return { namespace, clientId };
}

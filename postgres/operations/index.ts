// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

export { createAcquireOperation } from "./acquire.js";
export { createInspectOperation } from "./inspect.js";
export { createRefreshOperation } from "./refresh.js";
export { createReleaseOperation } from "./release.js";

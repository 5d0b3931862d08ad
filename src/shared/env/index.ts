// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for validated environment configuration.
 * Scope: Re-exports server env access. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: none
 * Links: server.ts
 * @public
 */

export type { ServerEnv } from "./server";
export { parseServerEnv, serverEnv } from "./server";

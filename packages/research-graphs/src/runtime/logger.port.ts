// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/research-graphs/runtime/logger.port`
 * Purpose: Minimal structured logger accepted by the engine and runner.
 * Scope: Interface + no-op default. Packages never import the app logger.
 * Invariants:
 *   - Pino-compatible call shape: (obj, msg)
 * Side-effects: none
 * @public
 */

type LogFn = (obj: Record<string, unknown>, msg?: string) => void;

export interface LoggerPort {
  readonly debug: LogFn;
  readonly info: LogFn;
  readonly warn: LogFn;
  readonly error: LogFn;
}

const noop: LogFn = () => undefined;

export const NOOP_LOGGER: LoggerPort = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

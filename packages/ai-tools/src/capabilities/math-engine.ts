// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/capabilities/math-engine`
 * Purpose: Computational knowledge engine (Wolfram Alpha) capability.
 * Scope: Interface only. Expects input already in the engine's structured syntax.
 * Invariants:
 *   - POD_ORDER: pods and their plaintexts keep provider order
 *   - `success: false` is returned, not thrown; the tool decides the Failure kind
 * Side-effects: none (interface only)
 * Links: tools/wolfram-query.ts
 * @public
 */

export interface MathPod {
  readonly title: string;
  /** Non-empty plaintext renderings of the pod's subpods */
  readonly plaintexts: readonly string[];
}

export interface MathEngineResult {
  readonly success: boolean;
  readonly error?: string;
  readonly pods: readonly MathPod[];
  readonly didYouMean?: string;
}

export interface MathEngineCapability {
  query(params: {
    readonly input: string;
    readonly signal: AbortSignal;
  }): Promise<MathEngineResult>;
}

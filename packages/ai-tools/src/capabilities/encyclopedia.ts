// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/capabilities/encyclopedia`
 * Purpose: Encyclopedia (Wikipedia) capability for summary and section lookups.
 * Scope: Interface only.
 * Invariants:
 *   - A missing page is a value (null / page_missing), not an error
 *   - Section titles are compared case-insensitively by the adapter
 * Side-effects: none (interface only)
 * Links: tools/wikipedia-search.ts, tools/wikipedia-get-section.ts
 * @public
 */

export interface EncyclopediaPage {
  readonly title: string;
  /** Plain-text lead summary */
  readonly summary: string;
  readonly url: string;
  /** Top-level section titles in page order */
  readonly sections: readonly string[];
  /** Linked article titles in page order */
  readonly links: readonly string[];
}

export type SectionLookup =
  | {
      readonly status: "found";
      readonly pageTitle: string;
      readonly sectionTitle: string;
      readonly content: string;
    }
  | { readonly status: "page_missing"; readonly pageTitle: string }
  | {
      readonly status: "section_missing";
      readonly pageTitle: string;
      readonly availableSections: readonly string[];
    };

export interface EncyclopediaCapability {
  lookup(params: {
    readonly title: string;
    readonly signal: AbortSignal;
  }): Promise<EncyclopediaPage | null>;

  readSection(params: {
    readonly pageTitle: string;
    readonly sectionTitle: string;
    readonly signal: AbortSignal;
  }): Promise<SectionLookup>;
}

// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tests/wikipedia`
 * Purpose: Tests for wikipedia_search and wikipedia_get_section.
 * Scope: Found / not-found shapes, limits, section errors. Uses an in-memory encyclopedia.
 * Side-effects: none
 * Links: src/tools/wikipedia-search.ts, src/tools/wikipedia-get-section.ts
 * @internal
 */

import { TRUNCATION_MARKER } from "@fathom/ai-core";
import { describe, expect, it } from "vitest";

import type {
  EncyclopediaCapability,
  EncyclopediaPage,
} from "../src/capabilities/encyclopedia";
import { createWikipediaGetSectionTool } from "../src/tools/wikipedia-get-section";
import {
  createWikipediaSearchTool,
  firstSentences,
} from "../src/tools/wikipedia-search";
import { makeCtx } from "./helpers";

const tidesPage: EncyclopediaPage = {
  title: "Tide",
  summary:
    "Tides are the rise and fall of sea levels. They are caused by gravity! Do they vary? Yes.",
  url: "https://en.wikipedia.org/wiki/Tide",
  sections: ["History", "Characteristics", "Physics", "Timing", "Analysis", "Power"],
  links: Array.from({ length: 12 }, (_, i) => `Topic ${i + 1}`),
};

const encyclopedia: EncyclopediaCapability = {
  lookup: async ({ title }) => (title === "Tide" ? tidesPage : null),
  readSection: async ({ pageTitle, sectionTitle }) => {
    if (pageTitle !== "Tide") return { status: "page_missing", pageTitle };
    if (sectionTitle !== "Physics") {
      return {
        status: "section_missing",
        pageTitle,
        availableSections: tidesPage.sections,
      };
    }
    return {
      status: "found",
      pageTitle,
      sectionTitle,
      content: "x".repeat(150),
    };
  },
};

describe("wikipedia_search", () => {
  const tool = createWikipediaSearchTool({ encyclopedia });

  it("returns the summary limited to N sentences and capped lists", async () => {
    const output = await tool.implementation.execute(
      { query: "Tide", sentences: 2 },
      makeCtx()
    );

    expect(output).toEqual({
      found: true,
      title: "Tide",
      summary:
        "Tides are the rise and fall of sea levels. They are caused by gravity!",
      url: "https://en.wikipedia.org/wiki/Tide",
      sections: ["History", "Characteristics", "Physics", "Timing", "Analysis"],
      relatedTopics: tidesPage.links.slice(0, 10),
    });
  });

  it("returns found:false with a suggestion for a missing page", async () => {
    const output = await tool.implementation.execute(
      { query: "Nonexistent page", sentences: 10 },
      makeCtx()
    );

    expect(output).toEqual({
      found: false,
      query: "Nonexistent page",
      suggestion:
        "Page not found. Try rephrasing your search query or search for related terms.",
    });
  });
});

describe("firstSentences", () => {
  it("returns the whole text when it has fewer sentences than asked", () => {
    expect(firstSentences("One. Two.", 5)).toBe("One. Two.");
  });
});

describe("wikipedia_get_section", () => {
  const tool = createWikipediaGetSectionTool({ encyclopedia });

  it("returns section content truncated to maxChars", async () => {
    const output = await tool.implementation.execute(
      { pageTitle: "Tide", sectionTitle: "Physics", maxChars: 100 },
      makeCtx()
    );

    expect(output).toEqual({
      found: true,
      pageTitle: "Tide",
      sectionTitle: "Physics",
      content: "x".repeat(100) + TRUNCATION_MARKER,
    });
  });

  it("reports a missing page without available sections", async () => {
    const output = await tool.implementation.execute(
      { pageTitle: "Atlantis", sectionTitle: "History", maxChars: 3000 },
      makeCtx()
    );

    expect(output).toEqual({
      found: false,
      pageTitle: "Atlantis",
      error: "Page 'Atlantis' not found",
    });
  });

  it("lists available sections when the section is missing", async () => {
    const output = await tool.implementation.execute(
      { pageTitle: "Tide", sectionTitle: "Folklore", maxChars: 3000 },
      makeCtx()
    );

    expect(output).toEqual({
      found: false,
      pageTitle: "Tide",
      error: "Section 'Folklore' not found in page 'Tide'",
      availableSections: tidesPage.sections,
    });
  });
});

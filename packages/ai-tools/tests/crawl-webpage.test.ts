// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@fathom/ai-tools/tests/crawl-webpage`
 * Purpose: Tests for crawl_webpage text extraction and failure mapping.
 * Scope: HTML fixtures through html-to-text. Uses an in-memory page fetcher.
 * Invariants:
 *   - BOILERPLATE_STRIPPED
 *   - TRUNCATION_MARKED
 *   - SELF_BOUNDED
 *   - FAILURE_CARRIES_URL
 * Side-effects: none
 * Links: src/tools/crawl-webpage.ts
 * @internal
 */

import {
  createStaticToolSource,
  createToolRunner,
  ToolFailure,
  TRUNCATION_MARKER,
} from "@fathom/ai-core";
import { describe, expect, it } from "vitest";

import type {
  FetchedPage,
  PageFetchCapability,
} from "../src/capabilities/page-fetch";
import { createResearchToolCatalog } from "../src/catalog";
import { createCrawlWebpageTool, extractTitle } from "../src/tools/crawl-webpage";
import { makeCtx } from "./helpers";

const PAGE_URL = "https://example.com/article";

function crawlerFor(page: Partial<FetchedPage>) {
  return createCrawlWebpageTool({
    pageFetch: {
      fetchPage: async ({ url }) => ({
        url,
        status: 200,
        contentType: "text/html",
        html: "",
        ...page,
      }),
    },
  });
}

describe("crawl_webpage", () => {
  it("extracts main content and strips boilerplate", async () => {
    const html =
      "<html><head><title>Test &amp; Page</title><style>.x{color:red}</style></head>" +
      "<body><header>Site header</header><nav>Menu</nav>" +
      "<main><h1>Heading</h1><p>Hello   world.</p><script>track()</script></main>" +
      "<footer>Foot</footer></body></html>";

    const output = await crawlerFor({ html }).implementation.execute(
      { url: PAGE_URL, maxChars: 8000 },
      makeCtx()
    );

    expect(output).toEqual({
      url: PAGE_URL,
      title: "Test & Page",
      content: "Heading Hello world.",
      truncated: false,
      charCount: 20,
    });
  });

  it("falls back to body when there is no main or article", async () => {
    const html =
      "<html><body><header>H</header><p>Only body text</p><footer>F</footer></body></html>";

    const output = await crawlerFor({ html }).implementation.execute(
      { url: PAGE_URL, maxChars: 8000 },
      makeCtx()
    );

    expect(output.content).toBe("Only body text");
    expect(output.title).toBe("No title");
  });

  it("truncates long content with the marker and reports the returned length", async () => {
    const html = `<html><body><p>${"a".repeat(150)}</p></body></html>`;

    const output = await crawlerFor({ html }).implementation.execute(
      { url: PAGE_URL, maxChars: 100 },
      makeCtx()
    );

    expect(output.content).toBe("a".repeat(100) + TRUNCATION_MARKER);
    expect(output.truncated).toBe(true);
    expect(output.charCount).toBe(100 + TRUNCATION_MARKER.length);
  });

  it("rejects non-text content as parse_error carrying the url", async () => {
    const crawl = crawlerFor({ contentType: "application/pdf", html: "%PDF" });

    await expect(
      crawl.implementation.execute({ url: PAGE_URL, maxChars: 8000 }, makeCtx())
    ).rejects.toMatchObject({
      errorCode: "parse_error",
      details: { url: PAGE_URL },
    });
  });

  it("propagates capability failures unchanged", async () => {
    const failure = new Error("boom");
    const crawl = createCrawlWebpageTool({
      pageFetch: {
        fetchPage: async () => {
          throw failure;
        },
      },
    });

    await expect(
      crawl.implementation.execute({ url: PAGE_URL, maxChars: 8000 }, makeCtx())
    ).rejects.toBe(failure);
  });
});

describe("crawl_webpage through the tool runner", () => {
  function runnerFor(
    pageFetch: PageFetchCapability,
    timeouts?: Readonly<Record<string, number>>
  ) {
    const catalog = createResearchToolCatalog({
      pageFetch,
      ...(timeouts && { timeouts }),
    });
    return createToolRunner(
      createStaticToolSource(Object.values(catalog)),
      () => undefined
    );
  }

  it("returns maxChars of content even above the runner's result bound", async () => {
    const runner = runnerFor({
      fetchPage: async ({ url }) => ({
        url,
        status: 200,
        contentType: "text/html",
        html: `<html><body><p>${"b".repeat(20_000)}</p></body></html>`,
      }),
    });

    const result = await runner.exec("crawl_webpage", {
      url: PAGE_URL,
      maxChars: 10_000,
    });

    expect(result).toEqual({
      ok: true,
      value: {
        url: PAGE_URL,
        title: "No title",
        content: "b".repeat(10_000) + TRUNCATION_MARKER,
        truncated: true,
        charCount: 10_000 + TRUNCATION_MARKER.length,
      },
    });
  });

  it("attaches the url to a timeout failure", async () => {
    const runner = runnerFor(
      {
        fetchPage: ({ signal }) =>
          new Promise<FetchedPage>((_, reject) => {
            signal.addEventListener("abort", () => reject(signal.reason), {
              once: true,
            });
          }),
      },
      { crawl_webpage: 20 }
    );

    const result = await runner.exec("crawl_webpage", { url: PAGE_URL });

    expect(result).toEqual({
      ok: false,
      errorCode: "timeout",
      safeMessage: "Tool 'crawl_webpage' timed out after 20ms",
      details: { url: PAGE_URL },
    });
  });

  it("keeps the capability's own details alongside the url", async () => {
    const runner = runnerFor({
      fetchPage: async () => {
        throw new ToolFailure("network_error", "HTTP 503", { status: 503 });
      },
    });

    const result = await runner.exec("crawl_webpage", { url: PAGE_URL });

    expect(result).toEqual({
      ok: false,
      errorCode: "network_error",
      safeMessage: "HTTP 503",
      details: { url: PAGE_URL, status: 503 },
    });
  });
});

describe("extractTitle", () => {
  it("collapses whitespace inside the title element", () => {
    expect(extractTitle("<title>\n  Spaced   Title \n</title>")).toBe(
      "Spaced Title"
    );
  });
});

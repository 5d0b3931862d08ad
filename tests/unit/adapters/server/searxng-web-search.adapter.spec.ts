// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/searxng-web-search.adapter`
 * Purpose: Unit tests for the SearXNG adapter with mocked HTTP calls.
 * Scope: Request shape, result mapping, failure mapping and logging. Does NOT reach a SearXNG instance.
 * Invariants: No real HTTP calls; failures are ToolFailure with the query attached.
 * Side-effects: global (stubbed fetch)
 * Links: src/adapters/server/search/searxng-web-search.adapter.ts
 * @public
 */

import { ToolFailure } from "@fathom/ai-core";
import { describe, expect, it } from "vitest";

import { SearxngWebSearchAdapter } from "@/adapters/server";
import {
  fetchCall,
  fetchParams,
  jsonResponse,
  stubFetch,
  textResponse,
} from "@tests/_fakes/http";
import { captureLogs } from "@tests/_fakes/logging";

function signal(): AbortSignal {
  return new AbortController().signal;
}

describe("SearxngWebSearchAdapter", () => {
  it("queries the JSON API and maps hits in provider order", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(
      jsonResponse({
        query: "ocean tides",
        results: [
          { url: "https://a.example/1", title: " Tides ", content: "Moon pull" },
          { title: "no url here" },
          { url: "https://a.example/2", title: "", content: null },
          { url: "https://a.example/3", title: "Third", content: "cut" },
        ],
      })
    );
    const adapter = new SearxngWebSearchAdapter({
      baseUrl: "http://localhost:8080/",
      userAgent: "test-agent",
    });

    const result = await adapter.search({
      query: "ocean tides",
      maxResults: 2,
      signal: signal(),
    });

    expect(result).toEqual({
      results: [
        { url: "https://a.example/1", title: "Tides", snippet: "Moon pull" },
        { url: "https://a.example/2", title: "No title", snippet: "No description" },
      ],
    });
    const { url, init } = fetchCall(fetchMock);
    expect(url).toBe("http://localhost:8080/search?q=ocean+tides&format=json");
    expect(init?.headers).toEqual({
      Accept: "application/json",
      "User-Agent": "test-agent",
    });
  });

  it("keeps a base path when the instance is mounted below the root", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: [] }));
    const adapter = new SearxngWebSearchAdapter({
      baseUrl: "https://search.example/searx",
    });

    const result = await adapter.search({ query: "x", maxResults: 5, signal: signal() });

    expect(result).toEqual({ results: [] });
    expect(fetchCall(fetchMock).url.startsWith("https://search.example/searx/search?")).toBe(
      true
    );
    expect(fetchParams(fetchMock)).toEqual({ q: "x", format: "json" });
  });

  it("maps a non-2xx status to network_error and logs it once", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(textResponse("busy", 503));
    const { logger, lines } = captureLogs();
    const adapter = new SearxngWebSearchAdapter({
      baseUrl: "http://localhost:8080",
      logger,
    });

    const failure = await adapter
      .search({ query: "tides", maxResults: 5, signal: signal() })
      .catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(ToolFailure);
    expect(failure).toMatchObject({
      errorCode: "network_error",
      message: "searxng responded with HTTP 503",
      details: { query: "tides", status: 503 },
    });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({
      event: "adapter.searxng.error",
      dep: "searxng",
      reasonCode: "http_error",
      status: 503,
    });
  });

  it("maps a body that is not JSON to parse_error", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(textResponse("<html>rate limited</html>"));
    const adapter = new SearxngWebSearchAdapter({ baseUrl: "http://localhost:8080" });

    await expect(
      adapter.search({ query: "tides", maxResults: 5, signal: signal() })
    ).rejects.toMatchObject({ errorCode: "parse_error", details: { query: "tides" } });
  });

  it("maps a payload of the wrong shape to parse_error", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockResolvedValueOnce(jsonResponse({ results: "none" }));
    const adapter = new SearxngWebSearchAdapter({ baseUrl: "http://localhost:8080" });

    await expect(
      adapter.search({ query: "tides", maxResults: 5, signal: signal() })
    ).rejects.toMatchObject({
      errorCode: "parse_error",
      message: "searxng returned an unexpected payload at results",
    });
  });

  it("maps a transport failure to network_error", async () => {
    const fetchMock = stubFetch();
    fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
    const adapter = new SearxngWebSearchAdapter({ baseUrl: "http://localhost:8080" });

    await expect(
      adapter.search({ query: "tides", maxResults: 5, signal: signal() })
    ).rejects.toMatchObject({
      errorCode: "network_error",
      message: "Request to searxng failed: fetch failed",
    });
  });

  it("rethrows the abort untouched when the signal fired", async () => {
    const fetchMock = stubFetch();
    const abort = new Error("This operation was aborted");
    abort.name = "AbortError";
    fetchMock.mockRejectedValueOnce(abort);
    const controller = new AbortController();
    controller.abort();
    const { logger, lines } = captureLogs();
    const adapter = new SearxngWebSearchAdapter({
      baseUrl: "http://localhost:8080",
      logger,
    });

    await expect(
      adapter.search({ query: "tides", maxResults: 5, signal: controller.signal })
    ).rejects.toBe(abort);
    expect(lines[0]).toMatchObject({ reasonCode: "aborted" });
  });
});

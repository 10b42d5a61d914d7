// ---------------------------------------------------------------------------
// End-to-end tests through buildApp: config -> client -> cache -> routes.
//
// Mocks global fetch to stand in for TMDB.
// ---------------------------------------------------------------------------

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { Mock } from "vitest";

import { buildApp } from "../../src/app.js";
import { AVENGERS, createTestLogger, durationOf } from "../helpers/fake-source.js";

const TEST_ENV = {
  TMDB_BASE_URL: "https://tmdb.test/3",
  TMDB_API_KEY: "test-token",
};

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("buildApp", () => {
  const originalFetch = globalThis.fetch;
  let mockFetch: Mock<typeof fetch>;

  beforeEach(() => {
    mockFetch = vi.fn<typeof fetch>();
    globalThis.fetch = mockFetch;
  });

  afterEach(() => {
    globalThis.fetch = originalFetch;
    vi.restoreAllMocks();
  });

  it("serves a movie from TMDB once and from the cache afterwards", async () => {
    mockFetch.mockImplementation(async () => {
      await new Promise<void>((resolve) => setTimeout(resolve, 40));
      return jsonResponse(AVENGERS);
    });
    const { app } = buildApp({ env: TEST_ENV, logger: createTestLogger() });

    const first = await app.request("/movies/24428");
    const second = await app.request("/movies/24428");
    const firstBody: unknown = await first.json();
    const secondBody: unknown = await second.json();

    expect(first.status).toBe(200);
    expect(firstBody).toMatchObject({ movie_id: 24428, title: "The Avengers", rating: 7.7 });
    expect(secondBody).toMatchObject({ movie_id: 24428, title: "The Avengers", rating: 7.7 });
    expect(durationOf(secondBody)).toBeLessThan(durationOf(firstBody));
    expect(mockFetch).toHaveBeenCalledTimes(1);
  });

  it("maps a TMDB 404 to a 404 response", async () => {
    mockFetch.mockResolvedValueOnce(
      jsonResponse({ status_code: 34, status_message: "Not found" }, 404),
    );
    const { app } = buildApp({ env: TEST_ENV, logger: createTestLogger() });

    const res = await app.request("/movies/123456");

    expect(res.status).toBe(404);
  });

  it("retries a failed lookup when failure caching is disabled", async () => {
    mockFetch
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(jsonResponse(AVENGERS));
    const { app } = buildApp({
      env: { ...TEST_ENV, CACHE_FAILURES: "false" },
      logger: createTestLogger(),
    });

    const failed = await app.request("/movies/24428");
    const recovered = await app.request("/movies/24428");

    expect(failed.status).toBe(500);
    expect(await failed.json()).toEqual({
      error: "External API Error: fetch failed",
      type: "network_error",
    });
    expect(recovered.status).toBe(200);
    expect(mockFetch).toHaveBeenCalledTimes(2);
  });

  it("disables movie routes but keeps serving when the API key is missing", async () => {
    const { app, catalog } = buildApp({
      env: { TMDB_BASE_URL: "https://tmdb.test/3" },
      logger: createTestLogger(),
    });

    expect(catalog).toBeNull();
    expect((await app.request("/movies/24428")).status).toBe(503);
    expect((await app.request("/search?query=avengers")).status).toBe(503);
    expect((await app.request("/health")).status).toBe(200);
    expect(mockFetch).not.toHaveBeenCalled();
  });

  it("uses the configured cache capacities", () => {
    const { catalog } = buildApp({
      env: { ...TEST_ENV, CACHE_DETAILS_MAX_ENTRIES: "4", CACHE_SEARCH_MAX_ENTRIES: "2" },
      logger: createTestLogger(),
    });

    expect(catalog?.cacheStats().map((s) => s.capacity)).toEqual([4, 2]);
  });
});

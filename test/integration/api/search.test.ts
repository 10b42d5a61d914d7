// ---------------------------------------------------------------------------
// Integration tests for the /search routes.
// ---------------------------------------------------------------------------

import { describe, it, expect } from "vitest";

import { createApp } from "../../../src/api/server.js";
import { MovieCatalog } from "../../../src/movies/movie-catalog.js";
import { SEARCH_MAPPING_ERROR } from "../../../src/movies/movie-mapper.js";
import type { CacheConfig } from "../../../src/core/types.js";
import {
  AVENGERS,
  createFakeSource,
  createTestLogger,
  durationOf,
} from "../../helpers/fake-source.js";
import type { FakeSourceOptions } from "../../helpers/fake-source.js";

const CACHE_CONFIG: CacheConfig = {
  detailsMaxEntries: 128,
  searchMaxEntries: 32,
  cacheFailures: true,
};

function createTestApp(options: FakeSourceOptions = {}) {
  const logger = createTestLogger();
  const source = createFakeSource(options);
  const catalog = new MovieCatalog(source, CACHE_CONFIG, logger);
  return { app: createApp({ catalog, logger }), source };
}

describe("GET /search?query=", () => {
  it("returns condensed results with the upstream total", async () => {
    const { app, source } = createTestApp({
      search: () => ({
        kind: "ok",
        payload: {
          page: 1,
          total_results: 2,
          results: [AVENGERS, { id: 9320, title: "The Avengers", release_date: "1998-08-13" }],
        },
      }),
    });

    const res = await app.request("/search?query=avengers");

    expect(res.status).toBe(200);
    const body: unknown = await res.json();
    expect(body).toMatchObject({
      query: "avengers",
      total_results: 2,
      results: [
        { movie_id: 24428, title: "The Avengers", release_date: "2012-04-25" },
        { movie_id: 9320, title: "The Avengers", release_date: "1998-08-13" },
      ],
    });
    expect(durationOf(body)).toBeGreaterThanOrEqual(0);
    expect(source.search).toHaveBeenCalledWith("avengers");
  });

  it("returns zero results and an empty list for an empty search", async () => {
    const { app } = createTestApp();

    const res = await app.request("/search?query=qwertyuiop");

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      query: "qwertyuiop",
      total_results: 0,
      results: [],
    });
  });

  it("caches by the exact query string", async () => {
    const { app, source } = createTestApp();

    await app.request("/search?query=Alien");
    await app.request("/search?query=Alien");
    await app.request("/search?query=alien");

    expect(source.search).toHaveBeenCalledTimes(2);
    expect(source.search).toHaveBeenNthCalledWith(1, "Alien");
    expect(source.search).toHaveBeenNthCalledWith(2, "alien");
  });

  it("decodes the query before using it", async () => {
    const { app, source } = createTestApp();

    const res = await app.request("/search?query=star%20wars");

    expect(await res.json()).toMatchObject({ query: "star wars" });
    expect(source.search).toHaveBeenCalledWith("star wars");
  });

  it("returns 500 on an upstream error", async () => {
    const { app } = createTestApp({
      search: () => ({
        kind: "error",
        error: { code: "upstream_error", status: 503, message: "Service offline" },
      }),
    });

    const res = await app.request("/search?query=avengers");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: "External API Error: Service offline",
      type: "upstream_error",
    });
  });

  it("returns 500 when a result cannot be mapped", async () => {
    const { app } = createTestApp({
      search: () => ({ kind: "ok", payload: { total_results: 1, results: [{ title: "No id" }] } }),
    });

    const res = await app.request("/search?query=avengers");

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: SEARCH_MAPPING_ERROR, type: "mapping_error" });
  });

  it("returns 400 when the query parameter is missing", async () => {
    const { app, source } = createTestApp();

    const res = await app.request("/search");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid query: parameter is required",
      type: "validation_error",
    });
    expect(source.search).not.toHaveBeenCalled();
  });

  it("returns 400 when the query is shorter than two characters", async () => {
    const { app } = createTestApp();

    const res = await app.request("/search?query=a");

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Invalid query: must be at least 2 characters",
      type: "validation_error",
    });
  });

  it("returns 503 when the upstream client is unavailable", async () => {
    const app = createApp({ catalog: null, logger: createTestLogger() });

    const res = await app.request("/search?query=avengers");

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({ type: "service_unavailable" });
  });
});

import { describe, expect, it } from "vitest";
import { ExaSearchAdapter } from "../../../../src/adapters/out/search/ExaSearchAdapter.ts";
import { jsonResponse, namedError, stubFetch } from "../../../helpers/fetchStub.ts";

const BASE_URL = "https://exa.test";

function createAdapter(timeoutMs?: number): ExaSearchAdapter {
  return new ExaSearchAdapter("test-api-key", { baseUrl: BASE_URL, timeoutMs });
}

describe("ExaSearchAdapter", () => {
  describe("search", () => {
    it("should post the query with credentials and filters", async () => {
      const requests = stubFetch(() => jsonResponse({ results: [] }));

      await createAdapter().search({
        q: "semantic search",
        maxResults: 3,
        type: "auto",
        useAutoprompt: true,
        includeText: true,
        filters: { includeDomains: ["example.com"], startPublishedDate: "2024-01-01" },
      });

      expect(requests).toHaveLength(1);
      expect(requests[0]?.url).toBe("https://exa.test/search");
      expect(requests[0]?.method).toBe("POST");
      expect(requests[0]?.headers.get("x-api-key")).toBe("test-api-key");
      expect(requests[0]?.headers.get("content-type")).toBe("application/json");
      expect(requests[0]?.body).toEqual({
        query: "semantic search",
        numResults: 3,
        type: "auto",
        useAutoprompt: true,
        contents: { text: true },
        includeDomains: ["example.com"],
        startPublishedDate: "2024-01-01",
      });
    });

    it("should leave unset options out of the request", async () => {
      const requests = stubFetch(() => jsonResponse({ results: [] }));

      await createAdapter().search({ q: "plain", maxResults: 5 });

      expect(requests[0]?.body).toStrictEqual({ query: "plain", numResults: 5 });
    });

    it("should map provider results", async () => {
      stubFetch(() =>
        jsonResponse({
          requestId: "req-1",
          results: [
            {
              id: "r1",
              url: "https://example.com/a",
              title: "  Example A ",
              score: 0.91,
              publishedDate: "2024-05-01T00:00:00.000Z",
              author: "Jane Doe",
              text: " Body text ",
            },
            { id: null, url: "https://example.com/b", title: null, publishedDate: "not a date" },
          ],
        })
      );

      const result = await createAdapter().search({ q: "semantic search", maxResults: 2 });

      expect(result.isOk()).toBe(true);
      const response = result._unsafeUnwrap();
      expect(response.query).toBe("semantic search");
      expect(response.source).toBe("exa");
      expect(response.totalResults).toBe(2);
      expect(response.results[0]).toEqual({
        id: "r1",
        title: "Example A",
        url: "https://example.com/a",
        snippet: "Body text",
        published: new Date("2024-05-01T00:00:00.000Z"),
        author: "Jane Doe",
        relevanceScore: 0.91,
      });
      expect(response.results[1]).toEqual({
        id: "https://example.com/b",
        title: "",
        url: "https://example.com/b",
      });
    });
  });

  describe("findSimilar", () => {
    it("should post the seed URL to the similarity endpoint", async () => {
      const requests = stubFetch(() =>
        jsonResponse({ results: [{ id: "s1", url: "https://other.com/post", score: 0.7 }] })
      );

      const result = await createAdapter().findSimilar({
        url: "https://example.com/post",
        maxResults: 4,
        includeText: true,
        excludeSourceDomain: true,
      });

      expect(requests[0]?.url).toBe("https://exa.test/findSimilar");
      expect(requests[0]?.body).toEqual({
        url: "https://example.com/post",
        numResults: 4,
        excludeSourceDomain: true,
        contents: { text: true },
      });
      const response = result._unsafeUnwrap();
      expect(response.query).toBe("https://example.com/post");
      expect(response.results.map((r) => r.url)).toEqual(["https://other.com/post"]);
    });
  });

  describe("getContents", () => {
    it("should return extracted pages and per-URL failures", async () => {
      const requests = stubFetch(() =>
        jsonResponse({
          results: [
            { id: "https://example.com/a", url: "https://example.com/a", title: "A", text: "Hello" },
          ],
          statuses: [
            { id: "https://example.com/a", status: "success" },
            {
              id: "https://example.com/missing",
              status: "error",
              error: { tag: "CRAWL_NOT_FOUND", httpStatusCode: 404 },
            },
          ],
        })
      );

      const result = await createAdapter().getContents([
        "https://example.com/a",
        "https://example.com/missing",
      ]);

      expect(requests[0]?.url).toBe("https://exa.test/contents");
      expect(requests[0]?.body).toEqual({
        urls: ["https://example.com/a", "https://example.com/missing"],
        text: true,
      });
      const response = result._unsafeUnwrap();
      expect(response.source).toBe("exa");
      expect(response.contents).toEqual([
        { id: "https://example.com/a", url: "https://example.com/a", title: "A", text: "Hello" },
      ]);
      expect(response.failures).toEqual([
        { url: "https://example.com/missing", reason: "CRAWL_NOT_FOUND" },
      ]);
    });

    it("should keep the requested URL when the page was redirected", async () => {
      stubFetch(() =>
        jsonResponse({
          results: [
            { id: "https://short.test/abc", url: "https://example.org/real-article", text: "Body" },
          ],
          statuses: [{ id: "https://short.test/abc", status: "success" }],
        })
      );

      const result = await createAdapter().getContents(["https://short.test/abc"]);

      const response = result._unsafeUnwrap();
      expect(response.contents).toEqual([
        { id: "https://short.test/abc", url: "https://example.org/real-article", text: "Body" },
      ]);
      expect(response.failures).toEqual([]);
    });

    it("should treat a missing status list as no failures", async () => {
      stubFetch(() => jsonResponse({ results: [{ url: "https://example.com/a" }] }));

      const result = await createAdapter().getContents(["https://example.com/a"]);

      expect(result._unsafeUnwrap().failures).toEqual([]);
    });
  });

  describe("error mapping", () => {
    it("should report rejected credentials as an authorization failure", async () => {
      stubFetch(() => new Response("unauthorized", { status: 401 }));

      const result = await createAdapter().search({ q: "test", maxResults: 1 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "upstream",
        reason: "authorization",
        message: "API Key authentication error: 401",
        status: 401,
      });
    });

    it("should read the retry delay from a rate-limited response", async () => {
      stubFetch(() => jsonResponse({ error: "slow down" }, 429, { "Retry-After": "12" }));

      const result = await createAdapter().search({ q: "test", maxResults: 1 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "upstream",
        reason: "rateLimit",
        message: "Rate limit exceeded",
        status: 429,
        retryAfterMs: 12_000,
      });
    });

    it("should default the retry delay when the header is absent", async () => {
      stubFetch(() => new Response("", { status: 429 }));

      const result = await createAdapter().search({ q: "test", maxResults: 1 });

      const searchError = result._unsafeUnwrapErr();
      expect(searchError.type === "upstream" && searchError.retryAfterMs).toBe(60_000);
    });

    it("should map a rejected request to an invalid argument", async () => {
      stubFetch(() => jsonResponse({ error: "numResults must be at most 100" }, 400));

      const result = await createAdapter().search({ q: "test", maxResults: 1 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "invalidArgument",
        message: "API rejected the request: numResults must be at most 100",
        issues: ["API rejected the request: numResults must be at most 100"],
      });
    });

    it("should map other statuses to an http failure", async () => {
      stubFetch(() => new Response("internal", { status: 500 }));

      const result = await createAdapter().findSimilar({ url: "https://example.com", maxResults: 1 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "upstream",
        reason: "http",
        message: "API call error: 500 internal",
        status: 500,
      });
    });

    it("should map a transport failure to a network error", async () => {
      stubFetch(() => {
        throw new TypeError("fetch failed");
      });

      const result = await createAdapter().search({ q: "test", maxResults: 1 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "upstream",
        reason: "network",
        message: "fetch failed",
      });
    });

    it("should map an aborted request to a timeout", async () => {
      stubFetch(() => {
        throw namedError("TimeoutError", "The operation was aborted due to timeout");
      });

      const result = await createAdapter(5_000).getContents(["https://example.com"]);

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "upstream",
        reason: "timeout",
        message: "Exa API request timed out after 5000ms",
      });
    });

    it("should report an unreadable body as a parse failure", async () => {
      stubFetch(() => new Response("not json", { status: 200 }));

      const result = await createAdapter().search({ q: "test", maxResults: 1 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "upstream",
        reason: "parse",
        message: "Failed to parse API response",
      });
    });

    it("should report an unexpected response shape as a parse failure", async () => {
      stubFetch(() => jsonResponse({ data: [] }));

      const result = await createAdapter().search({ q: "test", maxResults: 1 });

      expect(result._unsafeUnwrapErr()).toEqual({
        type: "upstream",
        reason: "parse",
        message: "Unexpected API response shape: Required",
      });
    });
  });
});

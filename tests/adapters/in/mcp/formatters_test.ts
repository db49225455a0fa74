import { describe, expect, it } from "vitest";
import {
  describeSearchError,
  formatPageContents,
  formatSearchResults,
  toMcpContent,
  toMcpResult,
} from "../../../../src/adapters/in/mcp/formatters.ts";
import { invalidArgument } from "../../../../src/domain/models/search.ts";
import { searchResult } from "../../../helpers/fakes.ts";

const listOptions = {
  heading: "Semantic search results for: 'solar'",
  scoreLabel: "Relevance",
  emptyMessage: "No results found.",
} as const;

describe("formatSearchResults", () => {
  it("should number each result with its details", () => {
    const text = formatSearchResults(
      [
        searchResult("1", {
          title: "Solar power",
          url: "https://example.com/solar",
          relevanceScore: 0.91234,
          published: new Date("2024-02-03T10:00:00Z"),
          snippet: "Line one\n\nline   two",
        }),
        searchResult("2", { title: "", url: "https://example.com/x" }),
      ],
      listOptions,
    );

    expect(text).toBe(
      [
        "Semantic search results for: 'solar'",
        "",
        "Found 2 results:",
        "",
        "1. Solar power",
        "   URL: https://example.com/solar",
        "   Relevance Score: 0.912",
        "   Published: 2024-02-03",
        "   Line one line two",
        "",
        "2. No title",
        "   URL: https://example.com/x",
        "   Relevance Score: N/A",
      ].join("\n"),
    );
  });

  it("should use the singular for one result and the given score label", () => {
    const text = formatSearchResults([searchResult("1", { relevanceScore: 0.5 })], {
      ...listOptions,
      scoreLabel: "Similarity",
    });

    expect(text.split("\n").slice(2)).toEqual([
      "Found 1 result:",
      "",
      "1. Result 1",
      "   URL: https://example.com/1",
      "   Similarity Score: 0.500",
    ]);
  });

  it("should truncate long snippets", () => {
    const text = formatSearchResults([searchResult("1", { snippet: "a".repeat(600) })], listOptions);

    expect(text.split("\n").at(-1)).toBe(`   ${"a".repeat(500)}...`);
  });

  it("should return the empty message when nothing was found", () => {
    expect(formatSearchResults([], listOptions)).toBe("No results found.");
  });
});

describe("formatPageContents", () => {
  it("should render title and text for each page", () => {
    const text = formatPageContents([
      { url: "https://example.com/a", title: "A", text: "  Hello world  " },
      { url: "https://example.com/b" },
    ]);

    expect(text).toBe(
      [
        "Content extracted from: https://example.com/a",
        "Title: A",
        "",
        "Content:",
        "Hello world",
        "",
        "---",
        "",
        "Content extracted from: https://example.com/b",
        "",
        "Content: Unable to extract readable text from this page.",
      ].join("\n"),
    );
  });

  it("should truncate long pages and report the full length", () => {
    const lines = formatPageContents([{ url: "https://example.com/long", text: "x".repeat(3500) }])
      .split("\n");

    expect(lines).toEqual([
      "Content extracted from: https://example.com/long",
      "",
      "Content (first 3000 characters):",
      `${"x".repeat(3000)}...`,
      "",
      "[Content truncated - total length: 3500 characters]",
    ]);
  });
});

describe("describeSearchError", () => {
  it("should list issues beyond the message", () => {
    expect(describeSearchError(invalidArgument("Invalid URL list", ["url must be an absolute URL: nope"])))
      .toBe("Invalid argument: Invalid URL list\n- url must be an absolute URL: nope");
  });

  it("should not repeat a single issue", () => {
    expect(describeSearchError(invalidArgument("query must not be empty")))
      .toBe("Invalid argument: query must not be empty");
  });

  it("should explain missing pages", () => {
    expect(
      describeSearchError({
        type: "notFound",
        message: "Could not extract content from: https://example.com/b",
        urls: ["https://example.com/b"],
      }),
    ).toBe(
      "Not found: Could not extract content from: https://example.com/b. The page might be inaccessible or require authentication.",
    );
  });

  it("should name the upstream reason", () => {
    expect(
      describeSearchError({
        type: "upstream",
        reason: "authorization",
        message: "API Key authentication error: 401",
        status: 401,
      }),
    ).toBe("Upstream error (authorization): API Key authentication error: 401");
  });
});

describe("MCP payload mapping", () => {
  it("should serialise dates as ISO strings", () => {
    const published = new Date("2024-02-03T10:00:00Z");

    expect(toMcpResult(searchResult("1", { published, relevanceScore: 0.5 }))).toEqual({
      title: "Result 1",
      url: "https://example.com/1",
      published: "2024-02-03T10:00:00.000Z",
      score: 0.5,
    });
    expect(toMcpContent({ url: "https://example.com/a", text: "Hello", published })).toEqual({
      url: "https://example.com/a",
      text: "Hello",
      published: "2024-02-03T10:00:00.000Z",
    });
  });
});

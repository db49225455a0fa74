import { z } from "zod";
import {
  MAX_CONTENT_URLS,
  MAX_DAYS_BACK,
  MAX_RESULTS,
  MIN_DAYS_BACK,
  MIN_RESULTS,
} from "../../../domain/models/search.ts";

export const TOOL_NAMES = {
  search: "search_web_semantic",
  contents: "extract_page_content",
  similar: "find_similar_pages",
  recent: "search_recent_content",
  example: "search_by_example_text",
} as const;

export type ToolName = typeof TOOL_NAMES[keyof typeof TOOL_NAMES];

const numResults = (description: string) =>
  z.number().int().min(MIN_RESULTS).max(MAX_RESULTS).optional()
    .describe(`${description} (default 5, ${MIN_RESULTS}-${MAX_RESULTS})`);

const includeText = z.boolean().optional()
  .describe("Include the page text of each result (default false)");

export const searchWebSemanticShape = {
  query: z.string().min(1).describe(
    "Natural language search query describing what you're looking for",
  ),
  num_results: numResults("Number of results to return"),
  include_domains: z.array(z.string()).optional()
    .describe("Only return results from these domains"),
  exclude_domains: z.array(z.string()).optional()
    .describe("Never return results from these domains"),
  start_published_date: z.string().optional()
    .describe("Only results published on or after this date (YYYY-MM-DD)"),
  end_published_date: z.string().optional()
    .describe("Only results published on or before this date (YYYY-MM-DD)"),
  include_text: includeText,
};

export const extractPageContentShape = {
  url: z.string().optional()
    .describe("The complete URL of the webpage to extract content from"),
  urls: z.array(z.string()).max(MAX_CONTENT_URLS).optional()
    .describe(`Several URLs to extract at once (at most ${MAX_CONTENT_URLS})`),
};

export const findSimilarPagesShape = {
  url: z.string().min(1).describe("The URL to find similar content for"),
  num_results: numResults("Number of similar pages to find"),
  include_text: includeText,
  exclude_source_domain: z.boolean().optional()
    .describe("Leave out every page from the seed URL's domain (default false)"),
};

export const searchRecentContentShape = {
  query: z.string().min(1).describe("Search query for recent content"),
  days_back: z.number().int().min(MIN_DAYS_BACK).max(MAX_DAYS_BACK).optional()
    .describe(
      "Number of days back to search, e.g. 7 for last week, 30 for last month (default 7)",
    ),
  num_results: numResults("Number of results to return"),
  include_text: includeText,
};

export const searchByExampleTextShape = {
  text: z.string().min(1).describe("The example text to find similar content for"),
  num_results: numResults("Number of similar results to find"),
  include_text: includeText,
};

export interface ToolDescriptor {
  readonly name: ToolName;
  readonly description: string;
}

/**
 * The operations exposed to MCP hosts, in registration order
 */
export const toolCatalog: ReadonlyArray<ToolDescriptor> = [
  {
    name: TOOL_NAMES.search,
    description:
      "Search the web using Exa AI's semantic search. Use this when you need to find web pages about a specific topic using natural language understanding rather than keyword matching. Returns ranked results with titles, URLs, and relevance scores.",
  },
  {
    name: TOOL_NAMES.contents,
    description:
      "Extract clean, readable text content from one or more web page URLs. Use this when you need to read or analyze the actual content of a webpage, without HTML formatting and ads.",
  },
  {
    name: TOOL_NAMES.similar,
    description:
      "Find web pages that are similar in content to a given URL. Use this for discovering related articles, finding competing content, or exploring content in the same domain space.",
  },
  {
    name: TOOL_NAMES.recent,
    description:
      "Search for recent web content published within a specific time period. Use this when you need current information, recent news, or recently published articles on a topic.",
  },
  {
    name: TOOL_NAMES.example,
    description:
      "Find web content similar to a provided text sample. Use this when you have a piece of text and want to find web pages with similar content, style, or topics.",
  },
];

export function describeTool(name: ToolName): string {
  return toolCatalog.find((tool) => tool.name === name)?.description ?? name;
}

export const searchWebSemanticSchema = z.object(searchWebSemanticShape);
export const extractPageContentSchema = z.object(extractPageContentShape);
export const findSimilarPagesSchema = z.object(findSimilarPagesShape);
export const searchRecentContentSchema = z.object(searchRecentContentShape);
export const searchByExampleTextSchema = z.object(searchByExampleTextShape);

export type SearchWebSemanticInput = z.infer<typeof searchWebSemanticSchema>;
export type ExtractPageContentInput = z.infer<typeof extractPageContentSchema>;
export type FindSimilarPagesInput = z.infer<typeof findSimilarPagesSchema>;
export type SearchRecentContentInput = z.infer<typeof searchRecentContentSchema>;
export type SearchByExampleTextInput = z.infer<typeof searchByExampleTextSchema>;

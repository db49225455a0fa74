import type { McpContent, McpResult } from "../../../domain/models/mcp.ts";
import type { PageContent, SearchError, SearchResult } from "../../../domain/models/search.ts";

export const CONTENT_PREVIEW_LIMIT = 3000;
export const SNIPPET_LIMIT = 500;
export const EXAMPLE_PREVIEW_LIMIT = 200;

export interface ResultListOptions {
  readonly heading: string;
  readonly scoreLabel: "Relevance" | "Similarity";
  readonly emptyMessage: string;
}

export function formatScore(score: number | undefined): string {
  return score === undefined ? "N/A" : score.toFixed(3);
}

export function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function truncate(text: string, limit: number): string {
  return text.length > limit ? `${text.slice(0, limit)}...` : text;
}

export function formatSearchResults(
  results: ReadonlyArray<SearchResult>,
  options: ResultListOptions,
): string {
  if (results.length === 0) {
    return options.emptyMessage;
  }

  const entries = results.map((result, index) => {
    const lines = [
      `${index + 1}. ${result.title || "No title"}`,
      `   URL: ${result.url}`,
      `   ${options.scoreLabel} Score: ${formatScore(result.relevanceScore)}`,
    ];
    if (result.published) {
      lines.push(`   Published: ${formatDate(result.published)}`);
    }
    if (result.snippet) {
      lines.push(`   ${truncate(result.snippet.replace(/\s+/g, " "), SNIPPET_LIMIT)}`);
    }
    return lines.join("\n");
  });

  const count = `Found ${results.length} result${results.length === 1 ? "" : "s"}:`;
  return `${options.heading}\n\n${count}\n\n${entries.join("\n\n")}`;
}

function formatPageContent(content: PageContent): string {
  const lines = [`Content extracted from: ${content.url}`];
  if (content.title) {
    lines.push(`Title: ${content.title}`);
  }
  lines.push("");

  const text = content.text?.trim();
  if (!text) {
    lines.push("Content: Unable to extract readable text from this page.");
  } else if (text.length > CONTENT_PREVIEW_LIMIT) {
    lines.push(`Content (first ${CONTENT_PREVIEW_LIMIT} characters):`);
    lines.push(`${text.slice(0, CONTENT_PREVIEW_LIMIT)}...`);
    lines.push("");
    lines.push(`[Content truncated - total length: ${text.length} characters]`);
  } else {
    lines.push("Content:");
    lines.push(text);
  }

  return lines.join("\n");
}

export function formatPageContents(contents: ReadonlyArray<PageContent>): string {
  return contents.map(formatPageContent).join("\n\n---\n\n");
}

export function describeSearchError(error: SearchError): string {
  switch (error.type) {
    case "invalidArgument": {
      const extra = error.issues.filter((issue) => issue !== error.message);
      const details = extra.length > 0 ? `\n${extra.map((issue) => `- ${issue}`).join("\n")}` : "";
      return `Invalid argument: ${error.message}${details}`;
    }
    case "notFound":
      return `Not found: ${error.message}. The page might be inaccessible or require authentication.`;
    case "upstream":
      return `Upstream error (${error.reason}): ${error.message}`;
  }
}

export function toMcpResult(result: SearchResult): McpResult {
  return {
    title: result.title,
    url: result.url,
    snippet: result.snippet,
    published: result.published?.toISOString(),
    author: result.author,
    score: result.relevanceScore,
  };
}

export function toMcpContent(content: PageContent): McpContent {
  return {
    url: content.url,
    title: content.title,
    text: content.text,
    published: content.published?.toISOString(),
  };
}

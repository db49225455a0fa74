/**
 * Requests accepted by the tools, in the caller's vocabulary
 */
export interface SearchRequest {
  readonly query: string;
  readonly numResults?: number;
  readonly includeDomains?: ReadonlyArray<string>;
  readonly excludeDomains?: ReadonlyArray<string>;
  readonly startPublishedDate?: string;
  readonly endPublishedDate?: string;
  readonly includeText?: boolean;
}

export interface ContentsRequest {
  readonly urls: ReadonlyArray<string>;
}

export interface FindSimilarRequest {
  readonly url: string;
  readonly numResults?: number;
  readonly includeText?: boolean;
  readonly excludeSourceDomain?: boolean;
}

export interface RecentSearchRequest {
  readonly query: string;
  readonly daysBack?: number;
  readonly numResults?: number;
  readonly includeText?: boolean;
}

export interface ExampleSearchRequest {
  readonly text: string;
  readonly numResults?: number;
  readonly includeText?: boolean;
}

export interface McpResult {
  readonly title: string;
  readonly url: string;
  readonly snippet?: string;
  readonly published?: string;
  readonly author?: string;
  readonly score?: number;
}

export interface McpContent {
  readonly url: string;
  readonly title?: string;
  readonly text?: string;
  readonly published?: string;
}

export interface McpSuccessResponse {
  readonly status: "success";
  readonly tool: string;
  readonly results?: ReadonlyArray<McpResult>;
  readonly contents?: ReadonlyArray<McpContent>;
  readonly source: string;
}

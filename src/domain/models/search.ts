import type { DomainError } from "./errors.ts";

export const MIN_RESULTS = 1;
export const MAX_RESULTS = 20;
export const DEFAULT_RESULTS = 5;

export const MIN_DAYS_BACK = 1;
export const MAX_DAYS_BACK = 365;
export const DEFAULT_DAYS_BACK = 7;

export const MAX_CONTENT_URLS = 10;

export type SearchType = "auto" | "neural" | "keyword";

/**
 * Provider-side filters shared by search and find-similar
 */
export interface SearchFilters {
  readonly includeDomains?: ReadonlyArray<string>;
  readonly excludeDomains?: ReadonlyArray<string>;
  readonly startPublishedDate?: string;
  readonly endPublishedDate?: string;
}

/**
 * Parameters for search queries
 */
export interface QueryParams {
  readonly q: string;
  readonly maxResults: number;
  readonly type?: SearchType;
  readonly useAutoprompt?: boolean;
  readonly includeText?: boolean;
  readonly filters?: SearchFilters;
}

/**
 * Parameters for similarity lookups seeded by a URL
 */
export interface SimilarParams {
  readonly url: string;
  readonly maxResults: number;
  readonly includeText?: boolean;
  readonly excludeSourceDomain?: boolean;
}

/**
 * Individual search result
 */
export interface SearchResult {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  readonly snippet?: string;
  readonly published?: Date;
  readonly author?: string;
  readonly relevanceScore?: number;
}

export interface SearchResponse {
  readonly query: string;
  readonly results: ReadonlyArray<SearchResult>;
  readonly totalResults: number;
  readonly searchTime: number;
  readonly source: string;
}

export interface PageContent {
  /** The URL as requested; `url` is where the page was finally fetched from */
  readonly id?: string;
  readonly url: string;
  readonly title?: string;
  readonly text?: string;
  readonly published?: Date;
  readonly author?: string;
}

export interface ContentFailure {
  readonly url: string;
  readonly reason: string;
}

export interface ContentsResponse {
  readonly contents: ReadonlyArray<PageContent>;
  readonly failures: ReadonlyArray<ContentFailure>;
  readonly source: string;
}

export type UpstreamReason =
  | "network"
  | "timeout"
  | "authorization"
  | "rateLimit"
  | "http"
  | "parse";

/**
 * Search error types
 */
export type SearchError =
  | { type: "invalidArgument"; message: string; issues: string[] }
  | { type: "notFound"; message: string; urls: string[] }
  | {
    type: "upstream";
    reason: UpstreamReason;
    message: string;
    status?: number;
    retryAfterMs?: number;
  };

export function invalidArgument(message: string, issues: string[] = [message]): SearchError {
  return { type: "invalidArgument", message, issues };
}

export function toDomainError(error: SearchError): DomainError {
  switch (error.type) {
    case "invalidArgument":
      return { type: "validation", message: error.message, details: { issues: error.issues } };
    case "notFound":
      return { type: "not_found", message: error.message, details: { urls: error.urls } };
    case "upstream": {
      const details = { reason: error.reason, status: error.status };
      if (error.reason === "authorization") {
        return { type: "unauthorized", message: error.message, details };
      }
      if (error.reason === "rateLimit") {
        return {
          type: "rate_limit",
          message: error.message,
          details: { ...details, retryAfterMs: error.retryAfterMs },
        };
      }
      return { type: "external", message: error.message, details };
    }
  }
}

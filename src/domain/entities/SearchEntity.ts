import type { SearchResponse, SearchResult } from "../models/search.ts";

/**
 * SearchEntity represents the results of one search call while they are shaped for the caller
 */
export class SearchEntity {
  private constructor(
    private readonly query: string,
    private readonly results: ReadonlyArray<SearchResult>,
    private readonly searchTime: number,
    private readonly source: string,
  ) {}

  getQuery(): string {
    return this.query;
  }

  getResults(): ReadonlyArray<SearchResult> {
    return this.results;
  }

  getSource(): string {
    return this.source;
  }

  /**
   * Keep at most `maxResults` entries, preserving provider order
   */
  limit(maxResults: number): SearchEntity {
    if (this.results.length <= maxResults) {
      return this;
    }
    return new SearchEntity(
      this.query,
      this.results.slice(0, maxResults),
      this.searchTime,
      this.source,
    );
  }

  /**
   * Drop every result pointing at `url` (after normalisation)
   */
  excludeUrl(url: string): SearchEntity {
    const excluded = normalizeUrl(url);
    const filtered = this.results.filter((result) => normalizeUrl(result.url) !== excluded);
    return new SearchEntity(this.query, filtered, this.searchTime, this.source);
  }

  toSearchResponse(): SearchResponse {
    return {
      query: this.query,
      results: this.results,
      totalResults: this.results.length,
      searchTime: this.searchTime,
      source: this.source,
    };
  }

  static fromSearchResponse(response: SearchResponse): SearchEntity {
    return new SearchEntity(
      response.query,
      response.results,
      response.searchTime,
      response.source,
    );
  }
}

/**
 * Canonical form used to compare URLs: scheme, "www.", fragment and trailing slash are ignored
 */
export function normalizeUrl(url: string): string {
  if (!URL.canParse(url)) {
    return url.trim().toLowerCase();
  }

  const parsed = new URL(url);
  const host = parsed.host.replace(/^www\./, "");
  const path = parsed.pathname.length > 1 ? parsed.pathname.replace(/\/+$/, "") : "";
  return `${host}${path}${parsed.search}`;
}

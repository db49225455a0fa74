import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import {
  type ContentsResponse,
  DEFAULT_DAYS_BACK,
  DEFAULT_RESULTS,
  invalidArgument,
  MAX_CONTENT_URLS,
  MAX_DAYS_BACK,
  MAX_RESULTS,
  MIN_DAYS_BACK,
  MIN_RESULTS,
  type QueryParams,
  type SearchError,
  type SearchFilters,
  type SearchResponse,
} from "../../domain/models/search.ts";
import type {
  ContentsRequest,
  ExampleSearchRequest,
  FindSimilarRequest,
  RecentSearchRequest,
  SearchRequest,
} from "../../domain/models/mcp.ts";
import { normalizeUrl, SearchEntity } from "../../domain/entities/SearchEntity.ts";
import type { SearchUseCase } from "../ports/in/SearchUseCase.ts";
import type { SearchRepository } from "../ports/out/SearchRepository.ts";
import { info, warn } from "../../config/logger.ts";

const MS_PER_DAY = 24 * 60 * 60 * 1000;

const publishedDateSchema = z.string().date().or(z.string().datetime({ offset: true }));

/**
 * Implementation of the SearchUseCase port
 * Validates tool parameters, builds provider queries and shapes the results
 */
export class SearchService implements SearchUseCase {
  constructor(
    private readonly searchRepository: SearchRepository,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async search(request: SearchRequest): Promise<Result<SearchResponse, SearchError>> {
    const paramsResult = requireText(request.query, "query")
      .andThen((q) => resolveCount(request.numResults).map((maxResults) => ({ q, maxResults })))
      .andThen((base) => resolveFilters(request).map((filters): QueryParams => ({
        ...base,
        filters,
        type: "auto",
        useAutoprompt: true,
        includeText: request.includeText ?? false,
      })));

    return await this.runSearch("search", paramsResult);
  }

  async searchRecent(request: RecentSearchRequest): Promise<Result<SearchResponse, SearchError>> {
    const paramsResult = requireText(request.query, "query")
      .andThen((q) => resolveCount(request.numResults).map((maxResults) => ({ q, maxResults })))
      .andThen((base) =>
        resolveDaysBack(request.daysBack).map((daysBack): QueryParams => ({
          ...base,
          filters: { startPublishedDate: this.startDateFor(daysBack) },
          useAutoprompt: true,
          includeText: request.includeText ?? false,
        }))
      );

    return await this.runSearch("searchRecent", paramsResult);
  }

  async searchByExample(
    request: ExampleSearchRequest,
  ): Promise<Result<SearchResponse, SearchError>> {
    const paramsResult = requireText(request.text, "text")
      .andThen((q) =>
        resolveCount(request.numResults).map((maxResults): QueryParams => ({
          q,
          maxResults,
          type: "neural",
          useAutoprompt: false,
          includeText: request.includeText ?? false,
        }))
      );

    return await this.runSearch("searchByExample", paramsResult);
  }

  async findSimilar(request: FindSimilarRequest): Promise<Result<SearchResponse, SearchError>> {
    const paramsResult = requireUrl(request.url, "url")
      .andThen((url) => resolveCount(request.numResults).map((maxResults) => ({ url, maxResults })));

    if (paramsResult.isErr()) {
      warn(`[SEARCH_SERVICE] findSimilar rejected: ${paramsResult.error.message}`);
      return err(paramsResult.error);
    }

    const { url, maxResults } = paramsResult.value;
    const result = await this.searchRepository.findSimilar({
      url,
      maxResults,
      includeText: request.includeText ?? false,
      excludeSourceDomain: request.excludeSourceDomain ?? false,
    });

    return result.map((response) =>
      SearchEntity.fromSearchResponse(response)
        .excludeUrl(url)
        .limit(maxResults)
        .toSearchResponse()
    );
  }

  async getContents(request: ContentsRequest): Promise<Result<ContentsResponse, SearchError>> {
    const urlsResult = resolveUrls(request.urls);
    if (urlsResult.isErr()) {
      warn(`[SEARCH_SERVICE] getContents rejected: ${urlsResult.error.message}`);
      return err(urlsResult.error);
    }

    const urls = urlsResult.value;
    const result = await this.searchRepository.getContents(urls);

    return result.andThen((response) => {
      const retrieved = new Set(
        response.contents.flatMap((content) =>
          content.id ? [normalizeUrl(content.id), normalizeUrl(content.url)] : [normalizeUrl(content.url)]
        ),
      );
      const failed = new Set(response.failures.map((failure) => normalizeUrl(failure.url)));
      const missing = urls.filter((url) =>
        !retrieved.has(normalizeUrl(url)) || failed.has(normalizeUrl(url))
      );

      if (missing.length > 0) {
        warn(`[SEARCH_SERVICE] Content unavailable for: ${missing.join(", ")}`);
        return err<ContentsResponse, SearchError>({
          type: "notFound",
          message: `Could not extract content from: ${missing.join(", ")}`,
          urls: missing,
        });
      }

      info(`[SEARCH_SERVICE] Extracted content from ${response.contents.length} page(s)`);
      return ok<ContentsResponse, SearchError>(response);
    });
  }

  private async runSearch(
    operation: string,
    paramsResult: Result<QueryParams, SearchError>,
  ): Promise<Result<SearchResponse, SearchError>> {
    if (paramsResult.isErr()) {
      warn(`[SEARCH_SERVICE] ${operation} rejected: ${paramsResult.error.message}`);
      return err(paramsResult.error);
    }

    const params = paramsResult.value;
    const result = await this.searchRepository.search(params);

    return result
      .map((response) => {
        const limited = SearchEntity.fromSearchResponse(response)
          .limit(params.maxResults)
          .toSearchResponse();
        info(
          `[SEARCH_SERVICE] ${operation} returned ${limited.totalResults} result(s) from ${this.searchRepository.getName()}`,
        );
        return limited;
      })
      .mapErr((error) => {
        warn(`[SEARCH_SERVICE] ${operation} failed: ${error.type} - ${error.message}`);
        return error;
      });
  }

  private startDateFor(daysBack: number): string {
    const start = new Date(this.now().getTime() - daysBack * MS_PER_DAY);
    return start.toISOString().slice(0, 10);
  }
}

function requireText(value: string, field: string): Result<string, SearchError> {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return err(invalidArgument(`${field} must not be empty`));
  }
  return ok(trimmed);
}

function requireUrl(value: string, field: string): Result<string, SearchError> {
  const trimmed = value.trim();
  if (!URL.canParse(trimmed)) {
    return err(invalidArgument(`${field} must be an absolute URL: ${value}`));
  }

  const protocol = new URL(trimmed).protocol;
  if (protocol !== "http:" && protocol !== "https:") {
    return err(invalidArgument(`${field} must use http or https: ${value}`));
  }
  return ok(trimmed);
}

function resolveCount(value: number | undefined): Result<number, SearchError> {
  const count = value ?? DEFAULT_RESULTS;
  if (!Number.isInteger(count) || count < MIN_RESULTS || count > MAX_RESULTS) {
    return err(
      invalidArgument(`num_results must be an integer between ${MIN_RESULTS} and ${MAX_RESULTS}`),
    );
  }
  return ok(count);
}

function resolveDaysBack(value: number | undefined): Result<number, SearchError> {
  const days = value ?? DEFAULT_DAYS_BACK;
  if (!Number.isInteger(days) || days < MIN_DAYS_BACK || days > MAX_DAYS_BACK) {
    return err(
      invalidArgument(`days_back must be an integer between ${MIN_DAYS_BACK} and ${MAX_DAYS_BACK}`),
    );
  }
  return ok(days);
}

function resolveUrls(values: ReadonlyArray<string>): Result<string[], SearchError> {
  if (values.length === 0) {
    return err(invalidArgument("at least one URL is required"));
  }
  if (values.length > MAX_CONTENT_URLS) {
    return err(invalidArgument(`at most ${MAX_CONTENT_URLS} URLs can be extracted at once`));
  }

  const urls: string[] = [];
  const issues: string[] = [];
  for (const value of values) {
    const url = requireUrl(value, "url");
    if (url.isErr()) {
      issues.push(url.error.message);
    } else if (!urls.includes(url.value)) {
      urls.push(url.value);
    }
  }

  if (issues.length > 0) {
    return err(invalidArgument("Invalid URL list", issues));
  }
  return ok(urls);
}

function resolveDomains(
  values: ReadonlyArray<string> | undefined,
  field: string,
): Result<string[] | undefined, SearchError> {
  if (values === undefined) {
    return ok(undefined);
  }

  const domains = values.map((domain) => domain.trim().toLowerCase());
  if (domains.some((domain) => domain.length === 0)) {
    return err(invalidArgument(`${field} must not contain empty entries`));
  }
  return ok(domains.length > 0 ? domains : undefined);
}

function resolveDate(value: string | undefined, field: string): Result<string | undefined, SearchError> {
  if (value === undefined || value.trim() === "") {
    return ok(undefined);
  }
  const date = value.trim();
  if (!publishedDateSchema.safeParse(date).success) {
    return err(invalidArgument(`${field} must be an ISO 8601 date (YYYY-MM-DD): ${value}`));
  }
  return ok(date);
}

type DomainFilters = Pick<SearchFilters, "includeDomains" | "excludeDomains">;

function resolveFilters(request: SearchRequest): Result<SearchFilters, SearchError> {
  return resolveDomains(request.includeDomains, "include_domains")
    .andThen((includeDomains) =>
      resolveDomains(request.excludeDomains, "exclude_domains").map((excludeDomains) => ({
        includeDomains,
        excludeDomains,
      }))
    )
    .andThen((domains): Result<DomainFilters, SearchError> => {
      if (domains.includeDomains && domains.excludeDomains) {
        return err(invalidArgument("include_domains and exclude_domains cannot be combined"));
      }
      return ok(domains);
    })
    .andThen((domains) =>
      resolveDate(request.startPublishedDate, "start_published_date").andThen((start) =>
        resolveDate(request.endPublishedDate, "end_published_date").map((end) => ({
          ...domains,
          startPublishedDate: start,
          endPublishedDate: end,
        }))
      )
    )
    .andThen((filters): Result<SearchFilters, SearchError> => {
      if (
        filters.startPublishedDate && filters.endPublishedDate &&
        Date.parse(filters.startPublishedDate) > Date.parse(filters.endPublishedDate)
      ) {
        return err(
          invalidArgument("start_published_date must not be after end_published_date"),
        );
      }
      return ok(filters);
    });
}

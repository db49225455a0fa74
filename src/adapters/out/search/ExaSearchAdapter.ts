import { err, fromThrowable, ok, okAsync, type Result, ResultAsync } from "neverthrow";
import { z } from "zod";
import type {
  ContentFailure,
  ContentsResponse,
  PageContent,
  QueryParams,
  SearchError,
  SearchResponse,
  SearchResult,
  SimilarParams,
} from "../../../domain/models/search.ts";
import type { SearchRepository } from "../../../application/ports/out/SearchRepository.ts";
import { debug, error } from "../../../config/logger.ts";

interface ExaContentsOptions {
  text: true;
}

interface ExaSearchParams {
  query: string;
  numResults: number;
  type?: string;
  useAutoprompt?: boolean;
  includeDomains?: string[];
  excludeDomains?: string[];
  startPublishedDate?: string;
  endPublishedDate?: string;
  contents?: ExaContentsOptions;
}

interface ExaFindSimilarParams {
  url: string;
  numResults: number;
  excludeSourceDomain?: boolean;
  contents?: ExaContentsOptions;
}

interface ExaContentsParams {
  urls: string[];
  text: true;
}

const exaResultSchema = z.object({
  id: z.string().nullish(),
  url: z.string(),
  title: z.string().nullish(),
  score: z.number().nullish(),
  publishedDate: z.string().nullish(),
  author: z.string().nullish(),
  text: z.string().nullish(),
});

type ExaResult = z.infer<typeof exaResultSchema>;

const exaSearchResponseSchema = z.object({
  requestId: z.string().nullish(),
  resolvedSearchType: z.string().nullish(),
  results: z.array(exaResultSchema),
});

const exaContentsResponseSchema = z.object({
  results: z.array(exaResultSchema),
  statuses: z
    .array(
      z.object({
        id: z.string(),
        status: z.string(),
        error: z
          .object({
            tag: z.string().nullish(),
            httpStatusCode: z.number().nullish(),
          })
          .nullish(),
      }),
    )
    .nullish(),
});

const exaErrorBodySchema = z.object({ error: z.string() });

export const DEFAULT_EXA_ENDPOINT = "https://api.exa.ai";
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_RETRY_AFTER_MS = 60_000;

export interface ExaSearchAdapterOptions {
  readonly baseUrl?: string;
  readonly timeoutMs?: number;
}

/**
 * Adapter for the Exa search API
 */
export class ExaSearchAdapter implements SearchRepository {
  readonly id = "exa";
  readonly name = "Exa Search";

  private readonly baseUrl: string;
  private readonly timeoutMs: number;

  constructor(
    private readonly apiKey: string,
    options: ExaSearchAdapterOptions = {},
  ) {
    this.baseUrl = options.baseUrl ?? DEFAULT_EXA_ENDPOINT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  getId(): string {
    return this.id;
  }

  getName(): string {
    return this.name;
  }

  async search(query: QueryParams): Promise<Result<SearchResponse, SearchError>> {
    const params: ExaSearchParams = {
      query: query.q,
      numResults: query.maxResults,
    };

    if (query.type) params.type = query.type;
    if (query.useAutoprompt !== undefined) params.useAutoprompt = query.useAutoprompt;
    if (query.includeText) params.contents = { text: true };

    const filters = query.filters;
    if (filters?.includeDomains?.length) params.includeDomains = [...filters.includeDomains];
    if (filters?.excludeDomains?.length) params.excludeDomains = [...filters.excludeDomains];
    if (filters?.startPublishedDate) params.startPublishedDate = filters.startPublishedDate;
    if (filters?.endPublishedDate) params.endPublishedDate = filters.endPublishedDate;

    const startedAt = Date.now();
    return await this.post("/search", params, exaSearchResponseSchema)
      .map((data) => this.mapExaResponseToSearchResponse(data.results, query.q, startedAt));
  }

  async findSimilar(similar: SimilarParams): Promise<Result<SearchResponse, SearchError>> {
    const params: ExaFindSimilarParams = {
      url: similar.url,
      numResults: similar.maxResults,
    };

    if (similar.excludeSourceDomain) params.excludeSourceDomain = true;
    if (similar.includeText) params.contents = { text: true };

    const startedAt = Date.now();
    return await this.post("/findSimilar", params, exaSearchResponseSchema)
      .map((data) => this.mapExaResponseToSearchResponse(data.results, similar.url, startedAt));
  }

  async getContents(urls: ReadonlyArray<string>): Promise<Result<ContentsResponse, SearchError>> {
    const params: ExaContentsParams = {
      urls: [...urls],
      text: true,
    };

    return await this.post("/contents", params, exaContentsResponseSchema)
      .map((data) => {
        const failures: ContentFailure[] = (data.statuses ?? [])
          .filter((status) => status.status !== "success")
          .map((status) => ({
            url: status.id,
            reason: status.error?.tag ?? status.status,
          }));

        const contents: PageContent[] = data.results.map((result) => ({
          id: result.id ?? undefined,
          url: result.url,
          title: result.title ?? undefined,
          text: result.text ?? undefined,
          published: this.parseDate(result.publishedDate),
          author: result.author ?? undefined,
        }));

        return { contents, failures, source: this.id };
      });
  }

  private post<T>(
    path: string,
    body: object,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): ResultAsync<T, SearchError> {
    debug(`[EXA_ADAPTER] POST ${path}`);

    return ResultAsync.fromPromise(
      fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        headers: {
          "Accept": "application/json",
          "Content-Type": "application/json",
          "x-api-key": this.apiKey,
        },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      }),
      (e): SearchError => {
        if (e instanceof Error && (e.name === "TimeoutError" || e.name === "AbortError")) {
          return {
            type: "upstream",
            reason: "timeout",
            message: `Exa API request timed out after ${this.timeoutMs}ms`,
          };
        }

        return {
          type: "upstream",
          reason: "network",
          message: e instanceof Error ? e.message : "Unknown error",
        };
      },
    )
      .andThen((response) => this.checkResponse(response))
      .andThen((response) =>
        ResultAsync.fromPromise(
          response.json(),
          (): SearchError => ({
            type: "upstream",
            reason: "parse",
            message: "Failed to parse API response",
          }),
        )
      )
      .andThen((data) => {
        const parsed = schema.safeParse(data);
        if (!parsed.success) {
          return err<T, SearchError>({
            type: "upstream",
            reason: "parse",
            message: `Unexpected API response shape: ${parsed.error.issues[0]?.message ?? "unknown"}`,
          });
        }
        return ok<T, SearchError>(parsed.data);
      });
  }

  private checkResponse(response: Response): ResultAsync<Response, SearchError> {
    if (response.ok) {
      return okAsync<Response, SearchError>(response);
    }

    return ResultAsync.fromSafePromise<string, SearchError>(response.text().catch(() => ""))
      .andThen((errorBody) => {
        error(`[EXA_ADAPTER] ${response.status} Error response: ${errorBody}`);
        return err<Response, SearchError>(this.mapErrorResponse(response, errorBody));
      });
  }

  private mapErrorResponse(response: Response, errorBody: string): SearchError {
    const detail = this.extractErrorMessage(errorBody);

    if (response.status === 400 || response.status === 422) {
      const message = detail ? `API rejected the request: ${detail}` : "API rejected the request";
      return { type: "invalidArgument", message, issues: [message] };
    }

    if (response.status === 401 || response.status === 403) {
      return {
        type: "upstream",
        reason: "authorization",
        message: `API Key authentication error: ${response.status}`,
        status: response.status,
      };
    }

    if (response.status === 429) {
      const retryAfter = Number.parseInt(response.headers.get("retry-after") ?? "", 10);
      return {
        type: "upstream",
        reason: "rateLimit",
        message: "Rate limit exceeded",
        status: response.status,
        retryAfterMs: Number.isNaN(retryAfter) ? DEFAULT_RETRY_AFTER_MS : retryAfter * 1000,
      };
    }

    return {
      type: "upstream",
      reason: "http",
      message: detail
        ? `API call error: ${response.status} ${detail}`
        : `API call error: ${response.status}`,
      status: response.status,
    };
  }

  private extractErrorMessage(errorBody: string): string | undefined {
    const trimmed = errorBody.trim();
    if (!trimmed) {
      return undefined;
    }

    const json = fromThrowable(
      (): unknown => JSON.parse(trimmed),
      () => undefined,
    )();
    if (json.isOk()) {
      const parsed = exaErrorBodySchema.safeParse(json.value);
      if (parsed.success) {
        return parsed.data.error;
      }
    }

    return trimmed.slice(0, 200);
  }

  private mapExaResponseToSearchResponse(
    results: ReadonlyArray<ExaResult>,
    query: string,
    startedAt: number,
  ): SearchResponse {
    const mapped: SearchResult[] = results.map((result) => ({
      id: result.id ?? result.url,
      title: result.title?.trim() ?? "",
      url: result.url,
      snippet: result.text?.trim() || undefined,
      published: this.parseDate(result.publishedDate),
      author: result.author ?? undefined,
      relevanceScore: result.score ?? undefined,
    }));

    return {
      query,
      results: mapped,
      totalResults: mapped.length,
      searchTime: Date.now() - startedAt,
      source: this.id,
    };
  }

  private parseDate(value: string | null | undefined): Date | undefined {
    if (!value) return undefined;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? undefined : date;
  }
}

import { type Context, Hono } from "hono";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { err, ok, type Result, ResultAsync } from "neverthrow";
import type { z } from "zod";
import type { SearchUseCase } from "../../../application/ports/in/SearchUseCase.ts";
import type {
  ContentsRequest,
  ExampleSearchRequest,
  FindSimilarRequest,
  McpSuccessResponse,
  RecentSearchRequest,
  SearchRequest,
} from "../../../domain/models/mcp.ts";
import {
  type ContentsResponse,
  type SearchError,
  type SearchResponse,
  toDomainError,
} from "../../../domain/models/search.ts";
import { type DomainError, getErrorStatusCode } from "../../../domain/models/errors.ts";
import { domainErrorToResponse } from "../http/errors.ts";
import {
  describeSearchError,
  EXAMPLE_PREVIEW_LIMIT,
  formatPageContents,
  formatSearchResults,
  toMcpContent,
  toMcpResult,
  truncate,
} from "./formatters.ts";
import {
  describeTool,
  type ExtractPageContentInput,
  extractPageContentSchema,
  extractPageContentShape,
  type FindSimilarPagesInput,
  findSimilarPagesSchema,
  findSimilarPagesShape,
  type SearchByExampleTextInput,
  searchByExampleTextSchema,
  searchByExampleTextShape,
  type SearchRecentContentInput,
  searchRecentContentSchema,
  searchRecentContentShape,
  type SearchWebSemanticInput,
  searchWebSemanticSchema,
  searchWebSemanticShape,
  toolCatalog,
  TOOL_NAMES,
  type ToolName,
} from "./tools.ts";
import { error, info } from "../../../config/logger.ts";

type ToolPayload = Omit<McpSuccessResponse, "status" | "tool">;

type ControllerError =
  | { kind: "request"; error: DomainError }
  | { kind: "search"; error: SearchError };

/**
 * Controller exposing the search use case as MCP tools and as HTTP endpoints
 */
export class McpController {
  constructor(private readonly searchUseCase: SearchUseCase) {}

  /**
   * Register every tool with the MCP server
   */
  registerTools(server: McpServer): void {
    this.registerSearchTool(server);
    this.registerContentsTool(server);
    this.registerSimilarTool(server);
    this.registerRecentTool(server);
    this.registerExampleTool(server);
  }

  registerSearchTool(server: McpServer): void {
    server.tool(
      TOOL_NAMES.search,
      describeTool(TOOL_NAMES.search),
      searchWebSemanticShape,
      async (params) => {
        info(`MCP ${TOOL_NAMES.search} request: ${params.query}`);
        const result = await this.searchUseCase.search(toSearchRequest(params));
        return this.toToolResult(TOOL_NAMES.search, result, (response) =>
          formatSearchResults(response.results, {
            heading: `Semantic search results for: '${response.query}'`,
            scoreLabel: "Relevance",
            emptyMessage:
              `No results found for query: '${params.query}'. Try a different search term or broader query.`,
          }));
      },
    );
  }

  registerContentsTool(server: McpServer): void {
    server.tool(
      TOOL_NAMES.contents,
      describeTool(TOOL_NAMES.contents),
      extractPageContentShape,
      async (params) => {
        const request = toContentsRequest(params);
        info(`MCP ${TOOL_NAMES.contents} request: ${request.urls.join(", ")}`);
        const result = await this.searchUseCase.getContents(request);
        return this.toToolResult(
          TOOL_NAMES.contents,
          result,
          (response) => formatPageContents(response.contents),
        );
      },
    );
  }

  registerSimilarTool(server: McpServer): void {
    server.tool(
      TOOL_NAMES.similar,
      describeTool(TOOL_NAMES.similar),
      findSimilarPagesShape,
      async (params) => {
        info(`MCP ${TOOL_NAMES.similar} request: ${params.url}`);
        const result = await this.searchUseCase.findSimilar(toFindSimilarRequest(params));
        return this.toToolResult(TOOL_NAMES.similar, result, (response) =>
          formatSearchResults(response.results, {
            heading: `Pages similar to: ${params.url}`,
            scoreLabel: "Similarity",
            emptyMessage:
              `No similar pages found for: ${params.url}. Try a different URL or check if the URL is accessible.`,
          }));
      },
    );
  }

  registerRecentTool(server: McpServer): void {
    server.tool(
      TOOL_NAMES.recent,
      describeTool(TOOL_NAMES.recent),
      searchRecentContentShape,
      async (params) => {
        const request = toRecentSearchRequest(params);
        const days = request.daysBack ?? 7;
        info(`MCP ${TOOL_NAMES.recent} request: ${params.query} (${days} days back)`);
        const result = await this.searchUseCase.searchRecent(request);
        return this.toToolResult(TOOL_NAMES.recent, result, (response) =>
          formatSearchResults(response.results, {
            heading: `Recent content for: '${response.query}' (last ${days} days)`,
            scoreLabel: "Relevance",
            emptyMessage:
              `No recent content found for '${params.query}' in the last ${days} days. Try a broader query or increase the time range.`,
          }));
      },
    );
  }

  registerExampleTool(server: McpServer): void {
    server.tool(
      TOOL_NAMES.example,
      describeTool(TOOL_NAMES.example),
      searchByExampleTextShape,
      async (params) => {
        info(`MCP ${TOOL_NAMES.example} request (length: ${params.text.length} chars)`);
        const result = await this.searchUseCase.searchByExample(toExampleSearchRequest(params));
        return this.toToolResult(TOOL_NAMES.example, result, (response) =>
          formatSearchResults(response.results, {
            heading: `Content similar to example text:\n\nExample: ${
              truncate(params.text.trim(), EXAMPLE_PREVIEW_LIMIT)
            }`,
            scoreLabel: "Similarity",
            emptyMessage:
              "No similar content found for the provided text sample. Try a longer or more specific text example.",
          }));
      },
    );
  }

  private toToolResult<T>(
    tool: ToolName,
    result: Result<T, SearchError>,
    format: (value: T) => string,
  ): CallToolResult {
    return result.match(
      (value): CallToolResult => ({
        content: [{ type: "text", text: format(value) }],
      }),
      (searchError): CallToolResult => {
        error(`[MCP_CONTROLLER] ${tool} failed: ${JSON.stringify(searchError)}`);
        return {
          content: [{ type: "text", text: describeSearchError(searchError) }],
          isError: true,
        };
      },
    );
  }

  createRouter(): Hono {
    const router = new Hono();

    router.get("/tools", (c) => c.json({ tools: toolCatalog }));

    router.post(
      `/tools/${TOOL_NAMES.search}`,
      (c) =>
        this.handleToolRequest(c, TOOL_NAMES.search, searchWebSemanticSchema, async (input) =>
          (await this.searchUseCase.search(toSearchRequest(input))).map(toResultsPayload)),
    );

    router.post(
      `/tools/${TOOL_NAMES.contents}`,
      (c) =>
        this.handleToolRequest(c, TOOL_NAMES.contents, extractPageContentSchema, async (input) =>
          (await this.searchUseCase.getContents(toContentsRequest(input))).map(toContentsPayload)),
    );

    router.post(
      `/tools/${TOOL_NAMES.similar}`,
      (c) =>
        this.handleToolRequest(c, TOOL_NAMES.similar, findSimilarPagesSchema, async (input) =>
          (await this.searchUseCase.findSimilar(toFindSimilarRequest(input))).map(toResultsPayload)),
    );

    router.post(
      `/tools/${TOOL_NAMES.recent}`,
      (c) =>
        this.handleToolRequest(c, TOOL_NAMES.recent, searchRecentContentSchema, async (input) =>
          (await this.searchUseCase.searchRecent(toRecentSearchRequest(input))).map(
            toResultsPayload,
          )),
    );

    router.post(
      `/tools/${TOOL_NAMES.example}`,
      (c) =>
        this.handleToolRequest(c, TOOL_NAMES.example, searchByExampleTextSchema, async (input) =>
          (await this.searchUseCase.searchByExample(toExampleSearchRequest(input))).map(
            toResultsPayload,
          )),
    );

    return router;
  }

  private async handleToolRequest<T>(
    c: Context,
    tool: ToolName,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    run: (input: T) => Promise<Result<ToolPayload, SearchError>>,
  ): Promise<Response> {
    const result = await this.parseRequestBody(c)
      .andThen((data) => this.validateRequest(schema, data))
      .andThen((input) =>
        ResultAsync.fromSafePromise<Result<ToolPayload, SearchError>, ControllerError>(run(input))
          .andThen((searchResult) =>
            searchResult.mapErr((searchError): ControllerError => ({
              kind: "search",
              error: searchError,
            }))
          )
      );

    return result.match(
      (payload) => {
        info(`[MCP_CONTROLLER] ${tool} succeeded via HTTP`);
        const body: McpSuccessResponse = { status: "success", tool, ...payload };
        return c.json(body);
      },
      (failure) => {
        const domainError = failure.kind === "search" ? toDomainError(failure.error) : failure.error;
        error(`[MCP_CONTROLLER] ${tool} failed: ${domainError.type} - ${domainError.message}`);
        return c.json(domainErrorToResponse(domainError), getErrorStatusCode(domainError));
      },
    );
  }

  private parseRequestBody(c: Context): ResultAsync<unknown, ControllerError> {
    return ResultAsync.fromPromise(
      c.req.json<unknown>(),
      (parseError): ControllerError => ({
        kind: "request",
        error: {
          type: "parse",
          message: parseError instanceof Error ? parseError.message : "Invalid JSON body",
        },
      }),
    );
  }

  private validateRequest<T>(
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    data: unknown,
  ): Result<T, ControllerError> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      return err<T, ControllerError>({
        kind: "request",
        error: {
          type: "validation",
          message: "Validation error",
          details: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
        },
      });
    }
    return ok<T, ControllerError>(parsed.data);
  }
}

function toResultsPayload(response: SearchResponse): ToolPayload {
  return {
    results: response.results.map(toMcpResult),
    source: response.source,
  };
}

function toContentsPayload(response: ContentsResponse): ToolPayload {
  return {
    contents: response.contents.map(toMcpContent),
    source: response.source,
  };
}

function toSearchRequest(input: SearchWebSemanticInput): SearchRequest {
  return {
    query: input.query,
    numResults: input.num_results,
    includeDomains: input.include_domains,
    excludeDomains: input.exclude_domains,
    startPublishedDate: input.start_published_date,
    endPublishedDate: input.end_published_date,
    includeText: input.include_text,
  };
}

function toContentsRequest(input: ExtractPageContentInput): ContentsRequest {
  return {
    urls: [...(input.url ? [input.url] : []), ...(input.urls ?? [])],
  };
}

function toFindSimilarRequest(input: FindSimilarPagesInput): FindSimilarRequest {
  return {
    url: input.url,
    numResults: input.num_results,
    includeText: input.include_text,
    excludeSourceDomain: input.exclude_source_domain,
  };
}

function toRecentSearchRequest(input: SearchRecentContentInput): RecentSearchRequest {
  return {
    query: input.query,
    daysBack: input.days_back,
    numResults: input.num_results,
    includeText: input.include_text,
  };
}

function toExampleSearchRequest(input: SearchByExampleTextInput): ExampleSearchRequest {
  return {
    text: input.text,
    numResults: input.num_results,
    includeText: input.include_text,
  };
}

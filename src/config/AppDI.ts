import type { Hono } from "hono";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import { err, ok, type Result } from "neverthrow";
import type { SearchUseCase } from "../application/ports/in/SearchUseCase.ts";
import type { SearchRepository } from "../application/ports/out/SearchRepository.ts";
import { SearchService } from "../application/services/SearchService.ts";
import { ConnectionCheckService } from "../application/services/ConnectionCheckService.ts";
import { McpController } from "../adapters/in/mcp/McpController.ts";
import type { AdapterContainer } from "./adapters.ts";
import { SERVER_INFO } from "./env.ts";
import { debug, error, info } from "./logger.ts";

export type DIError =
  | { type: "already_initialized"; message: string }
  | { type: "not_initialized"; message: string };

/**
 * Dependency Injection container for the application
 */
export class AppDI {
  private searchRepository?: SearchRepository;
  private searchService?: SearchService;
  private connectionCheckService?: ConnectionCheckService;
  private mcpController?: McpController;

  constructor(private readonly now: () => Date = () => new Date()) {}

  /**
   * Initialize the DI container with adapters
   */
  initialize(adapterContainer: AdapterContainer): Result<this, DIError> {
    if (this.searchRepository) {
      return err<this, DIError>({
        type: "already_initialized",
        message: "AppDI already initialized",
      });
    }

    this.searchRepository = adapterContainer.search;
    return ok(this);
  }

  /**
   * Check if the DI container has been initialized
   */
  isInitialized(): boolean {
    return this.searchRepository !== undefined;
  }

  private getSearchRepository(): Result<SearchRepository, DIError> {
    if (!this.searchRepository) {
      return err<SearchRepository, DIError>({
        type: "not_initialized",
        message: "DI container not initialized. Call initialize() first.",
      });
    }
    return ok(this.searchRepository);
  }

  getSearchService(): Result<SearchUseCase, DIError> {
    return this.getSearchRepository().map((repository) => {
      if (!this.searchService) {
        this.searchService = new SearchService(repository, this.now);
      }
      return this.searchService;
    });
  }

  getConnectionCheckService(): Result<ConnectionCheckService, DIError> {
    return this.getSearchRepository().map((repository) => {
      if (!this.connectionCheckService) {
        this.connectionCheckService = new ConnectionCheckService(repository);
      }
      return this.connectionCheckService;
    });
  }

  getMcpController(): Result<McpController, DIError> {
    return this.getSearchService().map((searchService) => {
      if (!this.mcpController) {
        this.mcpController = new McpController(searchService);
      }
      return this.mcpController;
    });
  }

  getMcpRouter(): Result<Hono, DIError> {
    return this.getMcpController().map((controller) => controller.createRouter());
  }

  createMcpServer(): Result<McpServer, DIError> {
    return this.getMcpController().map((controller) => {
      const server = new McpServer({
        name: SERVER_INFO.name,
        version: SERVER_INFO.version,
      });

      controller.registerTools(server);
      info("MCP server configured with search tools");
      return server;
    });
  }

  async startMcpServer(
    transport: Transport = new StdioServerTransport(),
  ): Promise<Result<McpServer, DIError | Error>> {
    info("Starting MCP server...");

    const serverResult = this.createMcpServer();
    if (serverResult.isErr()) {
      return err(serverResult.error);
    }

    const server = serverResult.value;
    const result = await this.connectToTransport(server, transport);

    if (result.isOk()) {
      info("MCP server connected");
      return ok(server);
    }

    error(`Failed to start MCP server: ${result.error.message}`);
    return err(result.error);
  }

  private async connectToTransport(
    server: McpServer,
    transport: Transport,
  ): Promise<Result<void, Error>> {
    return await server.connect(transport)
      .then(() => {
        debug("MCP server transport connected");
        return ok<void, Error>(undefined);
      })
      .catch((transportError: unknown) => {
        const errorMessage = transportError instanceof Error
          ? transportError.message
          : String(transportError);
        error(`MCP server transport connection failed: ${errorMessage}`);
        return err<void, Error>(
          transportError instanceof Error ? transportError : new Error(String(transportError)),
        );
      });
  }
}

#!/usr/bin/env -S npx tsx

/**
 * exa-semantic-mcp command line interface
 *
 * Launches the MCP server over standard I/O.
 * Available for use from MCP clients such as Claude Desktop.
 */

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { errAsync, type Result, ResultAsync } from "neverthrow";
import { describeSetupError, setupDependencyInjection } from "./src/config/bootstrap.ts";
import type { DIError } from "./src/config/AppDI.ts";
import { TOOL_NAMES } from "./src/adapters/in/mcp/tools.ts";
import { error, info } from "./src/config/logger.ts";

type CliError =
  | { type: "setup"; message: string }
  | { type: "server"; message: string };

function describeServerError(serverError: DIError | Error): string {
  return serverError instanceof Error
    ? `Server error: ${serverError.message}`
    : `DI error: ${serverError.type} - ${serverError.message}`;
}

/**
 * Start the MCP server
 */
function startServer(): ResultAsync<void, CliError> {
  const setupResult = setupDependencyInjection(process.env);

  if (setupResult.isErr()) {
    return errAsync<void, CliError>({ type: "setup", message: describeSetupError(setupResult.error) });
  }

  const { di } = setupResult.value;
  info("Starting exa-semantic-mcp server...");
  info(`Tools: ${Object.values(TOOL_NAMES).join(", ")}`);

  return ResultAsync.fromSafePromise<Result<McpServer, DIError | Error>, CliError>(
    di.startMcpServer(),
  ).andThen((result) =>
    result
      .map(() => undefined)
      .mapErr((serverError): CliError => ({
        type: "server",
        message: describeServerError(serverError),
      }))
  );
}

const result = await startServer();

result.match(
  () => {
    // The stdio transport keeps the process alive
  },
  (cliError) => {
    error(`Fatal error (${cliError.type}): ${cliError.message}`);
    process.exit(1);
  },
);

import { serve } from "@hono/node-server";
import { describeSetupError, setupDependencyInjection } from "./src/config/bootstrap.ts";
import { createHttpApp } from "./src/adapters/in/http/app.ts";
import { error, info } from "./src/config/logger.ts";

/**
 * Main entry point for the HTTP server
 */
function main(): void {
  const setupResult = setupDependencyInjection(process.env);
  if (setupResult.isErr()) {
    error(`Failed to start: ${describeSetupError(setupResult.error)}`);
    process.exit(1);
  }

  const { config, di } = setupResult.value;

  const routerResult = di.getMcpRouter();
  if (routerResult.isErr()) {
    error(`Failed to get MCP router: ${routerResult.error.message}`);
    process.exit(1);
  }

  const app = createHttpApp(routerResult.value);

  serve({ fetch: app.fetch, port: config.port }, (address) => {
    info(`Server running on http://localhost:${address.port}`);
  });
}

main();

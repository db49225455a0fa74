import { Hono } from "hono";
import { logger } from "hono/logger";
import { secureHeaders } from "hono/secure-headers";
import { createErrorResponse, domainErrorToResponse } from "./errors.ts";
import { type DomainError, getErrorStatusCode } from "../../../domain/models/errors.ts";
import { SERVER_INFO } from "../../../config/env.ts";
import { error, info } from "../../../config/logger.ts";

/**
 * HTTP application wrapping the MCP router
 */
export function createHttpApp(mcpRouter: Hono): Hono {
  const app = new Hono();
  app.use(logger((message) => info(message)));
  app.use(secureHeaders());

  app.get("/", (c) => {
    return c.json({
      name: SERVER_INFO.name,
      status: "running",
      version: SERVER_INFO.version,
    });
  });

  app.route("/mcp", mcpRouter);

  app.notFound((c) => {
    return c.json(createErrorResponse("Not Found"), 404);
  });

  app.onError((err, c) => {
    error(`Error: ${err}`);
    const serverError: DomainError = {
      type: "server",
      message: err.message || "Internal Server Error",
    };
    return c.json(domainErrorToResponse(serverError), getErrorStatusCode(serverError));
  });

  return app;
}

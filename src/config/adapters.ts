import { ExaSearchAdapter } from "../adapters/out/search/ExaSearchAdapter.ts";
import type { SearchRepository } from "../application/ports/out/SearchRepository.ts";
import type { AppConfig } from "./env.ts";
import { info } from "./logger.ts";

/**
 * Type definition representing the adapter container.
 */
export interface AdapterContainer {
  search: SearchRepository;
}

/**
 * Builds the outbound adapters from the loaded configuration.
 * The credential is handed to the adapter here and nowhere else.
 */
export function initializeAdapters(config: AppConfig): AdapterContainer {
  const exaAdapter = new ExaSearchAdapter(config.exaApiKey, {
    baseUrl: config.exaBaseUrl,
    timeoutMs: config.requestTimeoutMs,
  });
  info(`Registered ${exaAdapter.getName()} (${config.exaBaseUrl})`);

  return {
    search: exaAdapter,
  };
}

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

export const SERVER_INFO = {
  name: "exa-semantic-mcp",
  version: "0.1.0",
} as const;

/**
 * Process-wide configuration, read once at startup
 */
export interface AppConfig {
  readonly exaApiKey: string;
  readonly exaBaseUrl: string;
  readonly requestTimeoutMs: number;
  readonly port: number;
}

export type ConfigurationError = {
  type: "configuration";
  message: string;
  issues: string[];
};

const envSchema = z.object({
  EXA_API_KEY: z
    .string({
      required_error: "EXA_API_KEY environment variable is required. Get your key from https://exa.ai/",
    })
    .trim()
    .min(1, "EXA_API_KEY must not be empty"),
  EXA_API_BASE_URL: z.string().url().default("https://api.exa.ai"),
  EXA_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  PORT: z.coerce.number().int().min(1).max(65535).default(8088),
});

/**
 * Load configuration from environment variables
 * @returns the validated configuration, or a ConfigurationError listing every problem
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): Result<AppConfig, ConfigurationError> {
  const parsed = envSchema.safeParse(env);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    return err<AppConfig, ConfigurationError>({
      type: "configuration",
      message: "Invalid environment configuration",
      issues,
    });
  }

  return ok({
    exaApiKey: parsed.data.EXA_API_KEY,
    exaBaseUrl: parsed.data.EXA_API_BASE_URL.replace(/\/+$/, ""),
    requestTimeoutMs: parsed.data.EXA_TIMEOUT_MS,
    port: parsed.data.PORT,
  });
}

import { err, ok, type Result } from "neverthrow";
import { AppDI, type DIError } from "./AppDI.ts";
import { initializeAdapters } from "./adapters.ts";
import { type AppConfig, type ConfigurationError, loadConfig } from "./env.ts";

export type SetupError =
  | ConfigurationError
  | { type: "di"; error: DIError };

export interface Application {
  readonly config: AppConfig;
  readonly di: AppDI;
}

/**
 * Load configuration, build the adapters and the DI container.
 * Fails with a ConfigurationError before any adapter or tool exists.
 */
export function setupDependencyInjection(
  env: Record<string, string | undefined> = process.env,
): Result<Application, SetupError> {
  const configResult = loadConfig(env);
  if (configResult.isErr()) {
    return err(configResult.error);
  }

  const config = configResult.value;
  const diResult = new AppDI().initialize(initializeAdapters(config));
  if (diResult.isErr()) {
    return err<Application, SetupError>({ type: "di", error: diResult.error });
  }

  return ok({ config, di: diResult.value });
}

export function describeSetupError(error: SetupError): string {
  switch (error.type) {
    case "configuration":
      return `${error.message}: ${error.issues.join("; ")}`;
    case "di":
      return `DI error: ${error.error.type} - ${error.error.message}`;
  }
}

/**
 * Connectivity check
 *
 * Validates the Exa credential and every provider endpoint before the MCP server is started.
 * Exits 0 when every critical check passes.
 */

import { describeSetupError, setupDependencyInjection } from "./src/config/bootstrap.ts";
import type { ConnectionReport } from "./src/application/services/ConnectionCheckService.ts";
import { error, info, warn } from "./src/config/logger.ts";

function printReport(report: ConnectionReport): void {
  for (const outcome of report.outcomes) {
    const line = `${outcome.passed ? "PASS" : outcome.critical ? "FAIL" : "WARN"} ${outcome.name}: ${outcome.detail}`;
    if (outcome.passed) {
      info(line);
    } else if (outcome.critical) {
      error(line);
    } else {
      warn(line);
    }
  }

  info(`Checks passed: ${report.passed}/${report.outcomes.length}`);
  info(`Critical checks passed: ${report.criticalPassed}/${report.criticalTotal}`);
}

async function main(): Promise<number> {
  info("Environment setup...");
  const setupResult = setupDependencyInjection(process.env);
  if (setupResult.isErr()) {
    error(`FAIL Environment setup: ${describeSetupError(setupResult.error)}`);
    error("Set EXA_API_KEY (get a key from https://exa.ai/) and run this check again.");
    return 1;
  }
  info("PASS Environment setup: EXA_API_KEY found");

  const checkResult = setupResult.value.di.getConnectionCheckService();
  if (checkResult.isErr()) {
    error(`FAIL ${checkResult.error.message}`);
    return 1;
  }

  const report = await checkResult.value.run();
  printReport(report);

  if (!report.success) {
    error(`${report.criticalTotal - report.criticalPassed} critical check(s) failed.`);
    return 1;
  }

  info("Exa API is reachable. Start the server with `npm start`.");
  return 0;
}

process.exitCode = await main();

/**
 * Stats command - routing statistics from the route log
 */

import { RouteLogWriter } from "../../llm/RouteLogWriter.js";
import { summarizeRouteLogs } from "../../llm/LlmRouter.js";
import { loadCliContext } from "../utils/context.js";
import { printData, printHeader, printInfo } from "../utils/output.js";
import type { CliOptions } from "../types.js";

export async function statsCommand(options: CliOptions): Promise<void> {
  const context = loadCliContext(options);
  const writer = new RouteLogWriter(context.config.storage.routerLogPath);
  const stats = summarizeRouteLogs(await writer.readAll());

  if (options.json) {
    printData(stats, true);
    return;
  }

  printHeader("Routing Statistics");
  if (stats.totalRequests === 0) {
    printInfo(`No requests logged in ${writer.getFilePath()}`);
    return;
  }
  printData({
    totalRequests: stats.totalRequests,
    successfulRequests: stats.successfulRequests,
    failedRequests: stats.failedRequests,
    averageDurationMs: Math.round(stats.averageDurationMs),
    totalCostCents: stats.totalCostCents,
  });
  printData(Object.entries(stats.providerUsage).map(([provider, requests]) => ({ provider, requests })));
}

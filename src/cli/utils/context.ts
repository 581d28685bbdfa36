/**
 * Shared setup for every command: config, logger and the router built from them.
 */

import { ensureStorageDirectories, loadConfig } from "../../config/index.js";
import { LlmRouter } from "../../llm/LlmRouter.js";
import { createLogger } from "../../utils/logger.js";
import type { CliContext, CliOptions } from "../types.js";

export function loadCliContext(options: CliOptions): CliContext {
  const config = loadConfig(options.config);
  ensureStorageDirectories(config);
  const logger = createLogger(config);
  logger.debug("Configuration loaded", { offlineMode: config.llm.offlineMode }, "config");
  return { config, logger, options };
}

export function createRouter(context: CliContext): LlmRouter {
  return new LlmRouter(context.config.llm, {
    logDirectory: context.config.storage.routerLogPath,
    logger: context.logger,
  });
}

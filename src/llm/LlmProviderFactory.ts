// LLM Provider Factory

import type { ActiveProviderName, LlmConfig, ProviderConfig } from "../types/index.js";
import type { LlmProvider } from "./types.js";
import { ClaudeProvider, OpenRouterProvider, type ChatCompletionsClient } from "./providers/index.js";
import type { Logger } from "../utils/logger.js";
import { createLogger } from "../utils/logger.js";

export interface ProviderFactoryDeps {
  logger?: Logger;
  /** Injected OpenAI-compatible client for the OpenRouter adapter */
  openRouterClient?: ChatCompletionsClient;
}

export class LlmProviderFactory {
  /**
   * Build one adapter for a configured provider.
   */
  static create(name: ActiveProviderName, config: ProviderConfig, deps: ProviderFactoryDeps = {}): LlmProvider {
    switch (name) {
      case "claude":
        return new ClaudeProvider(config, deps.logger);
      case "openrouter":
        return new OpenRouterProvider(config, { client: deps.openRouterClient, logger: deps.logger });
    }
  }

  /**
   * Build every provider present in the configuration, available or not.
   */
  static createAll(config: LlmConfig, deps: ProviderFactoryDeps = {}): Map<ActiveProviderName, LlmProvider> {
    const logger = deps.logger ?? createLogger();
    const providers = new Map<ActiveProviderName, LlmProvider>();

    for (const name of ["claude", "openrouter"] as const) {
      const providerConfig = config.providers[name];
      if (!providerConfig) {
        continue;
      }
      const provider = LlmProviderFactory.create(name, providerConfig, { ...deps, logger });
      providers.set(name, provider);
      logger.debug("Created LLM provider", { provider: name, model: providerConfig.model, available: provider.isAvailable() }, "router");
    }

    return providers;
  }
}

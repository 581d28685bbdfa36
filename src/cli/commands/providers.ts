/**
 * Providers command - configured backends and whether they can be used
 */

import { LlmProviderFactory } from "../../llm/LlmProviderFactory.js";
import { maskApiKey } from "../../config/index.js";
import { loadCliContext } from "../utils/context.js";
import { printData, printHeader, printInfo, printWarning } from "../utils/output.js";
import type { CliOptions, ProviderStatusRow } from "../types.js";

export async function providersCommand(options: CliOptions): Promise<void> {
  const context = loadCliContext(options);
  const { llm } = context.config;
  const providers = LlmProviderFactory.createAll(llm, { logger: context.logger });

  const rows: ProviderStatusRow[] = [];
  for (const [name, provider] of providers) {
    const providerConfig = llm.providers[name];
    if (!providerConfig) continue;
    rows.push({
      provider: name,
      model: providerConfig.model,
      baseUrl: providerConfig.baseUrl,
      apiKey: maskApiKey(providerConfig.apiKey),
      available: provider.isAvailable(),
      default: name === llm.defaultProvider,
    });
  }

  if (options.json) {
    printData({ offlineMode: llm.offlineMode, providers: rows }, true);
    return;
  }

  printHeader("LLM Providers");
  printData(rows);
  if (llm.offlineMode) {
    printInfo("Offline mode is on: requests will not reach any provider");
  } else if (!rows.some((row) => row.available)) {
    printWarning("No provider is available; set ANTHROPIC_API_KEY or OPENROUTER_API_KEY");
  }
}

// Base LLM Provider

import type { ActiveProviderName, LlmRequest, LlmResponse, ProviderConfig, TokenUsage } from "../../types/index.js";
import type { LlmProvider, ProviderRates } from "../types.js";
import type { LayerLogger, Logger } from "../../utils/logger.js";
import { createLogger } from "../../utils/logger.js";

export const DEFAULT_TEMPERATURE = 0.7;

/**
 * Whether an API key looks usable: set, and not an unexpanded `${VAR}`
 * placeholder.
 */
export function isUsableApiKey(apiKey: string): boolean {
  return apiKey.length > 0 && !apiKey.startsWith("$");
}

export abstract class BaseLlmProvider implements LlmProvider {
  protected config: ProviderConfig;
  protected logger: LayerLogger;

  constructor(config: ProviderConfig, logger?: Logger) {
    this.config = config;
    this.logger = (logger ?? createLogger()).forLayer("provider");
  }

  abstract providerName(): ActiveProviderName;
  abstract generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse>;
  protected abstract readonly rates: ProviderRates;

  isAvailable(): boolean {
    return isUsableApiKey(this.config.apiKey);
  }

  /**
   * Estimated cost in cents, rounded to 1/100 of a cent.
   */
  estimateCost(usage: TokenUsage): number {
    const cents =
      usage.promptTokens * this.rates.promptCentsPerToken +
      usage.completionTokens * this.rates.completionCentsPerToken;
    return Math.round(cents * 100) / 100;
  }

  protected resolveTemperature(request: LlmRequest): number {
    return request.temperature ?? DEFAULT_TEMPERATURE;
  }

  protected resolveMaxTokens(request: LlmRequest): number {
    return request.maxTokens ?? this.config.maxTokens;
  }

  /**
   * Combine the caller's signal with the per-request timeout.
   */
  protected createRequestSignal(signal?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(new Error(`Request timed out after ${this.config.timeoutMs}ms`)), this.config.timeoutMs);
    const onAbort = (): void => controller.abort(signal?.reason);

    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener("abort", onAbort, { once: true });
    }

    return {
      signal: controller.signal,
      dispose: () => {
        clearTimeout(timeoutId);
        signal?.removeEventListener("abort", onAbort);
      },
    };
  }
}

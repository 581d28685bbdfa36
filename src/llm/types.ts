// LLM Provider Types

import type { ActiveProviderName, LlmRequest, LlmResponse } from "../types/index.js";

/**
 * Contract every backend adapter fulfils. Adapters never retry on their own;
 * retry and fallback belong to the router.
 */
export interface LlmProvider {
  providerName(): ActiveProviderName;
  /** Local check only, no network */
  isAvailable(): boolean;
  generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse>;
}

/**
 * Per-token prices in US cents.
 */
export interface ProviderRates {
  promptCentsPerToken: number;
  completionCentsPerToken: number;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

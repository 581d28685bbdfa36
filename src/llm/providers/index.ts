// LLM Provider exports

export { BaseLlmProvider, DEFAULT_TEMPERATURE, isUsableApiKey } from "./BaseLlmProvider.js";
export { ClaudeProvider, ANTHROPIC_VERSION, mapClaudeRole } from "./ClaudeProvider.js";
export { OpenRouterProvider, isRateLimitError, type ChatCompletionsClient } from "./OpenRouterProvider.js";

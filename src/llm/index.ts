// Provider router entry point

export { LlmRouter, summarizeRouteLogs, type LlmRouterDeps } from "./LlmRouter.js";
export { LlmProviderFactory, type ProviderFactoryDeps } from "./LlmProviderFactory.js";
export { RetryPolicy, defaultSleep, type RetryPolicyConfig, type SleepFn } from "./RetryPolicy.js";
export { RouteLogWriter, ROUTE_LOG_FILE } from "./RouteLogWriter.js";
export * from "./errors.js";
export * from "./providers/index.js";
export type { GenerateOptions, LlmProvider, ProviderRates } from "./types.js";

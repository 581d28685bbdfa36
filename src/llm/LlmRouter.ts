/**
 * LlmRouter
 *
 * Picks a provider per task type, falls back to the other configured
 * providers when the primary fails, and writes exactly one RouteLog line
 * per `generate` call whatever the outcome.
 *
 * Flow:
 *   offline?            -> OfflineModeError (logged, no adapter touched)
 *   primary attempt     -> success logs retryCount 0
 *   rounds 1..maxRetries, every other available adapter
 *                       -> success logs retryCount = round
 *                       -> failure sleeps baseDelayMs * 2^(round-1), except after the last attempt
 *   exhausted           -> MaxRetriesExceededError, finalProvider "offline"
 *
 * The whole call, backoff included, runs under the `timeoutMs` deadline.
 */

import type {
  ActiveProviderName,
  LlmConfig,
  LlmRequest,
  LlmResponse,
  ProviderName,
  RouteConfig,
  RouteLog,
  RoutingStats,
  TaskType,
} from "../types/index.js";
import type { GenerateOptions, LlmProvider } from "./types.js";
import { LlmProviderFactory } from "./LlmProviderFactory.js";
import { RetryPolicy, defaultSleep, type SleepFn } from "./RetryPolicy.js";
import { RouteLogWriter } from "./RouteLogWriter.js";
import { DEFAULT_TEMPERATURE } from "./providers/BaseLlmProvider.js";
import {
  MaxRetriesExceededError,
  OfflineModeError,
  ProviderNotAvailableError,
  RequestFailedError,
  describeError,
} from "./errors.js";
import { createLogger, runWithTraceAsync, type LayerLogger, type Logger } from "../utils/logger.js";

export interface LlmRouterDeps {
  /** Directory receiving log.jsonl */
  logDirectory: string;
  /** Prebuilt adapters; built from config when omitted */
  providers?: Map<ActiveProviderName, LlmProvider>;
  logger?: Logger;
  sleep?: SleepFn;
}

/**
 * Per-call signal: the caller's signal plus the `timeoutMs` deadline.
 */
interface Deadline {
  signal: AbortSignal;
  expired: () => boolean;
  dispose: () => void;
}

interface Outcome {
  attemptedProvider: ProviderName;
  finalProvider: ProviderName;
  success: boolean;
  errorMessage?: string;
  retryCount: number;
  response?: LlmResponse;
}

export class LlmRouter {
  private config: LlmConfig;
  private providers: Map<ActiveProviderName, LlmProvider>;
  private retryPolicy: RetryPolicy;
  private routeLog: RouteLogWriter;
  private sleep: SleepFn;
  private logger: LayerLogger;

  constructor(config: LlmConfig, deps: LlmRouterDeps) {
    this.config = { ...config };
    const logger = deps.logger ?? createLogger();
    this.logger = logger.forLayer("router");
    this.providers = deps.providers ?? LlmProviderFactory.createAll(config, { logger });
    this.retryPolicy = new RetryPolicy({ maxRetries: config.maxRetries, baseDelayMs: config.baseDelayMs, multiplier: 2 });
    this.routeLog = new RouteLogWriter(deps.logDirectory);
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /**
   * Route one request. Only the final failure reaches the caller.
   */
  async generate(request: LlmRequest, options: GenerateOptions = {}): Promise<LlmResponse> {
    const deadline = this.createDeadline(options.signal);
    try {
      return await runWithTraceAsync("router", () => this.route(request, deadline));
    } finally {
      deadline.dispose();
    }
  }

  private async route(request: LlmRequest, deadline: Deadline): Promise<LlmResponse> {
    const startTime = Date.now();
    const { signal } = deadline;
    const route = this.getRouteConfig(request.taskType);
    const primary = route.provider;

    if (this.config.offlineMode) {
      const error = new OfflineModeError();
      await this.writeLog(request, startTime, {
        attemptedProvider: primary,
        finalProvider: "offline",
        success: false,
        errorMessage: error.message,
        retryCount: 0,
      });
      throw error;
    }

    const routed: LlmRequest = { ...request, temperature: request.temperature ?? route.temperature };

    this.logger.debug("Routing request", { requestId: request.id, taskType: request.taskType, primary });

    let lastError: unknown;
    try {
      const response = await this.tryProvider(primary, routed, signal);
      await this.writeLog(request, startTime, {
        attemptedProvider: primary,
        finalProvider: primary,
        success: true,
        retryCount: 0,
        response,
      });
      return response;
    } catch (error) {
      this.logger.warn(`Primary provider ${primary} failed: ${describeError(error)}`, { requestId: request.id });
      lastError = error;
    }

    const rounds = this.retryPolicy.rounds();
    for (const round of rounds) {
      const fallbacks = Array.from(this.providers).filter(
        ([name, provider]) => name !== primary && provider.isAvailable()
      );
      for (const [index, [name, provider]] of fallbacks.entries()) {
        if (signal.aborted) {
          return this.abort(request, startTime, primary, round, deadline.expired());
        }

        try {
          const response = await provider.generate(routed, signal);
          await this.writeLog(request, startTime, {
            attemptedProvider: primary,
            finalProvider: name,
            success: true,
            retryCount: round,
            response,
          });
          return response;
        } catch (error) {
          lastError = error;
          const isLastAttempt = round === rounds.length && index === fallbacks.length - 1;
          const delayMs = isLastAttempt ? 0 : this.retryPolicy.delayForRound(round);
          this.logger.warn(`Fallback provider ${name} failed (round ${round}): ${describeError(error)}`, {
            requestId: request.id,
            delayMs,
          });
          if (!isLastAttempt) {
            await this.sleep(delayMs, signal);
          }
        }
      }
    }

    if (signal.aborted) {
      return this.abort(request, startTime, primary, this.retryPolicy.maxRetries, deadline.expired());
    }

    const errorMessage = lastError === undefined ? "All providers failed" : describeError(lastError);
    await this.writeLog(request, startTime, {
      attemptedProvider: primary,
      finalProvider: "offline",
      success: false,
      errorMessage,
      retryCount: this.retryPolicy.maxRetries,
    });
    throw new MaxRetriesExceededError({ cause: lastError });
  }

  private async tryProvider(name: ProviderName, request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
    const provider = name === "offline" ? undefined : this.providers.get(name);
    if (!provider || !provider.isAvailable()) {
      throw new ProviderNotAvailableError(name);
    }
    return provider.generate(request, signal);
  }

  private async abort(
    request: LlmRequest,
    startTime: number,
    primary: ProviderName,
    retryCount: number,
    timedOut: boolean
  ): Promise<never> {
    const error = new RequestFailedError(timedOut ? `Request timed out after ${this.config.timeoutMs}ms` : "Request aborted");
    await this.writeLog(request, startTime, {
      attemptedProvider: primary,
      finalProvider: "offline",
      success: false,
      errorMessage: error.message,
      retryCount,
    });
    throw error;
  }

  /**
   * Abort on the caller's signal or once `timeoutMs` elapses, whichever comes first.
   */
  private createDeadline(callerSignal?: AbortSignal): Deadline {
    const controller = new AbortController();
    const timeoutMs = this.config.timeoutMs;
    let expired = false;
    const timeoutId = setTimeout(() => {
      expired = true;
      controller.abort(new Error(`Request timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    const onAbort = (): void => controller.abort(callerSignal?.reason);

    if (callerSignal?.aborted) {
      controller.abort(callerSignal.reason);
    } else {
      callerSignal?.addEventListener("abort", onAbort, { once: true });
    }

    return {
      signal: controller.signal,
      expired: () => expired,
      dispose: () => {
        clearTimeout(timeoutId);
        callerSignal?.removeEventListener("abort", onAbort);
      },
    };
  }

  /**
   * Append the call's RouteLog line. A failed write is reported, never thrown.
   */
  private async writeLog(request: LlmRequest, startTime: number, outcome: Outcome): Promise<void> {
    const entry: RouteLog = {
      timestamp: Date.now(),
      requestId: request.id,
      taskType: request.taskType,
      attemptedProvider: outcome.attemptedProvider,
      finalProvider: outcome.finalProvider,
      success: outcome.success,
      durationMs: Date.now() - startTime,
      errorMessage: outcome.errorMessage,
      retryCount: outcome.retryCount,
      costCents: outcome.response?.costCents,
      tokensUsed: outcome.response?.usage.totalTokens ?? 0,
    };

    try {
      await this.routeLog.append(entry);
    } catch (error) {
      this.logger.error("Failed to write routing log", { error: describeError(error), path: this.routeLog.getFilePath() });
    }
  }

  /**
   * Routing policy for a task type; unmapped types use the default provider.
   */
  getRouteConfig(taskType: TaskType): RouteConfig {
    return this.config.routing[taskType] ?? { provider: this.config.defaultProvider, temperature: DEFAULT_TEMPERATURE };
  }

  getAvailableProviders(): ActiveProviderName[] {
    return Array.from(this.providers.entries())
      .filter(([, provider]) => provider.isAvailable())
      .map(([name]) => name);
  }

  setOfflineMode(offline: boolean): void {
    this.config.offlineMode = offline;
    this.logger.info(`Offline mode ${offline ? "enabled" : "disabled"}`);
  }

  isOfflineMode(): boolean {
    return this.config.offlineMode;
  }

  /**
   * Aggregate the route log into totals.
   */
  async getRoutingStats(): Promise<RoutingStats> {
    const entries = await this.routeLog.readAll();
    return summarizeRouteLogs(entries);
  }
}

export function summarizeRouteLogs(entries: RouteLog[]): RoutingStats {
  const providerUsage: Partial<Record<ProviderName, number>> = {};
  let successfulRequests = 0;
  let totalDuration = 0;
  let totalCost = 0;

  for (const entry of entries) {
    if (entry.success) {
      successfulRequests++;
    }
    providerUsage[entry.finalProvider] = (providerUsage[entry.finalProvider] ?? 0) + 1;
    totalDuration += entry.durationMs;
    totalCost += entry.costCents ?? 0;
  }

  return {
    totalRequests: entries.length,
    successfulRequests,
    failedRequests: entries.length - successfulRequests,
    providerUsage,
    averageDurationMs: entries.length > 0 ? Math.round(totalDuration / entries.length) : 0,
    totalCostCents: Math.round(totalCost * 100) / 100,
  };
}

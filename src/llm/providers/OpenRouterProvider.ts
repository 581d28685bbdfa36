// OpenRouter LLM Provider (OpenAI-compatible API)

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import { BaseLlmProvider } from "./BaseLlmProvider.js";
import type { LlmMessage, LlmRequest, LlmResponse, ProviderConfig } from "../../types/index.js";
import type { ProviderRates } from "../types.js";
import type { Logger } from "../../utils/logger.js";
import { RateLimitedError, RequestFailedError, describeError } from "../errors.js";

/**
 * The slice of the OpenAI client this provider talks to.
 */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(
        body: ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; timeout?: number }
      ): PromiseLike<ChatCompletion>;
    };
  };
}

function errorStatus(error: unknown): unknown {
  return typeof error === "object" && error !== null && "status" in error ? error.status : undefined;
}

function errorCode(error: unknown): unknown {
  return typeof error === "object" && error !== null && "code" in error ? error.code : undefined;
}

function toChatMessage(message: LlmMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
  }
}

export function isRateLimitError(error: unknown): boolean {
  return errorStatus(error) === 429 || errorCode(error) === "rate_limit_exceeded";
}

export class OpenRouterProvider extends BaseLlmProvider {
  protected readonly rates: ProviderRates = {
    promptCentsPerToken: 0.00005,
    completionCentsPerToken: 0.0002,
  };
  private client: ChatCompletionsClient;

  constructor(config: ProviderConfig, deps?: { client?: ChatCompletionsClient; logger?: Logger }) {
    super(config, deps?.logger);
    this.client =
      deps?.client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: config.baseUrl,
        timeout: config.timeoutMs,
        maxRetries: 0,
      });
  }

  providerName(): "openrouter" {
    return "openrouter";
  }

  async generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
    const startTime = Date.now();
    const messages = request.messages.map(toChatMessage);

    this.logger.logInput("openrouter.generate", { requestId: request.id, model: this.config.model });

    let completion: ChatCompletion;
    try {
      completion = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages,
          temperature: this.resolveTemperature(request),
          max_tokens: this.resolveMaxTokens(request),
        },
        { signal, timeout: this.config.timeoutMs }
      );
    } catch (error) {
      if (isRateLimitError(error)) {
        throw new RateLimitedError("openrouter");
      }
      throw new RequestFailedError(`OpenRouter API error: ${describeError(error)}`, { cause: error });
    }

    const choice = completion.choices[0];
    if (!choice) {
      throw new RequestFailedError("No choices in OpenRouter response");
    }

    const usage = {
      promptTokens: completion.usage?.prompt_tokens ?? 0,
      completionTokens: completion.usage?.completion_tokens ?? 0,
      totalTokens: completion.usage?.total_tokens ?? 0,
    };

    const response: LlmResponse = {
      id: request.id,
      provider: "openrouter",
      model: completion.model,
      content: choice.message.content ?? "",
      usage,
      durationMs: Date.now() - startTime,
      costCents: this.estimateCost(usage),
    };
    this.logger.logOutput("openrouter.generate", { requestId: request.id, usage }, startTime);
    return response;
  }
}

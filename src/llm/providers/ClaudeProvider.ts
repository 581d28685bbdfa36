// Claude (Anthropic Messages API) LLM Provider

import { z } from "zod";
import { BaseLlmProvider } from "./BaseLlmProvider.js";
import type { LlmMessage, LlmRequest, LlmResponse, MessageRole } from "../../types/index.js";
import type { ProviderRates } from "../types.js";
import { RateLimitedError, RequestFailedError, describeError } from "../errors.js";

export const ANTHROPIC_VERSION = "2023-06-01";

const ClaudeResponseSchema = z.object({
  model: z.string(),
  usage: z.object({
    input_tokens: z.number().int().nonnegative(),
    output_tokens: z.number().int().nonnegative(),
  }),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
    })
  ),
});

const ClaudeErrorSchema = z.object({
  error: z.object({
    type: z.string(),
    message: z.string(),
  }),
});

interface ClaudeMessage {
  role: "user" | "assistant";
  content: string;
}

/**
 * The Messages API has no system role in the message list, so system
 * messages are sent as user turns.
 */
export function mapClaudeRole(role: MessageRole): ClaudeMessage["role"] {
  return role === "assistant" ? "assistant" : "user";
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class ClaudeProvider extends BaseLlmProvider {
  protected readonly rates: ProviderRates = {
    promptCentsPerToken: 0.0003,
    completionCentsPerToken: 0.0015,
  };

  providerName(): "claude" {
    return "claude";
  }

  buildRequestBody(request: LlmRequest): {
    model: string;
    max_tokens: number;
    temperature: number;
    messages: ClaudeMessage[];
  } {
    return {
      model: this.config.model,
      max_tokens: this.resolveMaxTokens(request),
      temperature: this.resolveTemperature(request),
      messages: request.messages.map((message: LlmMessage) => ({
        role: mapClaudeRole(message.role),
        content: message.content,
      })),
    };
  }

  async generate(request: LlmRequest, signal?: AbortSignal): Promise<LlmResponse> {
    const startTime = Date.now();
    const url = `${this.config.baseUrl.replace(/\/+$/, "")}/messages`;
    const { signal: requestSignal, dispose } = this.createRequestSignal(signal);

    this.logger.logInput("claude.generate", { requestId: request.id, model: this.config.model });

    let status: number;
    let text: string;
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "x-api-key": this.config.apiKey,
          "anthropic-version": ANTHROPIC_VERSION,
        },
        body: JSON.stringify(this.buildRequestBody(request)),
        signal: requestSignal,
      });
      status = response.status;
      text = await response.text();
    } catch (error) {
      throw new RequestFailedError(`HTTP request failed: ${describeError(error)}`, { cause: error });
    } finally {
      dispose();
    }

    const body = parseJson(text);

    if (status < 200 || status >= 300) {
      const parsedError = ClaudeErrorSchema.safeParse(body);
      if (parsedError.success) {
        if (parsedError.data.error.type === "rate_limit_error" || status === 429) {
          throw new RateLimitedError("claude");
        }
        throw new RequestFailedError(`Claude API error: ${parsedError.data.error.message}`);
      }
      if (status === 429) {
        throw new RateLimitedError("claude");
      }
      throw new RequestFailedError(`Claude API request failed with status ${status}: ${text}`);
    }

    const parsed = ClaudeResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RequestFailedError(`Failed to parse Claude response: ${parsed.error.message}`);
    }

    const content = parsed.data.content
      .filter((block) => block.type === "text")
      .map((block) => block.text ?? "")
      .join("\n");
    const usage = {
      promptTokens: parsed.data.usage.input_tokens,
      completionTokens: parsed.data.usage.output_tokens,
      totalTokens: parsed.data.usage.input_tokens + parsed.data.usage.output_tokens,
    };

    const response: LlmResponse = {
      id: request.id,
      provider: "claude",
      model: parsed.data.model,
      content,
      usage,
      durationMs: Date.now() - startTime,
      costCents: this.estimateCost(usage),
    };
    this.logger.logOutput("claude.generate", { requestId: request.id, usage }, startTime);
    return response;
  }
}

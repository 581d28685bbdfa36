/**
 * Task executors
 *
 * An executor turns a RUNNING task into a result. The orchestrator owns the
 * state transitions; executors only produce a value or throw.
 */

import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { JsonObject, JsonValue, LlmMessage, LlmRequest, LlmResponse, Task } from "../types/index.js";
import type { GenerateOptions } from "../llm/types.js";
import { LlmMessageSchema } from "../types/schemas.js";

export interface TaskExecutor {
  /**
   * `signal` aborts on cancel, pause, timeout and shutdown.
   */
  execute(task: Task, signal: AbortSignal): Promise<JsonValue>;
}

/**
 * Anything that can route a generation request (LlmRouter in practice).
 */
export interface GenerationRouter {
  generate(request: LlmRequest, options?: GenerateOptions): Promise<LlmResponse>;
}

const PayloadMessagesSchema = z.object({
  messages: z.array(LlmMessageSchema).min(1),
});

/**
 * Conversation sent for a task: `payload.messages` when the submitter
 * supplied a valid list, otherwise a system line naming the task type and a
 * user turn with the description and payload.
 */
export function buildTaskMessages(task: Task): LlmMessage[] {
  const supplied = PayloadMessagesSchema.safeParse(task.payload);
  if (supplied.success) {
    return supplied.data.messages;
  }

  const userContent =
    task.payload === null
      ? task.description
      : `${task.description}\n\nPayload:\n${JSON.stringify(task.payload, null, 2)}`;

  return [
    { role: "system", content: `You are assisting with a ${task.type} task.` },
    { role: "user", content: userContent },
  ];
}

export class LlmTaskExecutor implements TaskExecutor {
  constructor(private readonly router: GenerationRouter) {}

  async execute(task: Task, signal: AbortSignal): Promise<JsonValue> {
    const request: LlmRequest = {
      id: randomUUID(),
      taskType: task.type,
      messages: buildTaskMessages(task),
    };

    const response = await this.router.generate(request, { signal });

    const result: JsonObject = {
      provider: response.provider,
      model: response.model,
      content: response.content,
      usage: {
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
        totalTokens: response.usage.totalTokens,
      },
    };
    if (response.costCents !== undefined) {
      result.costCents = response.costCents;
    }
    return result;
  }
}

/**
 * Ask command - one routed generation
 */

import { randomUUID } from "node:crypto";
import { TaskTypeSchema } from "../../types/schemas.js";
import type { LlmRequest, TaskType } from "../../types/index.js";
import { loadCliContext, createRouter } from "../utils/context.js";
import { printData } from "../utils/output.js";
import type { AskOptions } from "../types.js";

export function parseTaskType(value: string | undefined, fallback: TaskType): TaskType {
  if (value === undefined) {
    return fallback;
  }
  const parsed = TaskTypeSchema.safeParse(value.toUpperCase());
  if (!parsed.success) {
    throw new Error(`Unknown task type: ${value} (expected one of ${TaskTypeSchema.options.join(", ")})`);
  }
  return parsed.data;
}

export async function askCommand(promptWords: string[], options: AskOptions): Promise<void> {
  const context = loadCliContext(options);
  const router = createRouter(context);
  if (options.offline) {
    router.setOfflineMode(true);
  }

  const request: LlmRequest = {
    id: randomUUID(),
    taskType: parseTaskType(options.type, "FOLLOWUP"),
    messages: [{ role: "user", content: promptWords.join(" ") }],
  };

  const response = await router.generate(request);

  if (options.json) {
    printData(response, true);
    return;
  }
  console.log(response.content);
  console.error(
    `\n[${response.provider} ${response.model}] ${response.usage.totalTokens} tokens, ${response.durationMs}ms` +
      (response.costCents !== undefined ? `, ${response.costCents}¢` : "")
  );
}

/**
 * Run command - submit one task through the orchestrator and wait for it
 */

import chalk from "chalk";
import { JsonValueSchema } from "../../types/schemas.js";
import type { JsonValue, OrchestratorConfig, Task } from "../../types/index.js";
import { TaskOrchestrator } from "../../orchestrator/TaskOrchestrator.js";
import { LlmTaskExecutor } from "../../orchestrator/TaskExecutor.js";
import { loadCliContext, createRouter } from "../utils/context.js";
import { formatTimestamp, printData, printError, printHeader, printSuccess } from "../utils/output.js";
import { parseTaskType } from "./ask.js";
import type { RunOptions } from "../types.js";

export function parsePayload(raw: string | undefined): JsonValue {
  if (raw === undefined) {
    return null;
  }
  let decoded: unknown;
  try {
    decoded = JSON.parse(raw);
  } catch (error) {
    throw new Error(`--payload is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
  return JsonValueSchema.parse(decoded);
}

export function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined) {
    return undefined;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--timeout must be a positive integer, got ${raw}`);
  }
  return value;
}

function summarize(task: Task): Record<string, unknown> {
  return {
    id: task.id,
    type: task.type,
    state: task.state,
    retryCount: task.retryCount,
    createdAt: formatTimestamp(task.createdAt),
    completedAt: formatTimestamp(task.completedAt),
    error: task.errorMessage,
    result: task.result,
  };
}

export async function runCommand(type: string, description: string, options: RunOptions): Promise<void> {
  const context = loadCliContext(options);
  const taskType = parseTaskType(type, "PLAN");
  const payload = parsePayload(options.payload);

  const overrides: Partial<OrchestratorConfig> = {};
  const timeout = parseTimeout(options.timeout);
  if (timeout !== undefined) {
    overrides.taskTimeoutMs = timeout;
  }

  const orchestrator = await TaskOrchestrator.create(context.config, overrides, {
    executor: new LlmTaskExecutor(createRouter(context)),
    logger: context.logger,
  });

  let task: Task;
  try {
    const taskId = orchestrator.submit(taskType, description, payload);
    orchestrator.startProcessing();
    task = await orchestrator.waitForTask(taskId);
  } finally {
    await orchestrator.shutdown();
  }

  if (options.json) {
    printData(task, true);
  } else {
    printHeader(`Task ${task.id}`);
    printData(summarize(task));
    console.log(chalk.gray(`Session: ${orchestrator.getEventLogger().getSessionDirectory()}`));
    if (task.state === "COMPLETED") {
      printSuccess("Task completed");
    } else {
      printError(`Task ended ${task.state}`);
    }
  }

  if (task.state !== "COMPLETED") {
    process.exitCode = 1;
  }
}

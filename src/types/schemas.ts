// Runtime schemas for every record that is persisted or read back from disk

import { z } from "zod";
import type { JsonValue, RouteLog, RunSession, Task, TaskEvent } from "./index.js";

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(JsonValueSchema), z.record(JsonValueSchema)])
);

export const TaskTypeSchema = z.enum(["PLAN", "REVIEW", "STATUS", "FOLLOWUP", "APPLY"]);

export const TaskStateSchema = z.enum(["PENDING", "RUNNING", "COMPLETED", "FAILED", "CANCELLED", "PAUSED"]);

export const ProviderNameSchema = z.enum(["claude", "openrouter", "offline"]);

export const MessageRoleSchema = z.enum(["system", "user", "assistant"]);

export const LlmMessageSchema = z.object({
  role: MessageRoleSchema,
  content: z.string(),
});

export const TaskSchema: z.ZodType<Task> = z.object({
  id: z.string().uuid(),
  type: TaskTypeSchema,
  description: z.string(),
  payload: JsonValueSchema,
  state: TaskStateSchema,
  createdAt: z.number(),
  updatedAt: z.number(),
  startedAt: z.number().optional(),
  completedAt: z.number().optional(),
  retryCount: z.number().int().nonnegative(),
  errorMessage: z.string().optional(),
  result: JsonValueSchema.optional(),
});

export const TaskEventSchema: z.ZodType<TaskEvent> = z.object({
  eventId: z.string().uuid(),
  taskId: z.string(),
  eventType: z.enum([
    "TaskCreated",
    "TaskStarted",
    "TaskCompleted",
    "TaskFailed",
    "TaskCancelled",
    "TaskRetried",
    "StateTransition",
  ]),
  timestamp: z.number(),
  details: z.record(JsonValueSchema),
});

export const RunSessionSchema: z.ZodType<RunSession> = z.object({
  sessionId: z.string().uuid(),
  startTime: z.number(),
  endTime: z.number().optional(),
  events: z.array(TaskEventSchema),
});

export const RouteLogSchema: z.ZodType<RouteLog> = z.object({
  timestamp: z.number(),
  requestId: z.string(),
  taskType: TaskTypeSchema,
  attemptedProvider: ProviderNameSchema,
  finalProvider: ProviderNameSchema,
  success: z.boolean(),
  durationMs: z.number().nonnegative(),
  errorMessage: z.string().optional(),
  retryCount: z.number().int().nonnegative(),
  costCents: z.number().optional(),
  tokensUsed: z.number().int().nonnegative(),
});

/**
 * Parse a serialized task (JSON text or an already-decoded value).
 */
export function parseTask(input: unknown): Task {
  return TaskSchema.parse(typeof input === "string" ? JSON.parse(input) : input);
}

export function parseRouteLog(input: unknown): RouteLog {
  return RouteLogSchema.parse(typeof input === "string" ? JSON.parse(input) : input);
}

export function parseRunSession(input: unknown): RunSession {
  return RunSessionSchema.parse(typeof input === "string" ? JSON.parse(input) : input);
}

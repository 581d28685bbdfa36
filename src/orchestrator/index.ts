/**
 * Orchestrator Module
 *
 * Task lifecycle, dispatch queue, concurrency limit and the per-run audit log.
 */

export { TaskOrchestrator } from "./TaskOrchestrator.js";
export { TaskRegistry } from "./TaskRegistry.js";
export { DispatchQueue } from "./DispatchQueue.js";
export { ConcurrencyLimiter, type LimiterStats } from "./ConcurrencyLimiter.js";
export { EventLogger, formatSessionDirectoryName } from "./EventLogger.js";
export { LlmTaskExecutor, buildTaskMessages, type TaskExecutor, type GenerationRouter } from "./TaskExecutor.js";
export * from "./TaskStateMachine.js";
export * from "./TaskLifecycle.js";
export { InvalidTransitionError, TaskNotFoundError } from "./errors.js";
export type { OrchestratorDeps, OrchestratorStats, StateChangeCallback, AbortReason } from "./types.js";

/**
 * Orchestrator Types
 */

import type { TaskState, TaskStateChange } from "../types/index.js";
import type { LimiterStats } from "./ConcurrencyLimiter.js";
import type { EventLogger } from "./EventLogger.js";
import type { TaskExecutor } from "./TaskExecutor.js";
import type { Logger } from "../utils/logger.js";

export type StateChangeCallback = (event: TaskStateChange) => void;

/**
 * Why an in-flight execution was aborted. Decides what happens to its outcome.
 * "external" is a direct `updateState` away from RUNNING.
 */
export type AbortReason = "cancel" | "pause" | "timeout" | "shutdown" | "external";

export interface InFlightExecution {
  controller: AbortController;
  reason?: AbortReason;
}

export interface OrchestratorDeps {
  eventLogger: EventLogger;
  /** Without one, tasks complete with an echo result */
  executor?: TaskExecutor;
  logger?: Logger;
}

export interface OrchestratorStats {
  tasks: { total: number; byState: Record<TaskState, number> };
  queue: { pending: number; closed: boolean };
  concurrency: LimiterStats;
  inFlight: number;
}

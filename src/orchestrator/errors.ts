// Errors raised by the task registry and state machine

import type { TaskState } from "../types/index.js";

export class InvalidTransitionError extends Error {
  readonly code = "INVALID_TRANSITION";

  constructor(
    readonly from: TaskState,
    readonly to: TaskState
  ) {
    super(`Invalid state transition from ${from} to ${to}`);
    this.name = "InvalidTransitionError";
  }
}

export class TaskNotFoundError extends Error {
  readonly code = "TASK_NOT_FOUND";

  constructor(readonly taskId: string) {
    super(`Task not found: ${taskId}`);
    this.name = "TaskNotFoundError";
  }
}

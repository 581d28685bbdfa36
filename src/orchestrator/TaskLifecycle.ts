/**
 * TaskLifecycle
 *
 * Entity-level mutations on a Task. Each one goes through the state machine
 * first, so an invalid call throws and leaves the task untouched.
 */

import { randomUUID } from "node:crypto";
import type { JsonValue, Task, TaskState, TaskType } from "../types/index.js";
import { assertTransition } from "./TaskStateMachine.js";

export const MAX_TASK_RETRIES = 3;

export function createTask(type: TaskType, description: string, payload: JsonValue): Task {
  const now = Date.now();
  return {
    id: randomUUID(),
    type,
    description,
    payload,
    state: "PENDING",
    createdAt: now,
    updatedAt: now,
    retryCount: 0,
  };
}

/**
 * Move a task to `target` after validating the transition.
 */
export function transitionTask(task: Task, target: TaskState): void {
  assertTransition(task.state, target);
  task.state = target;
  task.updatedAt = Date.now();
}

export function startTask(task: Task): void {
  transitionTask(task, "RUNNING");
  task.startedAt ??= task.updatedAt;
}

export function completeTask(task: Task, result: JsonValue): void {
  transitionTask(task, "COMPLETED");
  task.result = result;
  task.completedAt = task.updatedAt;
}

export function failTask(task: Task, message: string): void {
  transitionTask(task, "FAILED");
  task.errorMessage = message;
}

/**
 * Re-queue a failed task. The counter moves on every call; once it passes
 * MAX_TASK_RETRIES the task is left in FAILED and false is returned.
 */
export function retryTask(task: Task): boolean {
  assertTransition(task.state, "PENDING");
  task.retryCount += 1;
  task.updatedAt = Date.now();
  if (task.retryCount > MAX_TASK_RETRIES) {
    return false;
  }
  task.state = "PENDING";
  return true;
}

export function canRetry(task: Task): boolean {
  return task.state === "FAILED" && task.retryCount < MAX_TASK_RETRIES;
}

export function pauseTask(task: Task): void {
  transitionTask(task, "PAUSED");
}

export function resumeTask(task: Task): void {
  transitionTask(task, "RUNNING");
}

export function cancelTask(task: Task): void {
  transitionTask(task, "CANCELLED");
}

/**
 * Wall-clock time between first start and completion, if both happened.
 */
export function getTaskDuration(task: Task): number | undefined {
  if (task.startedAt === undefined || task.completedAt === undefined) {
    return undefined;
  }
  return task.completedAt - task.startedAt;
}

/**
 * TaskStateMachine
 *
 * The allowed-transition table for tasks. Every state mutation in the
 * orchestrator is checked against this table before it is written.
 *
 * COMPLETED and CANCELLED are terminal. FAILED only leads back to PENDING
 * (a retry) or to CANCELLED.
 */

import type { TaskState } from "../types/index.js";
import { InvalidTransitionError } from "./errors.js";

const VALID_TRANSITIONS: Record<TaskState, readonly TaskState[]> = {
  PENDING: ["RUNNING", "CANCELLED"],
  RUNNING: ["COMPLETED", "FAILED", "CANCELLED", "PAUSED"],
  PAUSED: ["RUNNING", "CANCELLED"],
  FAILED: ["PENDING", "CANCELLED"],
  COMPLETED: [],
  CANCELLED: [],
};

export type TransitionResult =
  | { ok: true }
  | { ok: false; error: InvalidTransitionError };

/**
 * Check a transition without mutating anything.
 */
export function validateTransition(current: TaskState, target: TaskState): TransitionResult {
  if (VALID_TRANSITIONS[current].includes(target)) {
    return { ok: true };
  }
  return { ok: false, error: new InvalidTransitionError(current, target) };
}

/**
 * Throwing form of validateTransition.
 */
export function assertTransition(current: TaskState, target: TaskState): void {
  const result = validateTransition(current, target);
  if (!result.ok) {
    throw result.error;
  }
}

/**
 * All states reachable in one step from `current`.
 */
export function getValidTransitions(current: TaskState): TaskState[] {
  return [...VALID_TRANSITIONS[current]];
}

export function isTerminal(state: TaskState): boolean {
  return VALID_TRANSITIONS[state].length === 0;
}

export function isActive(state: TaskState): boolean {
  return state === "RUNNING";
}

/**
 * TaskRegistry
 *
 * In-memory storage for every task submitted during a run.
 * Provides snapshot lookup, validated state updates, and event emission.
 *
 * Each read-validate-write below is synchronous, so it completes on the
 * event loop before any other caller observes the task. Callers only ever
 * receive copies.
 */

import type { JsonValue, Task, TaskState, TaskStateChange, TaskType } from "../types/index.js";
import { createTask, transitionTask } from "./TaskLifecycle.js";
import { TaskNotFoundError } from "./errors.js";

type TaskEventListener = (event: TaskStateChange) => void;

export interface TaskMutationResult {
  previous: Task;
  task: Task;
}

export class TaskRegistry {
  private tasks: Map<string, Task> = new Map();
  private listeners: Set<TaskEventListener> = new Set();

  /**
   * Create a new task with PENDING state.
   */
  create(type: TaskType, description: string, payload: JsonValue): Task {
    const task = createTask(type, description, payload);
    this.tasks.set(task.id, task);
    this.emitEvent({
      taskId: task.id,
      previousState: null,
      newState: "PENDING",
      timestamp: task.createdAt,
    });
    return structuredClone(task);
  }

  /**
   * Get a snapshot of a task by ID.
   */
  get(taskId: string): Task | undefined {
    const task = this.tasks.get(taskId);
    return task ? structuredClone(task) : undefined;
  }

  getAll(): Task[] {
    return Array.from(this.tasks.values(), (task) => structuredClone(task));
  }

  /**
   * Update task state. Throws InvalidTransitionError (task untouched) or
   * TaskNotFoundError.
   */
  updateState(taskId: string, newState: TaskState): Task {
    return this.apply(taskId, (task) => transitionTask(task, newState)).task;
  }

  /**
   * Run a lifecycle mutation against the stored task. The mutation works on a
   * draft; the draft replaces the stored task only if the mutation returns
   * without throwing.
   */
  apply<R = void>(taskId: string, mutation: (task: Task) => R): TaskMutationResult & { value: R } {
    const current = this.tasks.get(taskId);
    if (!current) {
      throw new TaskNotFoundError(taskId);
    }

    const draft = structuredClone(current);
    const value = mutation(draft);
    this.tasks.set(taskId, draft);

    if (draft.state !== current.state) {
      this.emitEvent({
        taskId,
        previousState: current.state,
        newState: draft.state,
        timestamp: draft.updatedAt,
      });
    }

    return { previous: structuredClone(current), task: structuredClone(draft), value };
  }

  /**
   * Get tasks by state.
   */
  getByState(state: TaskState): Task[] {
    return this.getAll().filter((task) => task.state === state);
  }

  has(taskId: string): boolean {
    return this.tasks.has(taskId);
  }

  /**
   * Subscribe to task state change events.
   */
  onTaskEvent(listener: TaskEventListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * Emit event to all listeners.
   */
  private emitEvent(event: TaskStateChange): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (error) {
        console.error("Task event listener error:", error);
      }
    }
  }

  /**
   * Get registry statistics.
   */
  getStats(): { total: number; byState: Record<TaskState, number> } {
    const byState: Record<TaskState, number> = {
      PENDING: 0,
      RUNNING: 0,
      COMPLETED: 0,
      FAILED: 0,
      CANCELLED: 0,
      PAUSED: 0,
    };

    for (const task of this.tasks.values()) {
      byState[task.state]++;
    }

    return {
      total: this.tasks.size,
      byState,
    };
  }
}

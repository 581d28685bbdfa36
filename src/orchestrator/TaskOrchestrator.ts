/**
 * TaskOrchestrator
 *
 * Owns the task registry, the dispatch queue and the audit log. A single
 * consumer drains the queue and maps each dispatch action onto a state
 * machine transition:
 *
 *   EXECUTE  PENDING -> RUNNING (after a concurrency slot), then COMPLETED or FAILED
 *   RETRY    FAILED  -> PENDING, then a fresh EXECUTE
 *   CANCEL   any non-terminal -> CANCELLED, aborting in-flight work
 *   PAUSE    RUNNING -> PAUSED, aborting in-flight work and discarding its outcome
 *   RESUME   PAUSED  -> RUNNING (after a slot), re-running the executor
 *
 * The consumer never waits on an execution; executions run as tracked jobs.
 */

import type { DispatchRequest, JsonValue, OrchestratorConfig, SystemConfig, Task, TaskState, TaskType } from "../types/index.js";
import type {
  AbortReason,
  InFlightExecution,
  OrchestratorDeps,
  OrchestratorStats,
  StateChangeCallback,
} from "./types.js";
import { TaskRegistry } from "./TaskRegistry.js";
import { DispatchQueue } from "./DispatchQueue.js";
import { ConcurrencyLimiter } from "./ConcurrencyLimiter.js";
import { EventLogger } from "./EventLogger.js";
import type { TaskExecutor } from "./TaskExecutor.js";
import {
  cancelTask,
  completeTask,
  failTask,
  pauseTask,
  resumeTask,
  retryTask,
  startTask,
} from "./TaskLifecycle.js";
import { getValidTransitions, isTerminal, validateTransition } from "./TaskStateMachine.js";
import { TaskNotFoundError } from "./errors.js";
import { describeError } from "../llm/errors.js";
import { createLogger, runWithTraceAsync, type LayerLogger, type Logger } from "../utils/logger.js";

const DEFAULT_CONFIG: OrchestratorConfig = {
  maxConcurrentTasks: 5,
  taskTimeoutMs: 30000,
  logDirectory: "runs",
};

/**
 * Reject as soon as `signal` aborts, even if `work` ignores the signal.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(signal.reason);
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);
    signal.addEventListener("abort", onAbort, { once: true });
    work.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

function abortReasonFor(target: TaskState): AbortReason {
  switch (target) {
    case "PAUSED":
      return "pause";
    case "CANCELLED":
      return "cancel";
    default:
      return "external";
  }
}

/**
 * FAILED counts as settled for waiters even though a retry may follow.
 */
function isSettled(state: TaskState): boolean {
  return isTerminal(state) || state === "FAILED";
}

export class TaskOrchestrator {
  private registry: TaskRegistry;
  private queue: DispatchQueue<DispatchRequest>;
  private limiter: ConcurrencyLimiter;
  private config: OrchestratorConfig;
  private logger: Logger;
  private layerLogger: LayerLogger;
  private eventLogger: EventLogger;
  private executor: TaskExecutor | null;
  private stateChangeCallbacks: Set<StateChangeCallback> = new Set();
  private inFlight: Map<string, InFlightExecution> = new Map();
  private jobs: Set<Promise<void>> = new Set();
  private consumer: Promise<void> | null = null;
  private stopping = false;

  constructor(systemConfig: SystemConfig, config: Partial<OrchestratorConfig> | undefined, deps: OrchestratorDeps) {
    this.config = { ...DEFAULT_CONFIG, ...systemConfig.orchestrator, ...config };
    this.registry = new TaskRegistry();
    this.queue = new DispatchQueue();
    this.limiter = new ConcurrencyLimiter(this.config.maxConcurrentTasks);
    this.logger = deps.logger ?? createLogger(systemConfig);
    this.layerLogger = this.logger.forLayer("orchestrator");
    this.eventLogger = deps.eventLogger;
    this.executor = deps.executor ?? null;

    // Every transition is audited and forwarded to subscribers
    this.registry.onTaskEvent((event) => {
      if (event.previousState !== null) {
        this.audit(
          this.eventLogger.logStateTransition(event.taskId, event.previousState, event.newState),
          "StateTransition",
          event.taskId
        );
      }
      for (const callback of this.stateChangeCallbacks) {
        try {
          callback(event);
        } catch (error) {
          this.layerLogger.error("State change callback error", { error: describeError(error) });
        }
      }
    });
  }

  /**
   * Build an orchestrator with a fresh run session under `logDirectory`.
   */
  static async create(
    systemConfig: SystemConfig,
    config?: Partial<OrchestratorConfig>,
    deps: Omit<OrchestratorDeps, "eventLogger"> = {}
  ): Promise<TaskOrchestrator> {
    const logDirectory = config?.logDirectory ?? systemConfig.orchestrator.logDirectory;
    const eventLogger = await EventLogger.create(logDirectory);
    return new TaskOrchestrator(systemConfig, config, { ...deps, eventLogger });
  }

  /**
   * Store a new task and queue its execution. Returns the task id.
   */
  submit(type: TaskType, description: string, payload: JsonValue): string {
    const task = this.registry.create(type, description, payload);
    this.audit(this.eventLogger.logTaskCreated(task), "TaskCreated", task.id);
    this.enqueue({ taskId: task.id, action: "EXECUTE" });
    this.layerLogger.info("Task submitted", { taskId: task.id, type });
    return task.id;
  }

  get(taskId: string): Task | undefined {
    return this.registry.get(taskId);
  }

  getAll(): Task[] {
    return this.registry.getAll();
  }

  /**
   * Direct validated transition. Throws InvalidTransitionError or
   * TaskNotFoundError without side effects. Moving a task out of RUNNING
   * aborts its in-flight execution and drops that execution's outcome.
   */
  updateState(taskId: string, target: TaskState): Task {
    const task = this.registry.updateState(taskId, target);
    if (target !== "RUNNING") {
      this.abortInFlight(taskId, abortReasonFor(target));
    }
    return task;
  }

  getValidTransitions(taskId: string): TaskState[] {
    const task = this.requireTask(taskId);
    return getValidTransitions(task.state);
  }

  retry(taskId: string): boolean {
    this.requireTask(taskId);
    return this.enqueue({ taskId, action: "RETRY" });
  }

  cancel(taskId: string): boolean {
    this.requireTask(taskId);
    return this.enqueue({ taskId, action: "CANCEL" });
  }

  pause(taskId: string): boolean {
    this.requireTask(taskId);
    return this.enqueue({ taskId, action: "PAUSE" });
  }

  resume(taskId: string): boolean {
    this.requireTask(taskId);
    return this.enqueue({ taskId, action: "RESUME" });
  }

  /**
   * Register a callback for task state changes.
   */
  onTaskState(callback: StateChangeCallback): () => void {
    this.stateChangeCallbacks.add(callback);
    return () => this.stateChangeCallbacks.delete(callback);
  }

  /**
   * Resolve once the task is COMPLETED, CANCELLED or FAILED.
   */
  waitForTask(taskId: string, timeoutMs?: number): Promise<Task> {
    const current = this.requireTask(taskId);
    if (isSettled(current.state)) {
      return Promise.resolve(current);
    }

    return new Promise<Task>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const unsubscribe = this.registry.onTaskEvent((event) => {
        if (event.taskId !== taskId || !isSettled(event.newState)) {
          return;
        }
        const task = this.registry.get(taskId);
        if (task) {
          clearTimeout(timer);
          unsubscribe();
          resolve(task);
        }
      });

      if (timeoutMs !== undefined && timeoutMs > 0) {
        timer = setTimeout(() => {
          unsubscribe();
          reject(new Error(`Timed out waiting for task ${taskId}`));
        }, timeoutMs);
      }
    });
  }

  /**
   * Start the single dispatch consumer.
   */
  startProcessing(): void {
    if (this.consumer) {
      throw new Error("Processing already started");
    }
    this.consumer = this.consume();
    this.layerLogger.info("Dispatch consumer started", {
      maxConcurrentTasks: this.config.maxConcurrentTasks,
      taskTimeoutMs: this.config.taskTimeoutMs,
    });
  }

  getStats(): OrchestratorStats {
    return {
      tasks: this.registry.getStats(),
      queue: { pending: this.queue.size(), closed: this.queue.isClosed() },
      concurrency: this.limiter.getStats(),
      inFlight: this.inFlight.size,
    };
  }

  getEventLogger(): EventLogger {
    return this.eventLogger;
  }

  /**
   * Stop accepting work, cancel in-flight executions, wait for every job and
   * write the session summary.
   */
  async shutdown(): Promise<void> {
    this.stopping = true;
    this.queue.close();

    for (const flight of this.inFlight.values()) {
      flight.reason ??= "shutdown";
      flight.controller.abort(new Error("Orchestrator shutting down"));
    }

    if (this.consumer) {
      await this.consumer;
    }
    while (this.jobs.size > 0) {
      await Promise.all(this.jobs);
    }

    try {
      await this.eventLogger.finalizeSession();
    } catch (error) {
      this.layerLogger.warn("Failed to finalize run session", { error: describeError(error) });
    }

    this.layerLogger.info("TaskOrchestrator shutdown", { sessionId: this.eventLogger.getSessionId() });
  }

  private async consume(): Promise<void> {
    for (;;) {
      const request = await this.queue.next();
      if (!request) {
        return;
      }
      this.dispatch(request);
    }
  }

  /**
   * Apply one dispatch request. Anything the state machine rejects is
   * logged and dropped.
   */
  private dispatch(request: DispatchRequest): void {
    const { taskId, action } = request;
    this.layerLogger.debug(`Dispatch ${action}`, { taskId });

    try {
      switch (action) {
        case "EXECUTE":
          this.precheck(taskId, "RUNNING", "PENDING");
          this.track(this.runExecution(taskId, "start"));
          break;
        case "RESUME":
          this.precheck(taskId, "RUNNING", "PAUSED");
          this.track(this.runExecution(taskId, "resume"));
          break;
        case "RETRY":
          this.handleRetry(taskId);
          break;
        case "CANCEL":
          this.handleCancel(taskId);
          break;
        case "PAUSE":
          this.handlePause(taskId);
          break;
      }
    } catch (error) {
      this.layerLogger.warn(`Dropped ${action} request: ${describeError(error)}`, { taskId });
    }
  }

  /**
   * Throw unless the task is in `expected` and may move to `target`.
   */
  private precheck(taskId: string, target: TaskState, expected: TaskState): void {
    const task = this.requireTask(taskId);
    const result = validateTransition(task.state, target);
    if (!result.ok) {
      throw result.error;
    }
    if (task.state !== expected) {
      throw new Error(`Task is ${task.state}, expected ${expected}`);
    }
  }

  private handleRetry(taskId: string): void {
    const { task, value: requeued } = this.registry.apply(taskId, retryTask);
    if (!requeued) {
      this.layerLogger.warn("Retry limit reached, task stays FAILED", { taskId, retryCount: task.retryCount });
      return;
    }
    this.audit(this.eventLogger.logTaskRetried(taskId, task.retryCount), "TaskRetried", taskId);
    this.enqueue({ taskId, action: "EXECUTE" });
  }

  private handleCancel(taskId: string): void {
    this.registry.apply(taskId, cancelTask);
    this.abortInFlight(taskId, "cancel");
    this.audit(this.eventLogger.logTaskCancelled(taskId, "Cancelled by request"), "TaskCancelled", taskId);
  }

  private handlePause(taskId: string): void {
    this.registry.apply(taskId, pauseTask);
    this.abortInFlight(taskId, "pause");
  }

  private abortInFlight(taskId: string, reason: AbortReason): void {
    const flight = this.inFlight.get(taskId);
    if (flight) {
      flight.reason ??= reason;
      flight.controller.abort(new Error(`Task ${reason}`));
    }
  }

  /**
   * Acquire a slot, move the task to RUNNING, run the executor under the
   * task deadline, and record the outcome.
   */
  private async runExecution(taskId: string, mode: "start" | "resume"): Promise<void> {
    await this.limiter.acquire();
    try {
      if (this.stopping) {
        return;
      }

      let task: Task;
      try {
        task = this.registry.apply(taskId, mode === "start" ? startTask : resumeTask).task;
      } catch (error) {
        // State moved on while waiting for a slot (e.g. cancelled)
        this.layerLogger.debug(`Skipped ${mode}: ${describeError(error)}`, { taskId });
        return;
      }
      this.audit(this.eventLogger.logTaskStarted(taskId), "TaskStarted", taskId);

      const startTime = Date.now();
      this.layerLogger.logInput("executeTask", { taskId, type: task.type, mode });

      const flight: InFlightExecution = { controller: new AbortController() };
      this.inFlight.set(taskId, flight);
      const timeoutMs = this.config.taskTimeoutMs;
      const timeoutTimer = setTimeout(() => {
        flight.reason ??= "timeout";
        flight.controller.abort(new Error(`Task timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      let outcome: { ok: true; value: JsonValue } | { ok: false; error: unknown };
      let owned = false;
      try {
        const value = await runWithTraceAsync("orchestrator", () =>
          raceAbort(this.executeTaskLogic(task, flight.controller.signal), flight.controller.signal)
        );
        outcome = { ok: true, value };
      } catch (error) {
        outcome = { ok: false, error };
      } finally {
        clearTimeout(timeoutTimer);
        // A resume may already have registered a newer execution
        owned = this.inFlight.get(taskId) === flight;
        if (owned) {
          this.inFlight.delete(taskId);
        }
      }

      switch (flight.reason) {
        case "cancel":
        case "pause":
        case "external":
          this.layerLogger.debug(`Discarded outcome after ${flight.reason}`, { taskId });
          return;
        case "shutdown":
          this.registry.apply(taskId, cancelTask);
          this.audit(this.eventLogger.logTaskCancelled(taskId, "Orchestrator shutdown"), "TaskCancelled", taskId);
          return;
        case "timeout":
          this.recordFailure(taskId, `Task timed out after ${timeoutMs}ms`, startTime);
          return;
        case undefined:
          break;
      }

      if (!owned || this.registry.get(taskId)?.state !== "RUNNING") {
        this.layerLogger.debug("Discarded outcome of a superseded execution", { taskId });
        return;
      }

      if (outcome.ok) {
        const result = outcome.value;
        this.registry.apply(taskId, (draft) => completeTask(draft, result));
        this.audit(this.eventLogger.logTaskCompleted(taskId, result), "TaskCompleted", taskId);
        this.layerLogger.logOutput("executeTask", { taskId, success: true }, startTime);
      } else {
        this.recordFailure(taskId, describeError(outcome.error), startTime);
      }
    } finally {
      this.limiter.release();
    }
  }

  private recordFailure(taskId: string, message: string, startTime: number): void {
    this.registry.apply(taskId, (draft) => failTask(draft, message));
    this.audit(this.eventLogger.logTaskFailed(taskId, message), "TaskFailed", taskId);
    this.layerLogger.logError("executeTask", new Error(message), startTime);
  }

  /**
   * Execute the actual task logic using the configured executor.
   */
  private async executeTaskLogic(task: Task, signal: AbortSignal): Promise<JsonValue> {
    // If no executor configured, fall back to echo placeholder
    if (!this.executor) {
      return { text: `[No Executor] ${task.description}` };
    }
    return this.executor.execute(task, signal);
  }

  private enqueue(request: DispatchRequest): boolean {
    const accepted = this.queue.push(request);
    if (!accepted) {
      this.layerLogger.warn(`Queue closed, ${request.action} request dropped`, { taskId: request.taskId });
    }
    return accepted;
  }

  private track(job: Promise<void>): void {
    const tracked: Promise<void> = job
      .catch((error: unknown) => this.layerLogger.logError("task job", error))
      .finally(() => this.jobs.delete(tracked));
    this.jobs.add(tracked);
  }

  /**
   * Audit writes never fail the business action; a failed write is a warning.
   */
  private audit(write: Promise<void>, event: string, taskId: string): void {
    write.catch((error: unknown) => {
      this.layerLogger.warn(`Failed to log ${event} event`, { taskId, error: describeError(error) });
    });
  }

  private requireTask(taskId: string): Task {
    const task = this.registry.get(taskId);
    if (!task) {
      throw new TaskNotFoundError(taskId);
    }
    return task;
  }
}

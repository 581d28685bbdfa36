// Core Types for the deskflow task orchestrator and provider router

/**
 * Any value that survives a JSON round trip.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type JsonObject = { [key: string]: JsonValue };

/**
 * Kind of automated engineering work a task represents.
 * Also drives provider routing.
 */
export type TaskType = "PLAN" | "REVIEW" | "STATUS" | "FOLLOWUP" | "APPLY";

export const TASK_TYPES: readonly TaskType[] = ["PLAN", "REVIEW", "STATUS", "FOLLOWUP", "APPLY"];

/**
 * Task states for the orchestrator state machine.
 */
export type TaskState = "PENDING" | "RUNNING" | "COMPLETED" | "FAILED" | "CANCELLED" | "PAUSED";

export const TASK_STATES: readonly TaskState[] = [
  "PENDING",
  "RUNNING",
  "COMPLETED",
  "FAILED",
  "CANCELLED",
  "PAUSED",
];

/**
 * Task entity managed by the Orchestrator.
 */
export interface Task {
  /** Unique task identifier (UUID v4), never reassigned */
  id: string;
  type: TaskType;
  /** Human readable description */
  description: string;
  /** Opaque input supplied by the submitter */
  payload: JsonValue;
  /** Current state in the lifecycle */
  state: TaskState;
  /** Creation timestamp (ms since epoch) */
  createdAt: number;
  /** Last mutation timestamp (ms since epoch) */
  updatedAt: number;
  /** First time the task entered RUNNING */
  startedAt?: number;
  /** Time the task entered COMPLETED */
  completedAt?: number;
  retryCount: number;
  /** Set when the task enters FAILED */
  errorMessage?: string;
  /** Set when the task enters COMPLETED */
  result?: JsonValue;
}

/**
 * Actions a dispatch request can carry.
 */
export type TaskAction = "EXECUTE" | "RETRY" | "CANCEL" | "PAUSE" | "RESUME";

export interface DispatchRequest {
  taskId: string;
  action: TaskAction;
}

export type TaskEventType =
  | "TaskCreated"
  | "TaskStarted"
  | "TaskCompleted"
  | "TaskFailed"
  | "TaskCancelled"
  | "TaskRetried"
  | "StateTransition";

/**
 * Immutable audit record written by the EventLogger.
 */
export interface TaskEvent {
  eventId: string;
  taskId: string;
  eventType: TaskEventType;
  timestamp: number;
  details: JsonObject;
}

/**
 * One logger-scoped run: everything audited during a process lifetime.
 */
export interface RunSession {
  sessionId: string;
  startTime: number;
  endTime?: number;
  events: TaskEvent[];
}

/**
 * In-process notification emitted by the registry on every state change.
 */
export interface TaskStateChange {
  taskId: string;
  previousState: TaskState | null;
  newState: TaskState;
  timestamp: number;
}

/**
 * Backends a request can be routed to. "offline" is the sentinel recorded
 * when no backend produced a response.
 */
export type ProviderName = "claude" | "openrouter" | "offline";

export type ActiveProviderName = Exclude<ProviderName, "offline">;

export const ACTIVE_PROVIDERS: readonly ActiveProviderName[] = ["claude", "openrouter"];

export type MessageRole = "system" | "user" | "assistant";

export interface LlmMessage {
  role: MessageRole;
  content: string;
}

export interface LlmRequest {
  id: string;
  taskType: TaskType;
  messages: LlmMessage[];
  temperature?: number;
  maxTokens?: number;
}

export interface TokenUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface LlmResponse {
  /** Echoes the request id */
  id: string;
  provider: ProviderName;
  model: string;
  content: string;
  usage: TokenUsage;
  durationMs: number;
  /** Estimated cost in US cents */
  costCents?: number;
}

/**
 * One record per router invocation, whatever the outcome.
 */
export interface RouteLog {
  timestamp: number;
  requestId: string;
  taskType: TaskType;
  attemptedProvider: ProviderName;
  finalProvider: ProviderName;
  success: boolean;
  durationMs: number;
  errorMessage?: string;
  retryCount: number;
  costCents?: number;
  tokensUsed: number;
}

export interface RoutingStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  providerUsage: Partial<Record<ProviderName, number>>;
  averageDurationMs: number;
  totalCostCents: number;
}

export interface ProviderConfig {
  apiKey: string;
  baseUrl: string;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface RouteConfig {
  provider: ProviderName;
  temperature: number;
}

/**
 * Router configuration. Read-only once the router is built.
 */
export interface LlmConfig {
  defaultProvider: ProviderName;
  /** Deadline for one `generate` call, fallback rounds and backoff included */
  timeoutMs: number;
  maxRetries: number;
  /** First fallback backoff; doubles every round */
  baseDelayMs: number;
  providers: Partial<Record<ActiveProviderName, ProviderConfig>>;
  routing: Partial<Record<TaskType, RouteConfig>>;
  offlineMode: boolean;
}

export interface OrchestratorConfig {
  /** Upper bound on tasks executing at once */
  maxConcurrentTasks: number;
  /** Deadline for a single execution attempt (ms) */
  taskTimeoutMs: number;
  /** Directory that receives one sub-directory per run session */
  logDirectory: string;
}

export interface StorageConfig {
  /** Application log files */
  logsPath?: string;
  /** Directory holding the routing audit log (log.jsonl) */
  routerLogPath: string;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface SystemConfig {
  llm: LlmConfig;
  orchestrator: OrchestratorConfig;
  storage: StorageConfig;
  logLevel: LogLevel;
}

export type ServiceLayer = "orchestrator" | "events" | "router" | "provider" | "config" | "cli";

export interface TraceContext {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  layer: ServiceLayer;
  startTime: number;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  context?: Record<string, unknown>;
  layer?: ServiceLayer;
  traceId?: string;
  spanId?: string;
  parentSpanId?: string;
}

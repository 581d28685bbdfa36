// Logger utility with service layer tracking and trace context

import fs from "fs";
import path from "path";
import { AsyncLocalStorage } from "async_hooks";
import type { LogEntry, LogLevel, ServiceLayer, TraceContext, SystemConfig } from "../types/index.js";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Generate a short unique ID for trace/span identification.
 */
function generateId(): string {
  return Math.random().toString(36).substring(2, 10) + Date.now().toString(36);
}

/**
 * AsyncLocalStorage for propagating trace context across async boundaries.
 */
const traceStorage = new AsyncLocalStorage<TraceContext>();

/**
 * Get the current trace context from AsyncLocalStorage.
 */
export function getTraceContext(): TraceContext | undefined {
  return traceStorage.getStore();
}

/**
 * Run an async function within a trace context.
 * Inherits the trace id of the surrounding context, if any.
 */
export async function runWithTraceAsync<T>(
  layer: ServiceLayer,
  fn: () => Promise<T>
): Promise<T> {
  const parentContext = getTraceContext();

  const context: TraceContext = {
    traceId: parentContext?.traceId ?? generateId(),
    spanId: generateId(),
    parentSpanId: parentContext?.spanId,
    layer,
    startTime: Date.now(),
  };

  return traceStorage.run(context, fn);
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

/**
 * Resolve the minimum level: DESKFLOW_LOG_LEVEL wins over config.
 */
function resolveLevel(config?: SystemConfig): LogLevel {
  const envLevel = process.env.DESKFLOW_LOG_LEVEL;
  if (isLogLevel(envLevel)) {
    return envLevel;
  }
  return config?.logLevel ?? "info";
}

export class Logger {
  private logFile: string | null = null;
  private minLevel: LogLevel;
  private fileErrorLogged = false;
  private defaultLayer?: ServiceLayer;

  constructor(config?: SystemConfig, defaultLayer?: ServiceLayer) {
    this.defaultLayer = defaultLayer;
    this.minLevel = resolveLevel(config);
    if (config?.storage.logsPath) {
      const date = new Date().toISOString().split("T")[0];
      this.logFile = path.join(config.storage.logsPath, `deskflow-${date}.log`);
    }
  }

  /**
   * Create a child logger bound to a specific service layer.
   */
  forLayer(layer: ServiceLayer): LayerLogger {
    return new LayerLogger(this, layer);
  }

  private log(
    level: LogLevel,
    message: string,
    context?: Record<string, unknown>,
    layer?: ServiceLayer
  ): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.minLevel]) {
      return;
    }

    const traceCtx = getTraceContext();
    const effectiveLayer = layer ?? this.defaultLayer ?? traceCtx?.layer;

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      context: context ? sanitizeRecord(context) : undefined,
      layer: effectiveLayer,
      traceId: traceCtx?.traceId,
      spanId: traceCtx?.spanId,
      parentSpanId: traceCtx?.parentSpanId,
    };

    const colors: Record<LogLevel, string> = {
      debug: "\x1b[36m", // cyan
      info: "\x1b[32m", // green
      warn: "\x1b[33m", // yellow
      error: "\x1b[31m", // red
    };
    const layerColors: Record<ServiceLayer, string> = {
      orchestrator: "\x1b[34m", // blue
      events: "\x1b[94m", // bright blue
      router: "\x1b[95m", // bright magenta
      provider: "\x1b[35m", // magenta
      config: "\x1b[90m", // gray
      cli: "\x1b[96m", // bright cyan
    };
    const reset = "\x1b[0m";
    const dim = "\x1b[2m";

    const levelPrefix = `${colors[level]}[${level.toUpperCase().padEnd(5)}]${reset}`;
    const layerPrefix = effectiveLayer
      ? `${layerColors[effectiveLayer]}[${effectiveLayer.toUpperCase().padEnd(12)}]${reset}`
      : "[            ]";
    const tracePrefix = traceCtx?.traceId
      ? `${dim}[${traceCtx.traceId.substring(0, 8)}]${reset}`
      : "";

    const line = `${levelPrefix} ${layerPrefix} ${tracePrefix} ${message}`;
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }

    // File output
    if (this.logFile) {
      try {
        fs.appendFileSync(this.logFile, JSON.stringify(entry) + "\n");
      } catch (err) {
        if (!this.fileErrorLogged) {
          console.error(`[LOGGER ERROR] Failed to write to log file: ${this.logFile}`, err);
          this.fileErrorLogged = true;
        }
      }
    }
  }

  debug(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("debug", message, context, layer);
  }

  info(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("info", message, context, layer);
  }

  warn(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("warn", message, context, layer);
  }

  error(message: string, context?: Record<string, unknown>, layer?: ServiceLayer): void {
    this.log("error", message, context, layer);
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }
}

/**
 * Layer-specific logger that automatically tags logs with a service layer.
 */
export class LayerLogger {
  constructor(
    private parent: Logger,
    private layer: ServiceLayer
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.debug(message, context, this.layer);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.info(message, context, this.layer);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.warn(message, context, this.layer);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.parent.error(message, context, this.layer);
  }

  /**
   * Log the start of an operation with input data.
   */
  logInput(operation: string, input: unknown): void {
    this.debug(`→ ${operation}`, { input });
  }

  /**
   * Log the completion of an operation with output data and duration.
   */
  logOutput(operation: string, output: unknown, startTime: number): void {
    const durationMs = Date.now() - startTime;
    this.debug(`← ${operation} (${durationMs}ms)`, { output, durationMs });
  }

  /**
   * Log an operation failure with error details and duration.
   */
  logError(operation: string, error: unknown, startTime?: number): void {
    const durationMs = startTime !== undefined ? Date.now() - startTime : undefined;
    this.error(`✗ ${operation} failed${durationMs !== undefined ? ` (${durationMs}ms)` : ""}`, {
      error: error instanceof Error ? { message: error.message, stack: error.stack } : error,
      durationMs,
    });
  }
}

const SENSITIVE_KEYS = ["password", "secret", "apikey", "api_key", "authorization", "accesstoken", "authtoken"];

/**
 * Sanitize data for logging (truncate large values, redact sensitive fields).
 */
export function sanitizeForLog(data: unknown, maxDepth = 4, currentDepth = 0): unknown {
  if (currentDepth >= maxDepth) {
    return "[MAX_DEPTH]";
  }

  if (data === null || data === undefined) {
    return data;
  }

  if (typeof data === "string") {
    return data.length > 500 ? data.substring(0, 500) + "...[truncated]" : data;
  }

  if (typeof data !== "object") {
    return data;
  }

  if (Array.isArray(data)) {
    const items = data.slice(0, 10).map((item) => sanitizeForLog(item, maxDepth, currentDepth + 1));
    if (data.length > 10) {
      items.push(`...[${data.length - 10} more]`);
    }
    return items;
  }

  return sanitizeRecord(data, maxDepth, currentDepth);
}

function sanitizeRecord(data: object, maxDepth = 4, currentDepth = 0): Record<string, unknown> {
  const sanitized: Record<string, unknown> = {};
  const entries = Object.entries(data);

  for (const [key, value] of entries.slice(0, 20)) {
    // token counters (promptTokens, tokensUsed) are not credentials, so "token" only matches exactly
    const lowered = key.toLowerCase();
    const sensitive = lowered === "token" || SENSITIVE_KEYS.some((sk) => lowered.includes(sk));
    sanitized[key] = sensitive ? "[REDACTED]" : sanitizeForLog(value, maxDepth, currentDepth + 1);
  }
  if (entries.length > 20) {
    sanitized["..."] = `[${entries.length - 20} more keys]`;
  }

  return sanitized;
}

export function createLogger(config?: SystemConfig, defaultLayer?: ServiceLayer): Logger {
  return new Logger(config, defaultLayer);
}

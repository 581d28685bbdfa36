/**
 * EventLogger
 *
 * Append-only audit log for one run session. Every event is written as a
 * JSON line to `events.jsonl` inside the session directory and kept in
 * memory; `finalizeSession()` dumps the whole session to `run.json`.
 *
 * Appends go through one promise chain, so the file order always equals the
 * call order even when callers do not await.
 */

import path from "path";
import fs from "fs/promises";
import { randomUUID } from "node:crypto";
import type { JsonObject, JsonValue, RunSession, Task, TaskEvent, TaskEventType, TaskState } from "../types/index.js";
import { parseRunSession } from "../types/schemas.js";

const EVENTS_FILE = "events.jsonl";
const SESSION_FILE = "run.json";

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * `YYYYMMDD_HHMMSS_<first 8 chars of the session id>`, in UTC.
 */
export function formatSessionDirectoryName(sessionId: string, startTime: number): string {
  const d = new Date(startTime);
  const date = `${d.getUTCFullYear()}${pad(d.getUTCMonth() + 1)}${pad(d.getUTCDate())}`;
  const time = `${pad(d.getUTCHours())}${pad(d.getUTCMinutes())}${pad(d.getUTCSeconds())}`;
  return `${date}_${time}_${sessionId.slice(0, 8)}`;
}

export class EventLogger {
  private session: RunSession;
  private writeChain: Promise<void> = Promise.resolve();

  private constructor(
    private readonly sessionDir: string,
    sessionId: string,
    startTime: number
  ) {
    this.session = { sessionId, startTime, events: [] };
  }

  /**
   * Allocate a session id and create its directory under `baseDir`.
   */
  static async create(baseDir: string): Promise<EventLogger> {
    const sessionId = randomUUID();
    const startTime = Date.now();
    const sessionDir = path.join(baseDir, formatSessionDirectoryName(sessionId, startTime));
    await fs.mkdir(sessionDir, { recursive: true });
    return new EventLogger(sessionDir, sessionId, startTime);
  }

  /**
   * Read every finalized session under `baseDir`, oldest first. Directories
   * without a readable run.json are skipped.
   */
  static async listSessions(baseDir: string): Promise<RunSession[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(baseDir);
    } catch {
      // No sessions recorded yet
      return [];
    }

    const sessions: RunSession[] = [];
    for (const entry of entries.sort()) {
      try {
        const content = await fs.readFile(path.join(baseDir, entry, SESSION_FILE), "utf-8");
        sessions.push(parseRunSession(content));
      } catch {
        continue;
      }
    }
    return sessions;
  }

  logTaskCreated(task: Task): Promise<void> {
    return this.logEvent(task.id, "TaskCreated", {
      type: task.type,
      description: task.description,
      payload: task.payload,
    });
  }

  logTaskStarted(taskId: string): Promise<void> {
    return this.logEvent(taskId, "TaskStarted", {});
  }

  logTaskCompleted(taskId: string, result: JsonValue): Promise<void> {
    return this.logEvent(taskId, "TaskCompleted", { result });
  }

  logTaskFailed(taskId: string, error: string): Promise<void> {
    return this.logEvent(taskId, "TaskFailed", { error });
  }

  logTaskCancelled(taskId: string, reason: string): Promise<void> {
    return this.logEvent(taskId, "TaskCancelled", { reason });
  }

  logTaskRetried(taskId: string, retryCount: number): Promise<void> {
    return this.logEvent(taskId, "TaskRetried", { retryCount });
  }

  logStateTransition(taskId: string, from: TaskState, to: TaskState): Promise<void> {
    return this.logEvent(taskId, "StateTransition", { from, to });
  }

  /**
   * Stamp the end time and write the session summary.
   */
  async finalizeSession(): Promise<void> {
    await this.writeChain;
    this.session.endTime = Date.now();
    await fs.writeFile(path.join(this.sessionDir, SESSION_FILE), JSON.stringify(this.session, null, 2));
  }

  getSessionId(): string {
    return this.session.sessionId;
  }

  getSessionDirectory(): string {
    return this.sessionDir;
  }

  getEvents(): TaskEvent[] {
    return structuredClone(this.session.events);
  }

  getSession(): RunSession {
    return structuredClone(this.session);
  }

  /**
   * Record the event in memory right away and queue its append. The returned
   * promise rejects if this particular append fails; later appends still run.
   */
  private logEvent(taskId: string, eventType: TaskEventType, details: JsonObject): Promise<void> {
    const event: TaskEvent = {
      eventId: randomUUID(),
      taskId,
      eventType,
      timestamp: Date.now(),
      details,
    };
    this.session.events.push(event);

    const line = JSON.stringify(event) + "\n";
    const write = this.writeChain.then(() => fs.appendFile(path.join(this.sessionDir, EVENTS_FILE), line));
    this.writeChain = write.catch(() => undefined);
    return write;
  }
}

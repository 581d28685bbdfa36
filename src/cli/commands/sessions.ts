/**
 * Sessions command - run sessions recorded under the orchestrator log directory
 */

import { EventLogger } from "../../orchestrator/EventLogger.js";
import { loadCliContext } from "../utils/context.js";
import { formatTimestamp, printData, printHeader, printInfo } from "../utils/output.js";
import type { CliOptions } from "../types.js";

export async function sessionsCommand(options: CliOptions): Promise<void> {
  const context = loadCliContext(options);
  const logDirectory = context.config.orchestrator.logDirectory;
  const sessions = await EventLogger.listSessions(logDirectory);

  if (options.json) {
    printData(sessions, true);
    return;
  }

  printHeader("Run Sessions");
  if (sessions.length === 0) {
    printInfo(`No sessions found in ${logDirectory}`);
    return;
  }
  printData(
    sessions.map((session) => ({
      sessionId: session.sessionId,
      started: formatTimestamp(session.startTime),
      ended: formatTimestamp(session.endTime),
      tasks: new Set(session.events.map((event) => event.taskId)).size,
      events: session.events.length,
    }))
  );
}

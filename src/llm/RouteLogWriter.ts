// Append-only JSON-lines sink for routing outcomes

import path from "path";
import fs from "fs/promises";
import type { RouteLog } from "../types/index.js";
import { parseRouteLog } from "../types/schemas.js";

export const ROUTE_LOG_FILE = "log.jsonl";

export class RouteLogWriter {
  private readonly filePath: string;
  private writeChain: Promise<void> = Promise.resolve();

  constructor(logDirectory: string) {
    this.filePath = path.join(logDirectory, ROUTE_LOG_FILE);
  }

  getFilePath(): string {
    return this.filePath;
  }

  append(entry: RouteLog): Promise<void> {
    const line = JSON.stringify(entry) + "\n";
    const write = this.writeChain.then(async () => {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.appendFile(this.filePath, line);
    });
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  /**
   * Read back every well-formed entry. Malformed lines are skipped.
   */
  async readAll(): Promise<RouteLog[]> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, "utf-8");
    } catch {
      // Nothing routed yet
      return [];
    }

    const entries: RouteLog[] = [];
    for (const line of content.split("\n")) {
      if (!line.trim()) {
        continue;
      }
      try {
        entries.push(parseRouteLog(line));
      } catch {
        continue;
      }
    }
    return entries;
  }
}

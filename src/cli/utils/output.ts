/**
 * Output formatting utilities for CLI
 */

import type { OutputFormat } from "../types.js";
import Table from "cli-table3";
import chalk from "chalk";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Format output based on format type */
export function formatOutput<T>(
  data: T,
  format: OutputFormat = "table"
): string {
  if (format === "json") {
    return JSON.stringify(data, null, 2);
  }

  // Default table formatting for objects
  if (typeof data === "object" && data !== null) {
    return formatAsTable(data);
  }

  return String(data);
}

/** Format object as table */
export function formatAsTable(data: unknown): string {
  if (Array.isArray(data)) {
    if (data.length === 0) return "No data";

    const first: unknown = data[0];
    if (!isRecord(first)) {
      return data.map(formatValue).join("\n");
    }

    const keys = Object.keys(first);
    const table = new Table({
      head: keys.map((k) => chalk.cyan(k)),
    });

    for (const item of data) {
      const row = isRecord(item) ? item : {};
      table.push(keys.map((k) => formatValue(row[k])));
    }

    return table.toString();
  }

  if (!isRecord(data)) {
    return String(data);
  }

  // Handle single object
  const table = new Table({
    colWidths: [24, 60],
    wordWrap: true,
  });

  for (const [key, value] of Object.entries(data)) {
    table.push([chalk.cyan(key), formatValue(value)]);
  }

  return table.toString();
}

/** Format a value for display */
function formatValue(value: unknown): string {
  if (value === null) return chalk.gray("null");
  if (value === undefined) return chalk.gray("-");
  if (typeof value === "boolean") return value ? chalk.green("true") : chalk.red("false");
  if (typeof value === "number") return String(value);
  if (typeof value === "string") return value;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `[${value.length} items]`;
  return JSON.stringify(value);
}

/** Format an epoch-ms timestamp, or "-" when absent */
export function formatTimestamp(ms: number | undefined): string {
  return ms === undefined ? "-" : new Date(ms).toISOString();
}

/** Print data as JSON or a table depending on --json */
export function printData(data: unknown, json = false): void {
  console.log(formatOutput(data, json ? "json" : "table"));
}

/** Print success message */
export function printSuccess(message: string): void {
  console.log(chalk.green("✓"), message);
}

/** Print error message */
export function printError(message: string): void {
  console.error(chalk.red("✗"), message);
}

/** Print warning message */
export function printWarning(message: string): void {
  console.warn(chalk.yellow("⚠"), message);
}

/** Print info message */
export function printInfo(message: string): void {
  console.log(chalk.blue("ℹ"), message);
}

/** Print header */
export function printHeader(title: string): void {
  console.log("\n" + chalk.bold.cyan(title));
  console.log(chalk.gray("─".repeat(50)));
}

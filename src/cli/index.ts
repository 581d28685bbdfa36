/**
 * deskflow CLI - Main entry point
 */

import { Command } from "commander";
import { describeError } from "../llm/errors.js";
import { printError } from "./utils/output.js";
import type { AskOptions, CliOptions, RunOptions } from "./types.js";
import { providersCommand } from "./commands/providers.js";
import { askCommand } from "./commands/ask.js";
import { runCommand } from "./commands/run.js";
import { statsCommand } from "./commands/stats.js";
import { sessionsCommand } from "./commands/sessions.js";

/** Helper to get global CLI options from a command */
function getCliOptions(command: Command): CliOptions {
  const opts = command.optsWithGlobals();
  return {
    json: opts.json === true,
    config: typeof opts.config === "string" ? opts.config : undefined,
  };
}

/** Print a failed command's error and flag the exit code */
async function guarded(action: () => Promise<void>): Promise<void> {
  try {
    await action();
  } catch (error) {
    printError(describeError(error));
    process.exitCode = 1;
  }
}

/** Create CLI program */
export function createCli(): Command {
  const program = new Command();

  program
    .name("deskflow")
    .description("Task orchestrator with multi-provider LLM routing")
    .version("0.1.0");

  // Global options
  program.option("--json", "Output in JSON format");
  program.option("-c, --config <path>", "Path to config.json (default: ~/.deskflow/config.json)");

  program.command("providers")
    .description("List configured LLM providers and their availability")
    .action(async (_options: unknown, command: Command) => {
      await guarded(() => providersCommand(getCliOptions(command)));
    });

  program.command("ask")
    .description("Send one prompt through the provider router")
    .argument("<prompt...>", "Prompt text")
    .option("-t, --type <type>", "Task type used for routing (PLAN, REVIEW, STATUS, FOLLOWUP, APPLY)")
    .option("--offline", "Force offline mode")
    .action(async (prompt: string[], options: Pick<AskOptions, "type" | "offline">, command: Command) => {
      await guarded(() => askCommand(prompt, { ...getCliOptions(command), ...options }));
    });

  program.command("run")
    .description("Run one task through the orchestrator and wait for it to finish")
    .argument("<type>", "Task type (PLAN, REVIEW, STATUS, FOLLOWUP, APPLY)")
    .argument("<description>", "Task description")
    .option("-p, --payload <json>", "Task payload as JSON")
    .option("--timeout <ms>", "Execution deadline in milliseconds")
    .action(async (type: string, description: string, options: Pick<RunOptions, "payload" | "timeout">, command: Command) => {
      await guarded(() => runCommand(type, description, { ...getCliOptions(command), ...options }));
    });

  program.command("stats")
    .description("Show routing statistics from the route log")
    .action(async (_options: unknown, command: Command) => {
      await guarded(() => statsCommand(getCliOptions(command)));
    });

  program.command("sessions")
    .description("List recorded run sessions")
    .action(async (_options: unknown, command: Command) => {
      await guarded(() => sessionsCommand(getCliOptions(command)));
    });

  return program;
}

/** Run CLI */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = createCli();
  await program.parseAsync(argv);
}

/**
 * CLI types and interfaces
 */

import type { SystemConfig } from "../types/index.js";
import type { Logger } from "../utils/logger.js";

/** Global command options */
export interface CliOptions {
  json?: boolean;
  config?: string;
}

/** Output format */
export type OutputFormat = "table" | "json";

export interface AskOptions extends CliOptions {
  type?: string;
  offline?: boolean;
}

export interface RunOptions extends CliOptions {
  payload?: string;
  timeout?: string;
}

/** One row of `deskflow providers` */
export interface ProviderStatusRow {
  provider: string;
  model: string;
  baseUrl: string;
  apiKey: string;
  available: boolean;
  default: boolean;
}

/** CLI context passed to commands */
export interface CliContext {
  config: SystemConfig;
  logger: Logger;
  options: CliOptions;
}

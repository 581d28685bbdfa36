#!/usr/bin/env node

// CLI entry point for deskflow

import { runCli } from "./cli/index.js";

runCli().catch((error: unknown) => {
  console.error("CLI error:", error);
  process.exit(1);
});

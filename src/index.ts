// Main entry point

export * from "./types/index.js";
export * from "./types/schemas.js";
export * from "./config/index.js";
export * from "./orchestrator/index.js";
export * from "./llm/index.js";
export * from "./utils/logger.js";

// Configuration loader and validator

import fs from "fs";
import path from "path";
import { homedir } from "os";
import { z } from "zod";
import type { SystemConfig } from "../types/index.js";
import { ProviderNameSchema } from "../types/schemas.js";
import { InvalidConfigError } from "../llm/errors.js";
import { isUsableApiKey } from "../llm/providers/BaseLlmProvider.js";

const DEFAULT_STORAGE_BASE = path.join(homedir(), ".deskflow");
const DEFAULT_CONFIG_PATH = path.join(DEFAULT_STORAGE_BASE, "config.json");

const ProviderConfigSchema = z.object({
  apiKey: z.string(),
  baseUrl: z.string().url(),
  model: z.string().min(1),
  maxTokens: z.number().int().positive(),
  timeoutMs: z.number().int().positive(),
});

const RouteConfigSchema = z.object({
  provider: ProviderNameSchema,
  temperature: z.number().min(0).max(2),
});

const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]);

const SystemConfigSchema = z.object({
  llm: z.object({
    defaultProvider: ProviderNameSchema,
    timeoutMs: z.number().int().positive(),
    maxRetries: z.number().int().nonnegative(),
    baseDelayMs: z.number().nonnegative(),
    providers: z.object({
      claude: ProviderConfigSchema.optional(),
      openrouter: ProviderConfigSchema.optional(),
    }),
    routing: z.object({
      PLAN: RouteConfigSchema.optional(),
      REVIEW: RouteConfigSchema.optional(),
      STATUS: RouteConfigSchema.optional(),
      FOLLOWUP: RouteConfigSchema.optional(),
      APPLY: RouteConfigSchema.optional(),
    }),
    offlineMode: z.boolean(),
  }),
  orchestrator: z.object({
    maxConcurrentTasks: z.number().int().positive(),
    taskTimeoutMs: z.number().int().positive(),
    logDirectory: z.string().min(1),
  }),
  storage: z.object({
    logsPath: z.string().optional(),
    routerLogPath: z.string().min(1),
  }),
  logLevel: LogLevelSchema,
});

export function getDefaultConfig(): SystemConfig {
  return {
    llm: {
      defaultProvider: "claude",
      timeoutMs: 30000,
      maxRetries: 3,
      baseDelayMs: 500,
      providers: {
        claude: {
          apiKey: "${ANTHROPIC_API_KEY}",
          baseUrl: "https://api.anthropic.com/v1",
          model: "claude-3-5-sonnet-20241022",
          maxTokens: 4096,
          timeoutMs: 30000,
        },
        openrouter: {
          apiKey: "${OPENROUTER_API_KEY}",
          baseUrl: "https://openrouter.ai/api/v1",
          model: "anthropic/claude-3.5-sonnet",
          maxTokens: 4096,
          timeoutMs: 30000,
        },
      },
      routing: {
        PLAN: { provider: "claude", temperature: 0.3 },
        REVIEW: { provider: "claude", temperature: 0.1 },
        STATUS: { provider: "openrouter", temperature: 0.0 },
        FOLLOWUP: { provider: "claude", temperature: 0.2 },
        APPLY: { provider: "claude", temperature: 0.0 },
      },
      offlineMode: false,
    },
    orchestrator: {
      maxConcurrentTasks: 5,
      taskTimeoutMs: 30000,
      logDirectory: "runs",
    },
    storage: {
      logsPath: path.join(DEFAULT_STORAGE_BASE, "logs"),
      routerLogPath: "logs",
    },
    logLevel: "info",
  };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Objects merge key by key; anything else in `override` replaces `base`.
 */
function deepMerge(base: unknown, override: unknown): unknown {
  if (override === undefined) {
    return base;
  }
  if (!isPlainObject(base) || !isPlainObject(override)) {
    return override;
  }
  const result: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(override)) {
    result[key] = deepMerge(base[key], value);
  }
  return result;
}

/**
 * Replace `${VAR}` with the environment value. Unset variables keep the
 * placeholder, which leaves the matching provider unavailable.
 */
export function expandEnvPlaceholders(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    return value.replace(/\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match: string, name: string) => env[name] ?? match);
  }
  if (Array.isArray(value)) {
    return value.map((item) => expandEnvPlaceholders(item, env));
  }
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([key, item]) => [key, expandEnvPlaceholders(item, env)]));
  }
  return value;
}

/**
 * Apply environment variables to config
 * Priority: env > config.json > defaults
 */
function applyEnvironmentVariables(config: SystemConfig, env: NodeJS.ProcessEnv): SystemConfig {
  const result = structuredClone(config);

  const offline = env.DESKFLOW_OFFLINE?.toLowerCase();
  if (offline === "1" || offline === "true") {
    result.llm.offlineMode = true;
  } else if (offline === "0" || offline === "false") {
    result.llm.offlineMode = false;
  }

  const level = LogLevelSchema.safeParse(env.DESKFLOW_LOG_LEVEL);
  if (level.success) {
    result.logLevel = level.data;
  }

  return result;
}

function validate(raw: unknown, source: string): SystemConfig {
  const parsed = SystemConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new InvalidConfigError(`${source}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Load configuration: defaults, deep-merged with the JSON file (when
 * present), placeholders expanded, environment overrides applied, validated.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): SystemConfig {
  const explicitPath = configPath ?? env.DESKFLOW_CONFIG;
  const filePath = explicitPath ?? DEFAULT_CONFIG_PATH;
  let fileConfig: unknown = {};

  if (fs.existsSync(filePath)) {
    let content: string;
    try {
      content = fs.readFileSync(filePath, "utf-8");
    } catch (error) {
      throw new InvalidConfigError(`cannot read ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    }
    try {
      fileConfig = JSON.parse(content);
    } catch (error) {
      throw new InvalidConfigError(`${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
    }
    if (!isPlainObject(fileConfig)) {
      throw new InvalidConfigError(`${filePath} must contain a JSON object`);
    }
  } else if (explicitPath !== undefined) {
    throw new InvalidConfigError(`config file not found: ${filePath}`);
  }

  const merged = expandEnvPlaceholders(deepMerge(getDefaultConfig(), fileConfig), env);
  return applyEnvironmentVariables(validate(merged, filePath), env);
}

export function ensureStorageDirectories(config: SystemConfig): void {
  const { logsPath } = config.storage;
  if (logsPath && !fs.existsSync(logsPath)) {
    fs.mkdirSync(logsPath, { recursive: true });
  }
}

export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  const envPath = env.DESKFLOW_CONFIG;
  if (envPath) {return envPath;}
  return DEFAULT_CONFIG_PATH;
}

/**
 * Show only the ends of a key. Placeholders are returned as-is.
 */
export function maskApiKey(apiKey: string): string {
  if (!isUsableApiKey(apiKey)) {
    return apiKey;
  }
  if (apiKey.length <= 8) {
    return "****";
  }
  return `${apiKey.slice(0, 4)}...${apiKey.slice(-4)}`;
}

import fsSync from "node:fs";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { DEFAULT_EVENT_QUEUE_CAPACITY } from "./agent/orchestrator.js";
import { DEFAULT_BREAKER_TIMEOUT_MS, DEFAULT_FAILURE_THRESHOLD } from "./providers/circuit-breaker.js";
import { DEFAULT_ROTATION_COOLDOWN_MS } from "./providers/rotation.js";

const DEFAULT_CONFIG_PATH = "steerloop.config.json";
const CONFIG_ENV_VAR = "STEERLOOP_CONFIG";

const LogLevelSchema = z.enum(["trace", "debug", "info", "warn", "error", "silent"]);

const LoggingSchema = z.object({
  level: LogLevelSchema.default("info"),
  filePath: z.string().optional(),
  fileLevel: LogLevelSchema.optional(),
});

const AgentSchema = z.object({
  systemPrompt: z.string().default(""),
  eventQueueCapacity: z.number().int().positive().default(DEFAULT_EVENT_QUEUE_CAPACITY),
});

const CircuitBreakerSchema = z.object({
  failureThreshold: z.number().int().positive().default(DEFAULT_FAILURE_THRESHOLD),
  timeoutMs: z.number().int().positive().default(DEFAULT_BREAKER_TIMEOUT_MS),
});

const RotationProfileSchema = z.object({
  name: z.string().min(1),
  /** Key into the backends map handed to the provider factory. */
  backend: z.string().min(1),
  apiKey: z.string().default(""),
  weight: z.number().int().positive().default(1),
});

const RotationSchema = z.object({
  strategy: z.enum(["round_robin", "least_used", "random"]).default("round_robin"),
  cooldownMs: z.number().int().positive().default(DEFAULT_ROTATION_COOLDOWN_MS),
  profiles: z.array(RotationProfileSchema).default([]),
});

const ResilienceSchema = z
  .object({
    mode: z.enum(["direct", "failover", "rotation"]).default("direct"),
    primary: z.string().min(1).optional(),
    fallback: z.string().min(1).optional(),
    circuitBreaker: CircuitBreakerSchema.default({}),
    rotation: RotationSchema.default({}),
  })
  .superRefine((value, ctx) => {
    if (value.mode !== "rotation" && !value.primary) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["primary"],
        message: `resilience.primary is required for ${value.mode} mode`,
      });
    }
    if (value.mode === "direct" && value.fallback) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["fallback"],
        message: "resilience.fallback needs failover or rotation mode",
      });
    }
    if (value.mode === "rotation" && value.rotation.profiles.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["rotation", "profiles"],
        message: "resilience.rotation.profiles needs at least one profile for rotation mode",
      });
    }
    const seen = new Set<string>();
    for (const profile of value.rotation.profiles) {
      if (seen.has(profile.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["rotation", "profiles"],
          message: `duplicate rotation profile: ${profile.name}`,
        });
      }
      seen.add(profile.name);
    }
  });

const ConfigSchema = z.object({
  workspaceDir: z.string().default("."),
  logging: LoggingSchema.default({}),
  agent: AgentSchema.default({}),
  resilience: ResilienceSchema,
});

export type RotationProfileConfig = z.infer<typeof RotationProfileSchema>;
export type ResilienceConfig = z.infer<typeof ResilienceSchema>;

export type SteerloopConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    workspaceDir: string;
    logFilePath?: string;
    logFileLevel: z.infer<typeof LogLevelSchema>;
    /** Rotation profiles with env-var API key references resolved. */
    profiles: RotationProfileConfig[];
  };
};

export class ConfigError extends Error {
  readonly configPath?: string;
  readonly issues: string[];

  constructor(message: string, params: { configPath?: string; issues?: string[]; cause?: unknown } = {}) {
    super(message, { cause: params.cause });
    this.name = "ConfigError";
    this.configPath = params.configPath;
    this.issues = params.issues ?? [];
  }
}

export async function loadConfig(explicitPath?: string): Promise<SteerloopConfig> {
  const configPath = resolveConfigPath(explicitPath);

  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    throw new ConfigError(`Failed to read config file ${configPath}`, { configPath, cause: err });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Invalid JSON in config file ${configPath}`, { configPath, cause: err });
  }

  return parseConfig(parsed, { configPath, baseDir: path.dirname(configPath) });
}

/**
 * Validate an already-parsed config object. Relative paths resolve against
 * `baseDir` (the config file's directory when loaded from disk).
 */
export function parseConfig(
  input: unknown,
  params: { configPath?: string; baseDir?: string } = {}
): SteerloopConfig {
  const result = ConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const where = issue.path.join(".");
      return where ? `${where}: ${issue.message}` : issue.message;
    });
    throw new ConfigError(`Invalid config: ${issues.join("; ")}`, {
      configPath: params.configPath,
      issues,
    });
  }
  return resolveConfig(result.data, params);
}

/**
 * Explicit path, then STEERLOOP_CONFIG, then the nearest steerloop.config.json
 * from the working directory upwards, then steerloop.config.json in cwd.
 */
export function resolveConfigPath(explicitPath?: string): string {
  const explicit = explicitPath?.trim();
  if (explicit) return resolveUserPath(explicit);

  const envPath = process.env[CONFIG_ENV_VAR]?.trim();
  if (envPath) return resolveUserPath(envPath);

  const discovered = findConfigUpwards(process.cwd());
  if (discovered) return discovered;

  return path.resolve(process.cwd(), DEFAULT_CONFIG_PATH);
}

function findConfigUpwards(startDir: string): string | null {
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, DEFAULT_CONFIG_PATH);
    if (fsSync.existsSync(candidate)) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

function resolveConfig(
  base: z.infer<typeof ConfigSchema>,
  params: { configPath?: string; baseDir?: string }
): SteerloopConfig {
  const workspaceDir = resolveUserPath(base.workspaceDir, params.baseDir);
  const logFilePath = base.logging.filePath?.trim()
    ? resolveUserPath(base.logging.filePath, workspaceDir)
    : undefined;
  const logFileLevel = base.logging.fileLevel ?? base.logging.level;

  const profiles = base.resilience.rotation.profiles.map((profile) => {
    try {
      return { ...profile, apiKey: resolveApiKeyMaybeFromEnv(profile.apiKey) };
    } catch (err) {
      throw new ConfigError(`Rotation profile ${profile.name}: ${err instanceof Error ? err.message : String(err)}`, {
        configPath: params.configPath,
        cause: err,
      });
    }
  });

  return {
    ...base,
    resolved: {
      workspaceDir,
      logFilePath,
      logFileLevel,
      profiles,
    },
  };
}

/**
 * Name of the env var referenced by `$NAME`, `${NAME}`, `${ENV:NAME}` or
 * `env:name`; null for a literal value.
 */
export function parseEnvVarReference(value: string): string | null {
  const raw = value.trim();
  if (!raw) return null;
  if (/^\$[A-Z0-9_]+$/.test(raw)) return raw.slice(1);
  const braced = raw.match(/^\$\{([A-Z0-9_]+)\}$/);
  if (braced?.[1]) return braced[1];
  const bracedEnv = raw.match(/^\$\{ENV:([A-Z0-9_]+)\}$/);
  if (bracedEnv?.[1]) return bracedEnv[1];
  const envPrefix = raw.match(/^env:([A-Z0-9_]+)$/i);
  if (envPrefix?.[1]) return envPrefix[1].toUpperCase();
  return null;
}

export function resolveApiKeyMaybeFromEnv(value: string): string {
  const ref = parseEnvVarReference(value);
  if (!ref) return value;
  const resolved = (process.env[ref] || "").trim();
  if (!resolved) {
    throw new Error(`Missing API key: env var ${ref} is not set`);
  }
  return resolved;
}

export function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed.startsWith("~")) {
    return path.join(os.homedir(), trimmed.slice(1));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}

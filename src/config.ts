import { z } from "zod";
import { readFileSync } from "node:fs";
import { join } from "node:path";
import { homedir } from "node:os";

// ============================================================
// Zod Schema for routewise Configuration
// ============================================================

const PricingSchema = z.object({
  inputPer1k: z.number().min(0),
  outputPer1k: z.number().min(0),
});

export const RouterConfigSchema = z.object({
  learning: z.object({
    /** EMA step applied to channel weights on each observed outcome */
    learningRate: z.number().gt(0).max(1).default(0.1),
    /** Outcomes at or above this utility count as high-value in efficiency scores */
    highValueUtility: z.number().min(0).max(2).default(1.0),
  }).default({}),

  routing: z.object({
    /** Model assumed when the caller does not name one */
    defaultModel: z.string().min(1).default("openai/gpt-4o"),
    /** Sessions younger than this (minutes) count as recent */
    recentSessionMinutes: z.number().int().min(0).default(30),
    /** Output tokens assumed when estimating a prompt's cost */
    expectedOutputTokens: z.number().int().min(0).default(400),
  }).default({}),

  budget: z.object({
    /** Alert threshold used when a policy snapshot omits one */
    defaultAlertThreshold: z.number().gt(0).max(1).default(0.8),
  }).default({}),

  persistence: z.object({
    /** Upper bound on any single store call before it fails the request */
    timeoutMs: z.number().int().min(1).default(2000),
  }).default({}),

  analytics: z.object({
    /** Lookback window for weekly recommendations */
    windowDays: z.number().int().min(1).max(90).default(7),
    /** Minimum org-level weight drift that produces a recommendation */
    minWeightDelta: z.number().min(0).max(2).default(0.15),
  }).default({}),

  /** Custom model pricing overrides (per 1k tokens). Merges with built-in defaults. */
  pricing: z.record(PricingSchema).optional(),

  server: z.object({
    port: z.number().int().min(1).max(65535).default(3017),
    host: z.string().default("0.0.0.0"),
  }).default({}),

  logging: z.object({
    /** Minimum log level (debug, info, warn, error) */
    level: z.enum(["debug", "info", "warn", "error"]).default("info"),
    /** Output format (json for production, human for development) */
    format: z.enum(["json", "human"]).default("human"),
    fileOutput: z.boolean().default(false),
    /** Log directory relative to ~/.routewise/ */
    logPath: z.string().default("logs"),
    consoleOutput: z.boolean().default(true),
    includeStackTrace: z.boolean().default(true),
    colors: z.boolean().default(true),
  }).default({}),
});

export type RouterConfig = z.infer<typeof RouterConfigSchema>;

export const DEFAULT_CONFIG: RouterConfig = RouterConfigSchema.parse({});

export const DEFAULT_CONFIG_PATH = join(homedir(), ".routewise", "routewise.json");

// ============================================================
// Configuration Loading Functions
// ============================================================

/**
 * Loads configuration from routewise.json or falls back to defaults.
 *
 * @param configPath - Optional path (defaults to ~/.routewise/routewise.json)
 */
export function loadConfig(configPath?: string): RouterConfig {
  const path = configPath || DEFAULT_CONFIG_PATH;

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      console.info("routewise.json not found, using defaults");
      return DEFAULT_CONFIG;
    }

    console.error("Failed to read routewise.json:", error);
    return DEFAULT_CONFIG;
  }

  const result = RouterConfigSchema.safeParse(raw);
  if (result.success) {
    return result.data;
  }

  console.warn("routewise config validation failed, using defaults:", result.error.issues);
  return DEFAULT_CONFIG;
}

/**
 * Validates a raw configuration object.
 */
export function validateConfig(config: unknown): {
  success: true;
  data: RouterConfig;
} | {
  success: false;
  error: z.ZodError;
} {
  const result = RouterConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, error: result.error };
}

type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends Record<string, unknown> ? DeepPartial<T[K]> : T[K];
};

export type RouterConfigInput = DeepPartial<RouterConfig>;

/**
 * Merges partial user configuration with defaults.
 * Throws a ZodError when a supplied value is out of range.
 */
export function mergeWithDefaults(userConfig: RouterConfigInput = {}): RouterConfig {
  return RouterConfigSchema.parse(userConfig);
}

/**
 * Engine configuration read from environment variables.
 * Invalid values fall back to defaults; configuration never throws.
 */

import { z } from "zod";
import type { LogLevel, ValidationMode } from "../types/resolver.types";

export const CONFIG_KEYS = {
  logLevel: "FONT_STYLE_LOG_LEVEL", // debug | info | warn | error | silent
  validationMode: "FONT_STYLE_VALIDATION_MODE", // strict | lenient
  logCapacity: "FONT_STYLE_LOG_CAPACITY", // retained log entries
} as const;

export const CONFIG_DEFAULTS = {
  [CONFIG_KEYS.logLevel]: "warn",
  [CONFIG_KEYS.validationMode]: "lenient",
  [CONFIG_KEYS.logCapacity]: "500",
} as const;

export interface EngineConfig {
  /** Lowest level written to the console; "silent" writes nothing */
  logLevel: LogLevel | "silent";
  validationMode: ValidationMode;
  logCapacity: number;
}

const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);
const validationModeSchema = z.enum(["strict", "lenient"]);
const logCapacitySchema = z.coerce.number().int().positive();

type Env = Record<string, string | undefined>;

function readKey<T>(env: Env, key: keyof typeof CONFIG_DEFAULTS, schema: z.ZodType<T>): T {
  const raw = env[key]?.trim().toLowerCase();
  const parsed = schema.safeParse(raw === undefined || raw === "" ? CONFIG_DEFAULTS[key] : raw);
  if (parsed.success) return parsed.data;
  return schema.parse(CONFIG_DEFAULTS[key]);
}

/**
 * Build the engine configuration from an environment map
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  return {
    logLevel: readKey(env, CONFIG_KEYS.logLevel, logLevelSchema),
    validationMode: readKey(env, CONFIG_KEYS.validationMode, validationModeSchema),
    logCapacity: readKey(env, CONFIG_KEYS.logCapacity, logCapacitySchema),
  };
}

let cachedConfig: EngineConfig | null = null;

export function getEngineConfig(): EngineConfig {
  if (!cachedConfig) {
    cachedConfig = loadEngineConfig();
  }
  return cachedConfig;
}

/**
 * Drop the cached configuration so the next read sees the current environment
 */
export function resetEngineConfig(): void {
  cachedConfig = null;
}

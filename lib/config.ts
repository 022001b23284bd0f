import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";

export const LOG_LEVELS = ["trace", "debug", "info", "warn"] as const;

const configSchema = z.object({
  extract_images_only: z.boolean().default(true),
  accept_extended_image_formats: z.boolean().default(false),
  simple_sorting: z.boolean().default(false),
  skip_bad_pdf_pages: z.boolean().default(false),
  create_output_dir: z.boolean().default(false),
  log_level: z.enum(LOG_LEVELS).default("info"),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Validate a raw config value, filling in defaults. `null` (empty YAML) yields all defaults. */
export function parseConfig(raw: unknown): AppConfig {
  return configSchema.parse(raw ?? {});
}

export function defaultConfig(): AppConfig {
  return parseConfig({});
}

/**
 * Load config from YAML. Without an explicit path, `config.yaml` in the
 * working directory is used when present, defaults otherwise.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  if (!configPath && !fs.existsSync(resolved)) return defaultConfig();
  const raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  return parseConfig(raw);
}

/** Load config and apply overrides (typically from CLI flags) on top. */
export function loadConfigWithOverrides(
  overrides: Partial<AppConfig>,
  configPath?: string
): AppConfig {
  const base = loadConfig(configPath);
  return parseConfig(deepMerge(base, overrides));
}

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigurationError } from "./pipeline/errors";

const configSchema = z.object({
  provider: z.enum(["openai", "anthropic", "google"]).optional(),
  model: z.string().optional(),
  output_dir: z.string().optional(),
  supported_extensions: z.array(z.string().regex(/^\.[a-z0-9]+$/)).min(1),
  rasterize: z.object({
    dpi: z.number().int().min(36).max(600),
    concurrency: z.number().int().min(1),
  }),
  converter: z.object({
    command: z.string().min(1),
    timeout_ms: z.number().int().min(1),
    concurrency: z.number().int().min(1),
    max_attempts: z.number().int().min(1),
    retry_delay_ms: z.number().int().min(0),
    busy_patterns: z.array(z.string()),
  }),
  summarization: z.object({
    page_prompt: z.string(),
    document_prompt: z.string(),
    model: z.string().optional(),
    concurrency: z.number().int().min(1),
    max_attempts: z.number().int().min(1),
    base_delay_ms: z.number().int().min(0),
    max_delay_ms: z.number().int().min(0),
    timeout_ms: z.number().int().min(1),
  }),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge(
  base: Record<string, unknown>,
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

function readYaml(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) {
    throw new ConfigurationError(`Config file not found: ${configPath}`);
  }
  const raw = yaml.load(fs.readFileSync(configPath, "utf-8"));
  if (!isPlainObject(raw)) {
    throw new ConfigurationError(`Config file must contain a mapping: ${configPath}`);
  }
  return raw;
}

function parseConfig(raw: unknown, source: string): AppConfig {
  const result = configSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration in ${source}: ${z.prettifyError(result.error)}`
    );
  }
  return result.data;
}

export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  return parseConfig(readYaml(resolved), resolved);
}

/**
 * Load the config file and layer run-specific overrides (CLI flags) on top.
 * Overrides use the same snake_case shape as the YAML file.
 */
export function loadConfigWithOverrides(
  configPath: string | undefined,
  overrides: Record<string, unknown>
): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  return parseConfig(deepMerge(readYaml(resolved), overrides), resolved);
}

export function getDataRoomRoot(cfg: AppConfig): string {
  return path.resolve(process.env.DATA_ROOM_ROOT ?? cfg.output_dir ?? "dataroom");
}

export function getSupportedExtensions(cfg: AppConfig): Set<string> {
  return new Set(cfg.supported_extensions.map((ext) => ext.toLowerCase()));
}

export function getBusyPatterns(cfg: AppConfig): RegExp[] {
  return cfg.converter.busy_patterns.map((p) => new RegExp(p, "i"));
}

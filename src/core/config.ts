import { z } from "zod";
import {
  DEFAULT_EXCLUDES,
  DEFAULT_MAX_FILE_BYTES,
  DEFAULT_PRESERVED_HEADINGS,
  DEFAULT_SNIFF_BYTES,
} from "../constants.js";
import { ConfigError } from "../errors.js";
import { Provider } from "../providers/types.js";

export const DEFAULT_HOST = "http://localhost:11434";
export const DEFAULT_MODEL = "llama3.2:3b";

const EndpointSchema = z.object({
  provider: z.nativeEnum(Provider).default(Provider.OLLAMA),
  host: z.string().url().default(DEFAULT_HOST),
  apiKey: z.string().min(1).optional(),
});

const BudgetSchema = z.object({
  size: z.number().int().positive().default(6000),
  unit: z.enum(["chars", "tokens"]).default("tokens"),
  maxChunks: z.number().int().positive().default(4),
});

const ScanSchema = z.object({
  exclude: z.array(z.string()).default([...DEFAULT_EXCLUDES]),
  maxFileBytes: z.number().int().positive().default(DEFAULT_MAX_FILE_BYTES),
  sniffBytes: z.number().int().positive().default(DEFAULT_SNIFF_BYTES),
});

const InferenceSchema = z.object({
  timeoutMs: z.number().int().positive().default(300_000),
  maxAttempts: z.number().int().positive().max(10).default(4),
  baseDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(30_000),
  maxInFlight: z.number().int().positive().default(2),
  temperature: z.number().min(0).max(2).default(0.3),
  maxOutputTokens: z.number().int().positive().default(4096),
  stream: z.boolean().default(true),
});

const MergeSchema = z.object({
  preserveHeadings: z.array(z.string()).default([...DEFAULT_PRESERVED_HEADINGS]),
});

const DatasetSchema = z.object({
  /** Ceiling on prompt + completion, in the budget unit. */
  maxExampleSize: z.number().int().positive().default(16_000),
});

export const ForgeConfigSchema = z.object({
  endpoint: EndpointSchema.default({}),
  model: z.string().min(1).default(DEFAULT_MODEL),
  budget: BudgetSchema.default({}),
  scan: ScanSchema.default({}),
  inference: InferenceSchema.default({}),
  merge: MergeSchema.default({}),
  dataset: DatasetSchema.default({}),
  concurrency: z.number().int().positive().default(2),
});

export type ForgeConfig = z.infer<typeof ForgeConfigSchema>;
export type EndpointConfig = ForgeConfig["endpoint"];
export type InferenceConfig = ForgeConfig["inference"];

/** One partial source of configuration: the settings file, the environment, flags. */
export type ConfigLayer = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value == "object" && value !== null && !Array.isArray(value);
}

export function mergeLayers(base: ConfigLayer, override: ConfigLayer): ConfigLayer {
  const merged: ConfigLayer = { ...base };
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] =
      isPlainObject(current) && isPlainObject(value)
        ? mergeLayers(current, value)
        : value;
  }
  return merged;
}

export function configFromEnv(env: NodeJS.ProcessEnv): ConfigLayer {
  const endpoint: ConfigLayer = {};
  if (env["OLLAMA_HOST"]) endpoint["host"] = env["OLLAMA_HOST"];
  if (env["READMEFORGE_PROVIDER"]) endpoint["provider"] = env["READMEFORGE_PROVIDER"];
  if (env["READMEFORGE_API_KEY"]) endpoint["apiKey"] = env["READMEFORGE_API_KEY"];

  const layer: ConfigLayer = { endpoint };
  if (env["OLLAMA_MODEL"]) layer["model"] = env["OLLAMA_MODEL"];
  return layer;
}

/** Lower layers first; later layers win. */
export function resolveConfig(...layers: ConfigLayer[]): ForgeConfig {
  const merged = layers.reduce<ConfigLayer>(
    (acc, layer) => mergeLayers(acc, layer),
    {},
  );
  const result = ForgeConfigSchema.safeParse(merged);

  if (!result.success) {
    throw new ConfigError(
      "Invalid configuration.",
      result.error.issues
        .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
        .join("\n"),
    );
  }

  return result.data;
}

import { readFileSync, existsSync } from "node:fs";
import { join } from "node:path";
import yaml from "js-yaml";
import { z } from "zod";
import { MissingApiKeyError } from "../core/errors.js";

const CompletionConfigSchema = z.object({
  // Checked by requireApiKey, only for commands that call the model.
  api_key: z.string().default(""),
  base_url: z.string().default("https://openrouter.ai/api/v1"),
  model: z.string().default("meta-llama/llama-3.2-3b-instruct"),
  temperature: z.number().default(0.2),
  max_tokens: z.number().int().positive().default(300),
  request_timeout_ms: z.number().int().positive().default(20_000),
  rate_limit_retry_delay_ms: z.number().int().nonnegative().default(2_000),
  timeout_retry_delay_ms: z.number().int().nonnegative().default(1_000),
  default_headers: z.record(z.string()).optional(),
});

const PipelineConfigSchema = z.object({
  max_workers: z.number().int().positive().default(5),
  pacing_delay_ms: z.number().int().nonnegative().default(200),
});

const DataConfigSchema = z.object({
  dir: z.string().default("./data"),
  inbox_file: z.string().default("mock_inbox.json"),
  processed_file: z.string().default("processed.json"),
  drafts_file: z.string().default("drafts.json"),
  prompts_file: z.string().default("prompts.json"),
});

const AppConfigSchema = z.object({
  completion: CompletionConfigSchema,
  pipeline: PipelineConfigSchema.default({}),
  data: DataConfigSchema.default({}),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type CompletionConfig = z.infer<typeof CompletionConfigSchema>;
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export interface DataPaths {
  inbox: string;
  processed: string;
  drafts: string;
  prompts: string;
}

/**
 * Load configuration from YAML file with environment variable overrides.
 * Env vars take precedence over YAML values.
 */
export function loadConfig(configPath?: string): AppConfig {
  const path = configPath ?? process.env.CONFIG_PATH ?? "./config/config.yaml";

  let rawConfig: Record<string, unknown> = {};

  if (existsSync(path)) {
    const loaded = yaml.load(readFileSync(path, "utf-8"));
    if (isRecord(loaded)) rawConfig = loaded;
  }

  applyEnvOverrides(rawConfig);

  return AppConfigSchema.parse(rawConfig);
}

export function requireApiKey(config: AppConfig): string {
  const key = config.completion.api_key.trim();
  if (!key) throw new MissingApiKeyError();
  return key;
}

export function resolveDataPaths(config: AppConfig): DataPaths {
  const { dir } = config.data;
  return {
    inbox: join(dir, config.data.inbox_file),
    processed: join(dir, config.data.processed_file),
    drafts: join(dir, config.data.drafts_file),
    prompts: join(dir, config.data.prompts_file),
  };
}

function applyEnvOverrides(config: Record<string, unknown>): void {
  const completion = ensureObject(config, "completion");
  const data = ensureObject(config, "data");

  if (process.env.OPENROUTER_API_KEY) completion.api_key = process.env.OPENROUTER_API_KEY;
  if (process.env.COMPLETION_BASE_URL) completion.base_url = process.env.COMPLETION_BASE_URL;
  if (process.env.COMPLETION_MODEL) completion.model = process.env.COMPLETION_MODEL;
  if (process.env.DATA_DIR) data.dir = process.env.DATA_DIR;
}

function ensureObject(
  parent: Record<string, unknown>,
  key: string
): Record<string, unknown> {
  const existing = parent[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  parent[key] = created;
  return created;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { ConfigurationError } from "./errors";

export const DEFAULT_DRAFT_MODEL = "gpt-4o-mini";

const configSchema = z.object({
  data_root: z.string().default("data"),
  semantic_draft: z
    .object({
      provider: z.enum(["openai", "anthropic", "google"]).default("openai"),
      model: z.string().default(DEFAULT_DRAFT_MODEL),
      prompt: z.string().default("semantic_draft"),
      temperature: z.number().min(0).max(2).default(0),
    })
    .prefault({}),
});

export type AppConfig = z.infer<typeof configSchema>;

export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigurationError(
      `Invalid configuration: ${z.prettifyError(result.error)}`,
      result.error
    );
  }
  return result.data;
}

/**
 * Load config.yaml from the given path, or from the working directory.
 * A missing default file means "all defaults"; a missing explicit file is an error.
 */
export function loadConfig(configPath?: string): AppConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  if (!fs.existsSync(resolved)) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found: ${resolved}`);
    }
    return parseConfig({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new ConfigurationError(`Could not read ${resolved}`, err);
  }
  return parseConfig(raw);
}

export function getDataRoot(cfg: AppConfig): string {
  return path.resolve(process.env.DATA_ROOT || cfg.data_root);
}

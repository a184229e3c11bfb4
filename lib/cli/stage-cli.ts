/**
 * Shared plumbing for the per-stage CLIs.
 *
 * Every stage CLI takes exactly one source path, prints the output paths on
 * stdout (one per line) and reports failures as "<stage> failed: <message>"
 * on stderr with exit code 1.
 */

import { errorMessage } from "../errors";
import { getDataRoot, loadConfig, type AppConfig } from "../config";
import { createLLMDrafter, isProvider } from "../pipeline/core/llm";
import type { Drafter, Reviewer } from "../pipeline/core/types";
import { appendLogEntry } from "../pipeline/llm-log";
import { draftChunks } from "../pipeline/semantic-draft/semantic-draft";
import {
  createDecisionsReviewer,
  createTerminalReviewer,
  loadDecisionsFile,
} from "../pipeline/canonicalize/reviewer";
import { runWithProgress } from "./progress";
import {
  resolveDataPaths,
  type DataPaths,
  type LLMProvider,
  type StageInput,
  type StageResult,
} from "../pipeline/types";

export interface ParsedFlags {
  positional: string[];
  configPath?: string;
  model?: string;
  provider?: LLMProvider;
  skipCache: boolean;
  decisions?: string;
  help: boolean;
}

export class UsageError extends Error {}

export function parseFlags(args: string[]): ParsedFlags {
  const flags: ParsedFlags = { positional: [], skipCache: false, help: false };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--help" || arg === "-h") {
      flags.help = true;
    } else if (arg === "--skip-cache") {
      flags.skipCache = true;
    } else if (arg === "--config" || arg === "--model" || arg === "--provider" || arg === "--decisions") {
      const value = args[++i];
      if (value === undefined) throw new UsageError(`${arg} requires a value`);
      if (arg === "--config") flags.configPath = value;
      else if (arg === "--model") flags.model = value;
      else if (arg === "--decisions") flags.decisions = value;
      else if (isProvider(value)) flags.provider = value;
      else throw new UsageError("Invalid provider. Choose: openai, anthropic, google");
    } else if (arg.startsWith("-")) {
      throw new UsageError(`Unknown option: ${arg}`);
    } else {
      flags.positional.push(arg);
    }
  }

  return flags;
}

export interface StageCliContext {
  source: string;
  flags: ParsedFlags;
  config: AppConfig;
  paths: DataPaths;
}

/**
 * Parse argv, load config and run one stage. Exits the process on failure.
 */
export async function runStageCli(
  stage: string,
  usage: string,
  run: (ctx: StageCliContext) => Promise<string[]>
): Promise<void> {
  let flags: ParsedFlags;
  try {
    flags = parseFlags(process.argv.slice(2));
  } catch (err) {
    console.error(errorMessage(err));
    console.error(usage);
    process.exit(1);
  }

  if (flags.help) {
    console.log(usage);
    return;
  }

  const [source] = flags.positional;
  if (!source || flags.positional.length !== 1) {
    console.error(usage);
    process.exit(1);
  }

  try {
    const config = loadConfig(flags.configPath);
    const paths = resolveDataPaths(getDataRoot(config));
    const outputs = await run({ source, flags, config, paths });
    for (const output of outputs) console.log(output);
  } catch (err) {
    console.error(`${stage} failed: ${errorMessage(err)}`);
    process.exit(1);
  }
}

/**
 * Build the LLM drafter from config.yaml, letting --model and --provider
 * override it. Throws ConfigurationError when the API key is missing.
 */
export function drafterFromFlags(
  flags: ParsedFlags,
  config: AppConfig,
  paths: DataPaths
): Drafter {
  const settings = config.semantic_draft;
  return createLLMDrafter({
    provider: flags.provider ?? settings.provider,
    modelId: flags.model ?? settings.model,
    promptName: settings.prompt,
    temperature: settings.temperature,
    cacheDir: paths.cacheDir,
    skipCache: flags.skipCache,
    onLog: (entry) => appendLogEntry(paths.llmLogFile, entry),
  });
}

export function reviewerFromFlags(flags: ParsedFlags): Reviewer {
  return flags.decisions
    ? createDecisionsReviewer(loadDecisionsFile(flags.decisions))
    : createTerminalReviewer();
}

/** Run the semantic-draft stage with a progress bar on stderr. */
export async function draftWithProgress(
  input: StageInput,
  drafter: Drafter,
  paths: DataPaths
): Promise<StageResult> {
  let total = 0;
  const last = await runWithProgress(
    draftChunks(input, { drafter, paths }),
    (event) => {
      if (event.type === "progress") total = event.total;
      return event.type === "progress"
        ? { current: event.current, total: event.total }
        : { current: total, total };
    },
    { label: "semantic-draft", unit: "chunks" }
  );
  if (last.type !== "done") {
    throw new Error("semantic-draft finished without a result");
  }
  return last.result;
}

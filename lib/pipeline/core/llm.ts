/**
 * LLM drafting with caching support.
 *
 * This module provides the default Drafter:
 * - Wraps the Vercel AI SDK
 * - Checks provider credentials before any network call
 * - Handles disk-based caching of responses
 * - Logs all calls for debugging
 */

import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import {
  generateObject,
  NoObjectGeneratedError,
  type LanguageModel,
  type ModelMessage,
} from "ai";
import { createOpenAI } from "@ai-sdk/openai";
import { createAnthropic } from "@ai-sdk/anthropic";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { ConfigurationError, errorMessage } from "@/lib/errors";
import type { LLMProvider } from "../types";
import type { Drafter, DraftResponse, TokenUsage } from "./types";
import { draftPayloadSchema } from "./schemas";
import { renderPrompt, type PromptMessage } from "../prompt";
import type { LlmLogEntry } from "../llm-log";

// ============================================================================
// Provider types and model resolution
// ============================================================================

const PROVIDERS: readonly LLMProvider[] = ["openai", "anthropic", "google"];

export const API_KEY_ENV: Record<LLMProvider, string> = {
  openai: "OPENAI_API_KEY",
  anthropic: "ANTHROPIC_API_KEY",
  google: "GOOGLE_GENERATIVE_AI_API_KEY",
};

const MODEL_FACTORIES: Record<LLMProvider, (apiKey: string, id: string) => LanguageModel> = {
  openai: (apiKey, id) => createOpenAI({ apiKey })(id),
  anthropic: (apiKey, id) => createAnthropic({ apiKey })(id),
  google: (apiKey, id) => createGoogleGenerativeAI({ apiKey })(id),
};

export function isProvider(value: string): value is LLMProvider {
  return PROVIDERS.some((provider) => provider === value);
}

/**
 * Accept "model-id" (uses the given provider) or "provider:model-id".
 */
export function parseModelSpec(
  provider: LLMProvider,
  modelId: string
): { provider: LLMProvider; modelId: string } {
  const colonIdx = modelId.indexOf(":");
  if (colonIdx === -1) return { provider, modelId };

  const prefix = modelId.slice(0, colonIdx);
  if (!isProvider(prefix)) {
    throw new ConfigurationError(
      `Unknown provider "${prefix}" in model "${modelId}". Choose: ${PROVIDERS.join(", ")}`
    );
  }
  return { provider: prefix, modelId: modelId.slice(colonIdx + 1) };
}

export function requireApiKey(
  provider: LLMProvider,
  env: NodeJS.ProcessEnv = process.env
): string {
  const name = API_KEY_ENV[provider];
  const value = env[name];
  if (!value) {
    throw new ConfigurationError(`Set ${name} to draft with the ${provider} provider.`);
  }
  return value;
}

// ============================================================================
// Drafter factory
// ============================================================================

export interface CreateLLMDrafterOptions {
  provider: LLMProvider;
  modelId: string;
  promptName: string;
  temperature?: number;
  cacheDir?: string;
  skipCache?: boolean;
  env?: NodeJS.ProcessEnv;
  onLog?: (entry: LlmLogEntry) => void;
}

/**
 * Create the default Drafter. Fails with ConfigurationError when the
 * provider's API key is not set.
 */
export function createLLMDrafter(options: CreateLLMDrafterOptions): Drafter {
  const spec = parseModelSpec(options.provider, options.modelId);
  const env = options.env ?? process.env;
  const apiKey = requireApiKey(spec.provider, env);
  const languageModel = MODEL_FACTORIES[spec.provider](apiKey, spec.modelId);
  const modelId = `${spec.provider}:${spec.modelId}`;
  const temperature = options.temperature ?? 0;

  return {
    async draft(chunk): Promise<DraftResponse> {
      const t0 = Date.now();
      const { system, messages } = await loadPrompt(options.promptName, {
        chunk_id: chunk.id,
        chunk_text: chunk.text,
      });

      const cacheFile = options.cacheDir
        ? path.join(
            options.cacheDir,
            `${computeCacheKey({ modelId, system, messages, temperature })}.json`
          )
        : null;

      const log = (
        fields: Pick<LlmLogEntry, "cacheHit" | "outcome" | "usage" | "error">
      ) =>
        options.onLog?.({
          timestamp: new Date().toISOString(),
          taskType: "semantic-draft",
          chunkId: chunk.id,
          promptName: options.promptName,
          modelId,
          durationMs: Date.now() - t0,
          system,
          messages,
          ...fields,
        });

      // Check cache
      if (cacheFile && !options.skipCache && !env.RECACHE) {
        const cached = readCacheEntry(cacheFile);
        if (cached) {
          log({ cacheHit: true, outcome: "object" });
          return { kind: "object", value: cached.value };
        }
      }

      let response: DraftResponse;
      let usage: TokenUsage | undefined;
      try {
        const generated = await generateObject({
          model: languageModel,
          schema: draftPayloadSchema,
          system,
          messages: toModelMessages(messages),
          temperature,
          maxRetries: 0,
        });
        response = { kind: "object", value: generated.object };
        usage = {
          inputTokens: generated.usage.inputTokens ?? 0,
          outputTokens: generated.usage.outputTokens ?? 0,
        };
      } catch (err) {
        if (!NoObjectGeneratedError.isInstance(err)) {
          log({ cacheHit: false, outcome: "error", error: errorMessage(err) });
          throw err;
        }
        // The model answered, but not with a usable object
        response = { kind: "text", text: err.text ?? "" };
      }

      // Only usable objects are cached, so a bad answer is retried next run
      if (cacheFile && response.kind === "object") {
        fs.mkdirSync(path.dirname(cacheFile), { recursive: true });
        fs.writeFileSync(cacheFile, JSON.stringify(response.value, null, 2) + "\n");
      }

      log({ cacheHit: false, outcome: response.kind, usage });
      return response;
    },
  };
}

// ============================================================================
// Prompt loading helper
// ============================================================================

/**
 * Render a Liquid prompt template, splitting off the system message.
 */
export async function loadPrompt(
  templateName: string,
  context: Record<string, unknown>
): Promise<{ system?: string; messages: PromptMessage[] }> {
  const promptMessages = await renderPrompt(templateName, context);
  const systemMsg = promptMessages.find((m) => m.role === "system");

  return {
    system: systemMsg?.content,
    messages: promptMessages.filter((m) => m.role !== "system"),
  };
}

/**
 * Read a cached response. A missing or unparsable entry is a cache miss;
 * it is overwritten by the next successful call.
 */
export function readCacheEntry(cacheFile: string): { value: unknown } | null {
  if (!fs.existsSync(cacheFile)) return null;
  try {
    return { value: JSON.parse(fs.readFileSync(cacheFile, "utf-8")) };
  } catch {
    return null;
  }
}

export function computeCacheKey(data: {
  modelId: string;
  system?: string;
  messages: PromptMessage[];
  temperature: number;
}): string {
  const json = JSON.stringify([
    data.modelId,
    data.system ?? null,
    data.messages,
    data.temperature,
  ]);
  return crypto.createHash("sha256").update(json).digest("hex");
}

// ============================================================================
// Internal helpers
// ============================================================================

function toModelMessages(messages: PromptMessage[]): ModelMessage[] {
  return messages.map((m): ModelMessage => {
    switch (m.role) {
      case "system":
        return { role: "system", content: m.content };
      case "assistant":
        return { role: "assistant", content: m.content };
      default:
        return { role: "user", content: m.content };
    }
  });
}

import path from "node:path";

export interface DataPaths {
  dataRoot: string;
  rawDir: string;
  refinedDir: string;
  chunksDir: string;
  draftsDir: string;
  canonicalDir: string;
  cacheDir: string;
  llmLogFile: string;
}

export function resolveDataPaths(dataRoot = "data"): DataPaths {
  const root = path.resolve(dataRoot);
  return {
    dataRoot: root,
    rawDir: path.join(root, "raw"),
    refinedDir: path.join(root, "refined"),
    chunksDir: path.join(root, "chunks"),
    draftsDir: path.join(root, "drafts"),
    canonicalDir: path.join(root, "canonical"),
    cacheDir: path.join(root, ".cache"),
    llmLogFile: path.join(root, "llm-log.jsonl"),
  };
}

export type StageName =
  | "ingest"
  | "refine"
  | "segment"
  | "semantic-draft"
  | "canonicalize";

/**
 * What a stage hands back to its caller. `outputs[0]` is the artifact the
 * next stage consumes.
 */
export interface StageResult {
  stage: StageName;
  source: string;
  outputs: string[];
}

export type StageInput = string | StageResult;

export type LLMProvider = "openai" | "anthropic" | "google";

export interface StageOptions {
  paths?: DataPaths;
}

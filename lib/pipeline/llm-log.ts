import fs from "node:fs";
import path from "node:path";
import type { TokenUsage } from "./core/types";

export interface LlmLogEntry {
  timestamp: string;
  taskType: string;
  chunkId?: string;
  promptName: string;
  modelId: string;
  cacheHit: boolean;
  durationMs: number;
  outcome: "object" | "text" | "error";
  usage?: TokenUsage;
  error?: string;
  system?: string;
  messages: LlmLogMessage[];
}

export interface LlmLogMessage {
  role: string;
  content: string;
}

const MAX_LOG_ENTRIES = 250;

/**
 * Append a log entry to the JSONL log file, keeping at most
 * MAX_LOG_ENTRIES entries (oldest are dropped).
 */
export function appendLogEntry(filePath: string, entry: LlmLogEntry): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.appendFileSync(filePath, JSON.stringify(entry) + "\n");

  const lines = fs.readFileSync(filePath, "utf-8").split("\n").filter(Boolean);
  if (lines.length > MAX_LOG_ENTRIES) {
    fs.writeFileSync(filePath, lines.slice(lines.length - MAX_LOG_ENTRIES).join("\n") + "\n");
  }
}

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { appendLogEntry, type LlmLogEntry } from "../llm-log";

function entry(chunkId: string): LlmLogEntry {
  return {
    timestamp: "2024-01-01T00:00:00.000Z",
    taskType: "semantic-draft",
    chunkId,
    promptName: "semantic_draft",
    modelId: "openai:gpt-4o-mini",
    cacheHit: false,
    durationMs: 5,
    outcome: "object",
    messages: [{ role: "user", content: "hi" }],
  };
}

describe("appendLogEntry", () => {
  let tmpDir: string;
  let logFile: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "llm-log-test-"));
    logFile = path.join(tmpDir, "nested", "llm-log.jsonl");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("creates the file and appends JSONL entries", () => {
    appendLogEntry(logFile, entry("chunk-0001"));
    appendLogEntry(logFile, entry("chunk-0002"));
    const lines = fs.readFileSync(logFile, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[1]).chunkId).toBe("chunk-0002");
  });

  it("keeps only the newest 250 entries", () => {
    for (let i = 1; i <= 252; i++) {
      appendLogEntry(logFile, entry(`chunk-${i}`));
    }
    const lines = fs.readFileSync(logFile, "utf-8").trimEnd().split("\n");
    expect(lines).toHaveLength(250);
    expect(JSON.parse(lines[0]).chunkId).toBe("chunk-3");
    expect(JSON.parse(lines[249]).chunkId).toBe("chunk-252");
  });
});

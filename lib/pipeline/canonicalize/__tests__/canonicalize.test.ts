import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { InvalidInputError } from "@/lib/errors";
import type { DraftRecord, ReviewerDecision } from "../../core/schemas";
import type { Reviewer } from "../../core/types";
import { resolveDataPaths, type DataPaths } from "../../types";
import {
  applyDecision,
  canonicalize,
  parseApproval,
  parseDraftsJsonl,
  parseKeywords,
} from "../canonicalize";

function draft(id: string, overrides: Partial<DraftRecord> = {}): DraftRecord {
  return {
    chunk_id: id,
    title: `Title ${id}`,
    summary: `Summary ${id}`,
    keywords: ["alpha", "beta"],
    confidence: 0,
    ...overrides,
  };
}

function recordingReviewer(decide: (record: DraftRecord) => ReviewerDecision): Reviewer & {
  seen: string[];
} {
  const seen: string[] = [];
  return {
    seen,
    async review(record) {
      seen.push(record.chunk_id);
      return decide(record);
    },
  };
}

describe("parseDraftsJsonl", () => {
  it("parses records and skips blank lines", () => {
    const contents = `${JSON.stringify(draft("c1"))}\n\n${JSON.stringify(draft("c2"))}\n`;
    expect(parseDraftsJsonl(contents).map((r) => r.chunk_id)).toEqual(["c1", "c2"]);
  });

  it("names the line of invalid JSON, counting blank lines", () => {
    const contents = `${JSON.stringify(draft("c1"))}\n\n{bad`;
    expect(() => parseDraftsJsonl(contents)).toThrow(InvalidInputError);
    expect(() => parseDraftsJsonl(contents)).toThrow(
      expect.objectContaining({
        code: "INVALID_INPUT",
        message: "Invalid JSON on line 3",
        context: { line: 3 },
      })
    );
  });

  it("rejects lines that are not objects", () => {
    expect(() => parseDraftsJsonl("[1, 2]")).toThrow("Line 1 is not a JSON object");
    expect(() => parseDraftsJsonl("null")).toThrow("Line 1 is not a JSON object");
  });

  it("lists missing fields in sorted order", () => {
    expect(() => parseDraftsJsonl('{"title":"t","chunk_id":"c"}')).toThrow(
      "Missing fields [confidence, keywords, summary] on line 1"
    );
  });

  it("requires keywords to be a list", () => {
    const line = JSON.stringify({ ...draft("c1"), keywords: "a, b" });
    expect(() => parseDraftsJsonl(line)).toThrow("'keywords' must be a list on line 1");
  });

  it("rejects wrongly typed fields", () => {
    const line = JSON.stringify({ ...draft("c1"), confidence: "high" });
    expect(() => parseDraftsJsonl(line)).toThrow(/^Invalid 'confidence' on line 1/);
  });
});

describe("applyDecision", () => {
  it("overrides fields that were given", () => {
    expect(
      applyDecision(draft("c1"), {
        title: "New",
        summary: "Better",
        keywords: ["gamma"],
        approved: true,
      })
    ).toEqual({
      chunk_id: "c1",
      title: "New",
      summary: "Better",
      keywords: ["gamma"],
      confidence: 0,
      approved: true,
    });
  });

  it("keeps the draft's values for empty strings and missing keywords", () => {
    expect(applyDecision(draft("c1"), { title: "", summary: "", approved: false })).toEqual({
      ...draft("c1"),
      approved: false,
    });
  });

  it("replaces keywords with an empty list when one is given", () => {
    expect(applyDecision(draft("c1"), { keywords: [], approved: true }).keywords).toEqual([]);
  });
});

describe("parseApproval", () => {
  it("approves only on y", () => {
    expect(parseApproval("y")).toBe(true);
    expect(parseApproval("  Y \n")).toBe(true);
    expect(parseApproval("yes")).toBe(false);
    expect(parseApproval("")).toBe(false);
    expect(parseApproval("n")).toBe(false);
  });
});

describe("parseKeywords", () => {
  it("keeps the current list for an empty answer", () => {
    expect(parseKeywords("")).toBeUndefined();
    expect(parseKeywords("   ")).toBeUndefined();
  });

  it("splits on commas and drops empties", () => {
    expect(parseKeywords(" solar, wind ,, tidal ")).toEqual(["solar", "wind", "tidal"]);
    expect(parseKeywords(",,")).toEqual([]);
  });
});

describe("canonicalize stage", () => {
  let tmpDir: string;
  let paths: DataPaths;
  let source: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "canonicalize-test-"));
    paths = resolveDataPaths(path.join(tmpDir, "data"));
    fs.mkdirSync(paths.draftsDir, { recursive: true });
    source = path.join(paths.draftsDir, "doc.drafts.jsonl");
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("emits one record per draft in input order", async () => {
    fs.writeFileSync(
      source,
      [draft("chunk-0001"), draft("chunk-0002"), draft("chunk-0003")]
        .map((d) => JSON.stringify(d))
        .join("\n") + "\n"
    );
    const reviewer = recordingReviewer((record) => ({
      title: record.chunk_id === "chunk-0002" ? "Édité" : "",
      approved: record.chunk_id !== "chunk-0003",
    }));

    const result = await canonicalize(source, { reviewer, paths });

    const output = path.join(paths.canonicalDir, "doc.drafts.canonical.jsonl");
    expect(result).toEqual({ stage: "canonicalize", source, outputs: [output] });
    expect(reviewer.seen).toEqual(["chunk-0001", "chunk-0002", "chunk-0003"]);

    const records = fs
      .readFileSync(output, "utf-8")
      .trimEnd()
      .split("\n")
      .map((line) => JSON.parse(line));
    expect(records.map((r) => [r.chunk_id, r.title, r.approved])).toEqual([
      ["chunk-0001", "Title chunk-0001", true],
      ["chunk-0002", "Édité", true],
      ["chunk-0003", "Title chunk-0003", false],
    ]);
    expect(fs.readFileSync(output, "utf-8")).toContain('"title":"Édité"');
  });

  it("fails the whole batch before any review when one record is invalid", async () => {
    const { keywords: _dropped, ...missingKeywords } = draft("chunk-0002");
    fs.writeFileSync(
      source,
      [JSON.stringify(draft("chunk-0001")), JSON.stringify(missingKeywords)].join("\n")
    );
    const reviewer = recordingReviewer(() => ({ approved: true }));

    await expect(canonicalize(source, { reviewer, paths })).rejects.toThrow(
      "Missing fields [keywords] on line 2"
    );
    expect(reviewer.seen).toEqual([]);
    expect(fs.existsSync(paths.canonicalDir)).toBe(false);
  });

  it("only accepts .jsonl files from the drafts directory", async () => {
    const outside = path.join(tmpDir, "doc.drafts.jsonl");
    fs.writeFileSync(outside, JSON.stringify(draft("c1")));
    await expect(
      canonicalize(outside, { reviewer: recordingReviewer(() => ({ approved: true })), paths })
    ).rejects.toThrow(`Source must be inside ${paths.draftsDir}`);
  });
});

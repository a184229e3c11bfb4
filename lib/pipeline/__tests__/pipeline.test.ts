import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ingest } from "../ingest/ingest";
import { refine } from "../refine/refine";
import { segment } from "../segment/segment";
import { semanticDraft } from "../semantic-draft/semantic-draft";
import { canonicalize } from "../canonicalize/canonicalize";
import { createDecisionsReviewer } from "../canonicalize/reviewer";
import type { Drafter } from "../core/types";
import { resolveDataPaths, type DataPaths } from "../types";
import { buildDocx, paragraph } from "../ingest/__tests__/docx-fixture";

describe("stage chaining", () => {
  let tmpDir: string;
  let paths: DataPaths;

  beforeAll(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "pipeline-test-"));
    paths = resolveDataPaths(path.join(tmpDir, "data"));
  });

  afterAll(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("threads each stage's primary output into the next", async () => {
    const document = path.join(tmpDir, "guide.docx");
    fs.writeFileSync(
      document,
      await buildDocx(paragraph("Wind  turbines") + paragraph("") + paragraph("make power."))
    );

    const drafter: Drafter = {
      draft: async (chunk) => ({
        kind: "object",
        value: { title: "Wind", summary: chunk.text, keywords: ["wind"] },
      }),
    };

    const raw = await ingest(document, { pdfSource: null, paths });
    const refined = await refine(raw, { paths });
    const chunks = await segment(refined, { paths });
    const drafts = await semanticDraft(chunks, { drafter, paths });
    const canonical = await canonicalize(drafts, {
      reviewer: createDecisionsReviewer({ "chunk-0001": { approved: true } }),
      paths,
    });

    expect(refined.source).toBe(path.join(paths.rawDir, "guide.txt"));
    expect(chunks.source).toBe(path.join(paths.refinedDir, "guide.normalized.txt"));
    expect(drafts.outputs).toEqual([path.join(paths.draftsDir, "guide.normalized.drafts.jsonl")]);
    expect(canonical.outputs).toEqual([
      path.join(paths.canonicalDir, "guide.normalized.drafts.canonical.jsonl"),
    ]);
    expect(fs.readFileSync(canonical.outputs[0], "utf-8")).toBe(
      '{"chunk_id":"chunk-0001","title":"Wind","summary":"Wind turbines make power.",' +
        '"keywords":["wind"],"confidence":0,"approved":true}\n'
    );
  });
});

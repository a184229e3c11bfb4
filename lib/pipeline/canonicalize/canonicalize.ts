/**
 * Canonicalize Stage
 *
 * Every draft record is validated before the first review. Each record is
 * then put to a Reviewer, and the decision is folded in with applyDecision.
 * Rejected records are kept with approved=false.
 */

import fs from "node:fs";
import { InvalidInputError } from "@/lib/errors";
import {
  DRAFT_FIELDS,
  draftRecordSchema,
  type CanonicalRecord,
  type DraftRecord,
  type ReviewerDecision,
} from "../core/schemas";
import type { Reviewer } from "../core/types";
import { formatJsonl } from "../core/jsonl";
import type { StageInput, StageOptions, StageResult } from "../types";
import { defineStage, stemOf } from "../stage";

export interface CanonicalizeOptions extends StageOptions {
  reviewer: Reviewer;
}

/**
 * Parse drafts JSONL. Line numbers count every line from 1, blank ones
 * included, so errors point at the right place in an editor.
 */
export function parseDraftsJsonl(contents: string): DraftRecord[] {
  const records: DraftRecord[] = [];
  const lines = contents.split(/\r?\n/);

  for (const [idx, line] of lines.entries()) {
    if (line.trim() === "") continue;
    records.push(parseDraftLine(line, idx + 1));
  }

  return records;
}

export function loadDrafts(source: string): DraftRecord[] {
  return parseDraftsJsonl(fs.readFileSync(source, "utf-8"));
}

function parseDraftLine(line: string, lineNo: number): DraftRecord {
  let value: unknown;
  try {
    value = JSON.parse(line);
  } catch {
    throw new InvalidInputError(`Invalid JSON on line ${lineNo}`, { line: lineNo });
  }

  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    throw new InvalidInputError(`Line ${lineNo} is not a JSON object`, { line: lineNo });
  }

  const record: object = value;
  const missing = DRAFT_FIELDS.filter((field) => !(field in record)).sort();
  if (missing.length > 0) {
    throw new InvalidInputError(
      `Missing fields [${missing.join(", ")}] on line ${lineNo}`,
      { line: lineNo, missing }
    );
  }

  if ("keywords" in record && !Array.isArray(record.keywords)) {
    throw new InvalidInputError(`'keywords' must be a list on line ${lineNo}`, {
      line: lineNo,
    });
  }

  const result = draftRecordSchema.safeParse(record);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue?.path.join(".") || "record";
    throw new InvalidInputError(
      `Invalid '${field}' on line ${lineNo}: ${issue?.message ?? "invalid value"}`,
      { line: lineNo }
    );
  }
  return result.data;
}

/**
 * Fold a reviewer decision into a draft. An empty title or summary keeps
 * the draft's value; keywords are replaced whenever a list is given.
 */
export function applyDecision(
  draft: DraftRecord,
  decision: ReviewerDecision
): CanonicalRecord {
  return {
    chunk_id: draft.chunk_id,
    title: decision.title ? decision.title : draft.title,
    summary: decision.summary ? decision.summary : draft.summary,
    keywords: decision.keywords ?? draft.keywords,
    confidence: draft.confidence,
    approved: decision.approved,
  };
}

/** Only "y" approves, ignoring case and surrounding whitespace. */
export function parseApproval(answer: string): boolean {
  return answer.trim().toLowerCase() === "y";
}

/**
 * Empty answer keeps the current keywords (undefined). Anything else is a
 * comma-separated list; ",," therefore clears the list.
 */
export function parseKeywords(answer: string): string[] | undefined {
  if (answer.trim() === "") return undefined;
  return answer
    .split(",")
    .map((keyword) => keyword.trim())
    .filter((keyword) => keyword.length > 0);
}

export async function reviewDrafts(
  drafts: DraftRecord[],
  reviewer: Reviewer
): Promise<CanonicalRecord[]> {
  const canonical: CanonicalRecord[] = [];
  for (const [index, draft] of drafts.entries()) {
    const decision = await reviewer.review(draft, { index, total: drafts.length });
    canonical.push(applyDecision(draft, decision));
  }
  return canonical;
}

export const canonicalizeStage = defineStage<CanonicalizeOptions>({
  name: "canonicalize",
  extensions: [".jsonl"],
  inputDir: (paths) => paths.draftsDir,
  outputDir: (paths) => paths.canonicalDir,
  produce: async (source, options) => {
    const records = await reviewDrafts(loadDrafts(source), options.reviewer);
    return [
      { fileName: `${stemOf(source)}.canonical.jsonl`, contents: formatJsonl(records) },
    ];
  },
});

export function canonicalize(
  input: StageInput,
  options: CanonicalizeOptions
): Promise<StageResult> {
  return canonicalizeStage.run(input, options);
}

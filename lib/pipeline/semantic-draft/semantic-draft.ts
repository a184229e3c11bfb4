/**
 * Semantic Draft Stage
 *
 * Asks a Drafter for one annotation per chunk, strictly in chunk order.
 * A response that is not a usable draft object is replaced by an empty
 * draft carrying the chunk's id, so one bad answer does not stop the batch.
 */

import fs from "node:fs";
import { Observable } from "rxjs";
import { InvalidInputError, errorMessage } from "@/lib/errors";
import {
  chunksFileSchema,
  draftPayloadSchema,
  type Chunk,
  type DraftRecord,
} from "../core/schemas";
import type { Drafter, DraftResponse } from "../core/types";
import { formatJsonl } from "../core/jsonl";
import type { StageInput, StageOptions, StageResult } from "../types";
import { defineStage, stemOf } from "../stage";

export interface DraftProgress {
  chunkId: string;
  current: number;
  total: number;
  empty: boolean;
}

export interface SemanticDraftOptions extends StageOptions {
  drafter: Drafter;
  onProgress?: (progress: DraftProgress) => void;
}

export type DraftEvent =
  | ({ type: "progress" } & DraftProgress)
  | { type: "done"; result: StageResult };

export function emptyDraft(chunkId: string): DraftRecord {
  return { chunk_id: chunkId, title: "", summary: "", keywords: [], confidence: 0 };
}

/**
 * Turn a drafter response into a record. The chunk id and a zero
 * confidence are always stamped by the pipeline.
 */
export function toDraftRecord(chunk: Chunk, response: DraftResponse): DraftRecord {
  const value = response.kind === "object" ? response.value : parseJson(response.text);
  const parsed = draftPayloadSchema.safeParse(value);
  if (!parsed.success) return emptyDraft(chunk.id);

  return {
    chunk_id: chunk.id,
    title: parsed.data.title,
    summary: parsed.data.summary,
    keywords: parsed.data.keywords,
    confidence: 0,
  };
}

export function loadChunks(source: string): Chunk[] {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(source, "utf-8"));
  } catch (err) {
    throw new InvalidInputError(`Invalid chunks JSON in ${source}: ${errorMessage(err)}`);
  }

  const result = chunksFileSchema.safeParse(raw);
  if (!result.success) {
    throw new InvalidInputError(
      `${source} is not a list of {id, text} chunks: ${result.error.issues[0]?.message ?? "invalid"}`
    );
  }
  return result.data;
}

/** "doc.normalized.chunks.json" -> "doc.normalized" */
export function draftBaseName(source: string): string {
  return stemOf(source).replace(/\.chunks$/, "");
}

export const semanticDraftStage = defineStage<SemanticDraftOptions>({
  name: "semantic-draft",
  extensions: [".json"],
  inputDir: (paths) => paths.chunksDir,
  outputDir: (paths) => paths.draftsDir,
  produce: async (source, options) => {
    const chunks = loadChunks(source);
    const records: DraftRecord[] = [];

    for (const [idx, chunk] of chunks.entries()) {
      const response = await options.drafter.draft(chunk);
      const record = toDraftRecord(chunk, response);
      records.push(record);
      options.onProgress?.({
        chunkId: chunk.id,
        current: idx + 1,
        total: chunks.length,
        empty: isEmptyDraft(record),
      });
    }

    return [
      { fileName: `${draftBaseName(source)}.drafts.jsonl`, contents: formatJsonl(records) },
    ];
  },
});

export function semanticDraft(
  input: StageInput,
  options: SemanticDraftOptions
): Promise<StageResult> {
  return semanticDraftStage.run(input, options);
}

/**
 * Observable wrapper for CLI usage: emits one progress event per chunk,
 * then the stage result.
 */
export function draftChunks(
  input: StageInput,
  options: Omit<SemanticDraftOptions, "onProgress">
): Observable<DraftEvent> {
  return new Observable<DraftEvent>((subscriber) => {
    semanticDraftStage
      .run(input, {
        ...options,
        onProgress: (p) => subscriber.next({ type: "progress", ...p }),
      })
      .then(
        (result) => {
          subscriber.next({ type: "done", result });
          subscriber.complete();
        },
        (err: unknown) => subscriber.error(err)
      );
  });
}

function isEmptyDraft(record: DraftRecord): boolean {
  return record.title === "" && record.summary === "" && record.keywords.length === 0;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined; // fails the payload schema
  }
}

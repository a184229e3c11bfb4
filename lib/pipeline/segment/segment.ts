/**
 * Segment Stage
 *
 * Splits normalized text into chunks at blank lines. Any run of two or more
 * newlines separates chunks; pieces that are empty after trimming are dropped
 * without consuming an id.
 */

import fs from "node:fs";
import type { Chunk } from "../core/schemas";
import type { StageInput, StageOptions, StageResult } from "../types";
import { defineStage, stemOf } from "../stage";

export function splitChunks(text: string): string[] {
  return text
    .split(/\n{2,}/)
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

/** "chunk-0001", "chunk-0002", ... */
export function chunkId(ordinal: number): string {
  return `chunk-${String(ordinal).padStart(4, "0")}`;
}

export function buildChunks(pieces: string[]): Chunk[] {
  return pieces.map((text, idx) => ({ id: chunkId(idx + 1), text }));
}

export function segmentText(text: string): Chunk[] {
  return buildChunks(splitChunks(text));
}

export const segmentStage = defineStage<StageOptions>({
  name: "segment",
  extensions: [".txt"],
  inputDir: (paths) => paths.refinedDir,
  outputDir: (paths) => paths.chunksDir,
  produce: async (source) => {
    const chunks = segmentText(fs.readFileSync(source, "utf-8"));
    return [
      {
        fileName: `${stemOf(source)}.chunks.json`,
        contents: JSON.stringify(chunks, null, 2),
      },
    ];
  },
});

export function segment(input: StageInput, options: StageOptions = {}): Promise<StageResult> {
  return segmentStage.run(input, options);
}

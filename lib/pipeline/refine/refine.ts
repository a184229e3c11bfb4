/**
 * Refine Stage
 *
 * Derives four artifacts from a raw text file. Each one is computed from the
 * original text, never from another transform's output:
 * - whitespace-normalized text
 * - text with ASCII punctuation removed
 * - lowercased text
 * - token frequency table
 */

import fs from "node:fs";
import type { StageInput, StageOptions, StageResult } from "../types";
import { defineStage, stemOf } from "../stage";

const ASCII_PUNCTUATION = /[!-\/:-@\[-`{-~]/g;
const WORD = /[\p{L}\p{N}_]+/gu;

export function normalizeWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(" ");
}

export function removePunctuation(text: string): string {
  return text.replace(ASCII_PUNCTUATION, "");
}

export function lowercase(text: string): string {
  return text.toLowerCase();
}

/**
 * Count word tokens case-insensitively. The map iterates in first-seen order.
 */
export function tokenCounts(text: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (const token of lowercase(text).match(WORD) ?? []) {
    counts.set(token, (counts.get(token) ?? 0) + 1);
  }
  return counts;
}

/**
 * Serialize counts as a 2-space indented JSON object. Written by hand because
 * a plain object would move integer-like keys ahead of first-seen order.
 */
export function formatCounts(counts: Map<string, number>): string {
  if (counts.size === 0) return "{}";
  const lines = [...counts].map(
    ([token, count]) => `  ${JSON.stringify(token)}: ${count}`
  );
  return `{\n${lines.join(",\n")}\n}`;
}

export const refineStage = defineStage<StageOptions>({
  name: "refine",
  extensions: [".txt"],
  inputDir: (paths) => paths.rawDir,
  outputDir: (paths) => paths.refinedDir,
  produce: async (source) => {
    const text = fs.readFileSync(source, "utf-8");
    const stem = stemOf(source);
    return [
      { fileName: `${stem}.normalized.txt`, contents: normalizeWhitespace(text) },
      { fileName: `${stem}.nopunct.txt`, contents: removePunctuation(text) },
      { fileName: `${stem}.lower.txt`, contents: lowercase(text) },
      { fileName: `${stem}.counts.json`, contents: formatCounts(tokenCounts(text)) },
    ];
  },
});

export function refine(input: StageInput, options: StageOptions = {}): Promise<StageResult> {
  return refineStage.run(input, options);
}

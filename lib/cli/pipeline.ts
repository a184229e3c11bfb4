#!/usr/bin/env node
/**
 * Pipeline CLI
 *
 * Runs all five stages on one document, handing each stage's primary
 * output to the next.
 *
 * Usage:
 *   npm run pipeline -- <document.pdf|document.docx> [options]
 */

import { ingest } from "../pipeline/ingest/ingest";
import { loadPdfTextSource } from "../pipeline/ingest/pdf-source";
import { refine } from "../pipeline/refine/refine";
import { segment } from "../pipeline/segment/segment";
import { canonicalize } from "../pipeline/canonicalize/canonicalize";
import {
  drafterFromFlags,
  draftWithProgress,
  reviewerFromFlags,
  runStageCli,
} from "./stage-cli";

const USAGE = `Usage: npm run pipeline -- <document.pdf|document.docx> [options]

Options:
  --model <id>          Model id, or provider:model (default from config.yaml)
  --provider <name>     openai | anthropic | google
  --skip-cache          Skip LLM cache
  --decisions <file>    Review with a decisions file instead of the terminal
  --config <path>       Config file (default: ./config.yaml)

Segmentation runs on the whitespace-normalized text, which has no blank
lines left, so each document becomes a single chunk. To split on paragraphs,
run the segment command on refined/<stem>.nopunct.txt instead.`;

await runStageCli("pipeline", USAGE, async ({ source, flags, config, paths }) => {
  const drafter = drafterFromFlags(flags, config, paths);
  const reviewer = reviewerFromFlags(flags);
  const pdfSource = await loadPdfTextSource();

  try {
    const raw = await ingest(source, { pdfSource, paths });
    console.error(`ingest: ${raw.outputs[0]}`);

    // refine's first output is the normalized text
    const refined = await refine(raw, { paths });
    console.error(`refine: ${refined.outputs.join(", ")}`);

    const chunks = await segment(refined, { paths });
    console.error(`segment: ${chunks.outputs[0]}`);

    const drafts = await draftWithProgress(chunks, drafter, paths);
    const canonical = await canonicalize(drafts, { reviewer, paths });

    return [
      ...raw.outputs,
      ...refined.outputs,
      ...chunks.outputs,
      ...drafts.outputs,
      ...canonical.outputs,
    ];
  } finally {
    reviewer.close?.();
  }
});

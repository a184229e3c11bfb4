#!/usr/bin/env node
/**
 * Canonicalize CLI
 *
 * Reviews each draft interactively, or applies a decisions file.
 *
 * Usage:
 *   npm run canonicalize -- <data/drafts/doc.drafts.jsonl> [--decisions <file>]
 */

import { canonicalize } from "../pipeline/canonicalize/canonicalize";
import { reviewerFromFlags, runStageCli } from "./stage-cli";

const USAGE = `Usage: npm run canonicalize -- <drafts .jsonl file> [options]

Options:
  --decisions <file>    YAML/JSON map of chunk_id -> {title, summary, keywords, approved}
  --config <path>       Config file (default: ./config.yaml)`;

await runStageCli("canonicalize", USAGE, async ({ source, flags, paths }) => {
  const reviewer = reviewerFromFlags(flags);
  try {
    const result = await canonicalize(source, { reviewer, paths });
    return result.outputs;
  } finally {
    reviewer.close?.();
  }
});

#!/usr/bin/env node
/**
 * Ingest CLI
 *
 * Usage:
 *   npm run ingest -- <document.pdf|document.docx> [--config <path>]
 */

import { ingest } from "../pipeline/ingest/ingest";
import { loadPdfTextSource } from "../pipeline/ingest/pdf-source";
import { runStageCli } from "./stage-cli";

const USAGE = "Usage: npm run ingest -- <document.pdf|document.docx> [--config <path>]";

await runStageCli("ingest", USAGE, async ({ source, paths }) => {
  const pdfSource = await loadPdfTextSource();
  const result = await ingest(source, { pdfSource, paths });
  return result.outputs;
});

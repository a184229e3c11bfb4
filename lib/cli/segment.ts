#!/usr/bin/env node
/**
 * Segment CLI
 *
 * Usage:
 *   npm run segment -- <data/refined/doc.normalized.txt> [--config <path>]
 */

import { segment } from "../pipeline/segment/segment";
import { runStageCli } from "./stage-cli";

const USAGE = "Usage: npm run segment -- <refined .txt file> [--config <path>]";

await runStageCli("segment", USAGE, async ({ source, paths }) => {
  const result = await segment(source, { paths });
  return result.outputs;
});

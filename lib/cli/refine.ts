#!/usr/bin/env node
/**
 * Refine CLI
 *
 * Usage:
 *   npm run refine -- <data/raw/doc.txt> [--config <path>]
 */

import { refine } from "../pipeline/refine/refine";
import { runStageCli } from "./stage-cli";

const USAGE = "Usage: npm run refine -- <raw .txt file> [--config <path>]";

await runStageCli("refine", USAGE, async ({ source, paths }) => {
  const result = await refine(source, { paths });
  return result.outputs;
});

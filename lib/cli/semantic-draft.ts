#!/usr/bin/env node
/**
 * Semantic Draft CLI
 *
 * Usage:
 *   npm run semantic-draft -- <data/chunks/doc.chunks.json> [options]
 */

import { drafterFromFlags, draftWithProgress, runStageCli } from "./stage-cli";

const USAGE = `Usage: npm run semantic-draft -- <chunks .json file> [options]

Options:
  --model <id>          Model id, or provider:model (default from config.yaml)
  --provider <name>     openai | anthropic | google
  --skip-cache          Skip LLM cache
  --config <path>       Config file (default: ./config.yaml)`;

await runStageCli("semantic-draft", USAGE, async ({ source, flags, config, paths }) => {
  // Credentials are checked here, before the source is read
  const drafter = drafterFromFlags(flags, config, paths);
  const result = await draftWithProgress(source, drafter, paths);
  return result.outputs;
});

/**
 * Reviewer implementations for the canonicalize stage.
 *
 * - Terminal: asks for each field on the console, one record at a time
 * - Decisions file: reads pre-made decisions keyed by chunk_id (YAML or JSON)
 */

import fs from "node:fs";
import path from "node:path";
import { createInterface, type Interface } from "node:readline/promises";
import yaml from "js-yaml";
import { z } from "zod/v4";
import { InvalidInputError, NotFoundError, errorMessage } from "@/lib/errors";
import {
  decisionsFileSchema,
  type DraftRecord,
  type ReviewerDecision,
} from "../core/schemas";
import type { Reviewer } from "../core/types";
import { parseApproval, parseKeywords } from "./canonicalize";

// ============================================================================
// Terminal reviewer
// ============================================================================

export interface TerminalReviewerOptions {
  input?: NodeJS.ReadableStream;
  /** Prompts go to stderr by default so stdout only carries output paths */
  output?: NodeJS.WritableStream;
}

export function createTerminalReviewer(options: TerminalReviewerOptions = {}): Reviewer {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stderr;
  let rl: Interface | null = null;

  return {
    async review(record, { index, total }): Promise<ReviewerDecision> {
      // Opened on first use so a batch that fails validation never grabs the terminal
      rl ??= createInterface({ input, output, terminal: false });

      output.write(`\n[${index + 1}/${total}] ${record.chunk_id}\n`);
      output.write(formatDraft(record));

      const title = await rl.question(`Title [${record.title}]: `);
      const summary = await rl.question(`Summary [${record.summary}]: `);
      const keywords = await rl.question(`Keywords [${record.keywords.join(", ")}]: `);
      const approval = await rl.question("Approve? (y/N): ");

      return {
        title: title.trim(),
        summary: summary.trim(),
        keywords: parseKeywords(keywords),
        approved: parseApproval(approval),
      };
    },
    close() {
      rl?.close();
      rl = null;
    },
  };
}

export function formatDraft(record: DraftRecord): string {
  return [
    `  title:      ${record.title}`,
    `  summary:    ${record.summary}`,
    `  keywords:   ${record.keywords.join(", ")}`,
    `  confidence: ${record.confidence}`,
    "",
  ].join("\n");
}

// ============================================================================
// Decisions-file reviewer
// ============================================================================

export type DecisionsMap = z.infer<typeof decisionsFileSchema>;

/**
 * Load a decisions file: a mapping of chunk_id to
 * { title?, summary?, keywords?, approved? }. JSON is read as YAML.
 */
export function loadDecisionsFile(filePath: string): DecisionsMap {
  const resolved = path.resolve(filePath);
  if (!fs.existsSync(resolved)) {
    throw new NotFoundError(resolved);
  }

  let raw: unknown;
  try {
    raw = yaml.load(fs.readFileSync(resolved, "utf-8"));
  } catch (err) {
    throw new InvalidInputError(
      `Could not parse decisions file ${resolved}: ${errorMessage(err)}`,
      { path: resolved }
    );
  }

  const result = decisionsFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new InvalidInputError(
      `Invalid decisions file ${resolved}: ${z.prettifyError(result.error)}`,
      { path: resolved }
    );
  }
  return result.data;
}

/** Records without an entry keep their drafted values and stay unapproved. */
export function createDecisionsReviewer(decisions: DecisionsMap): Reviewer {
  return {
    async review(record) {
      return Object.hasOwn(decisions, record.chunk_id)
        ? decisions[record.chunk_id]
        : { approved: false };
    },
  };
}

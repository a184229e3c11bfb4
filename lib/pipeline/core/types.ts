/**
 * Collaborator interfaces for the pipeline.
 *
 * The stages only see these contracts; the mupdf text source, the LLM
 * drafter and the reviewers are implementations chosen by the caller.
 */

import type { Chunk, DraftRecord, ReviewerDecision } from "./schemas";

// ============================================================================
// PDF text - page-text extraction capability
// ============================================================================

export interface PdfTextSource {
  readonly name: string;
  /** One entry per page, in page order. Pages without text yield "" */
  extractPages(pdfPath: string): Promise<string[]>;
}

// ============================================================================
// Drafting - one call per chunk
// ============================================================================

export type DraftResponse =
  | { kind: "object"; value: unknown }
  | { kind: "text"; text: string };

export interface Drafter {
  draft(chunk: Chunk): Promise<DraftResponse>;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

// ============================================================================
// Review - one decision per draft record
// ============================================================================

export interface Reviewer {
  review(record: DraftRecord, position: { index: number; total: number }): Promise<ReviewerDecision>;
  close?(): void;
}

/**
 * Zod schemas for the artifacts that flow between stages.
 *
 * These schemas define the contracts between stages and are used for:
 * - Validating files read back from disk
 * - Validating LLM outputs
 * - TypeScript type inference
 */

import { z } from "zod/v4";

// ============================================================================
// Segment
// ============================================================================

export const chunkSchema = z.object({
  id: z.string(),
  text: z.string(),
});

export const chunksFileSchema = z.array(chunkSchema);

export type Chunk = z.infer<typeof chunkSchema>;

// ============================================================================
// Semantic draft
// ============================================================================

export const DRAFT_FIELDS = [
  "chunk_id",
  "title",
  "summary",
  "keywords",
  "confidence",
] as const;

export const draftRecordSchema = z.object({
  chunk_id: z.string(),
  title: z.string(),
  summary: z.string(),
  keywords: z.array(z.string()),
  confidence: z.number(),
});

export type DraftRecord = z.infer<typeof draftRecordSchema>;

/**
 * What the model is asked to return. chunk_id and confidence are stamped
 * by the pipeline, so the model may omit them.
 */
export const draftPayloadSchema = z.object({
  chunk_id: z.string().optional(),
  title: z.string(),
  summary: z.string(),
  keywords: z.array(z.string()),
  confidence: z.number().optional(),
});

export type DraftPayload = z.infer<typeof draftPayloadSchema>;

// ============================================================================
// Canonicalize
// ============================================================================

export const canonicalRecordSchema = draftRecordSchema.extend({
  approved: z.boolean(),
});

export type CanonicalRecord = z.infer<typeof canonicalRecordSchema>;

export const reviewerDecisionSchema = z.object({
  title: z.string().optional(),
  summary: z.string().optional(),
  keywords: z.array(z.string()).optional(),
  approved: z.boolean().default(false),
});

export type ReviewerDecision = z.infer<typeof reviewerDecisionSchema>;

export const decisionsFileSchema = z.record(z.string(), reviewerDecisionSchema);

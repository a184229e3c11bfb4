/**
 * Ingest Stage
 *
 * Turns a PDF or DOCX document into a raw text file under raw/.
 * The format is chosen from the file extension alone.
 */

import fs from "node:fs";
import path from "node:path";
import {
  DependencyMissingError,
  ExtractionError,
  InvalidInputError,
  errorMessage,
} from "@/lib/errors";
import type { PdfTextSource } from "../core/types";
import type { StageInput, StageOptions, StageResult } from "../types";
import { defineStage, stemOf } from "../stage";
import { extractDocxText } from "./docx";

export const INGEST_EXTENSIONS = [".pdf", ".docx"];

export interface IngestOptions extends StageOptions {
  /** Page text capability for PDF input; null when none could be loaded */
  pdfSource: PdfTextSource | null;
}

export async function extractDocumentText(
  source: string,
  pdfSource: PdfTextSource | null
): Promise<string> {
  const ext = path.extname(source).toLowerCase();
  switch (ext) {
    case ".pdf":
      return extractPdfText(source, pdfSource);
    case ".docx":
      return extractDocxText(fs.readFileSync(source));
    default:
      throw new InvalidInputError(
        `Unsupported file type "${ext}". Provide a PDF or DOCX file.`
      );
  }
}

/**
 * Concatenate page texts in page order with no separator.
 */
export async function extractPdfText(
  source: string,
  pdfSource: PdfTextSource | null
): Promise<string> {
  if (!pdfSource) {
    throw new DependencyMissingError(
      "PDF text extraction",
      "Install mupdf with: npm install mupdf"
    );
  }

  let pages: string[];
  try {
    pages = await pdfSource.extractPages(source);
  } catch (err) {
    throw new ExtractionError(
      `Failed to extract text from PDF with ${pdfSource.name}: ${errorMessage(err)}`,
      err
    );
  }
  return pages.filter((text) => text.length > 0).join("");
}

export const ingestStage = defineStage<IngestOptions>({
  name: "ingest",
  extensions: INGEST_EXTENSIONS,
  inputDir: null,
  outputDir: (paths) => paths.rawDir,
  produce: async (source, options) => {
    const text = await extractDocumentText(source, options.pdfSource);
    return [{ fileName: `${stemOf(source)}.txt`, contents: text }];
  },
});

export function ingest(input: StageInput, options: IngestOptions): Promise<StageResult> {
  return ingestStage.run(input, options);
}

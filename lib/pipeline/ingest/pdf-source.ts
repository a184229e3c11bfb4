/**
 * mupdf-backed page text extraction.
 *
 * mupdf is loaded once at startup through loadPdfTextSource(); callers inject
 * the result into the ingest stage. When it cannot be loaded the ingest stage
 * reports a DependencyMissingError for PDF input.
 */

import fs from "node:fs";
import type { Document as MupdfDocument } from "mupdf";
import type { PdfTextSource } from "../core/types";

type MupdfModule = typeof import("mupdf").default;

export async function loadPdfTextSource(): Promise<PdfTextSource | null> {
  try {
    const { default: mupdf } = await import("mupdf");
    return createMupdfTextSource(mupdf);
  } catch {
    // mupdf is missing or its wasm failed to initialise; PDF input will be rejected
    return null;
  }
}

export function createMupdfTextSource(mupdf: MupdfModule): PdfTextSource {
  return {
    name: "mupdf",
    async extractPages(pdfPath: string): Promise<string[]> {
      const doc = openPdf(mupdf, fs.readFileSync(pdfPath));
      const pages: string[] = [];
      const totalPages = doc.countPages();
      for (let i = 0; i < totalPages; i++) {
        const page = doc.loadPage(i);
        pages.push(page.toStructuredText().asText());
        await tick();
      }
      return pages;
    },
  };
}

const tick = () => new Promise<void>((r) => setImmediate(r));

function openPdf(mupdf: MupdfModule, buffer: Buffer): MupdfDocument {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    return mupdf.Document.openDocument(buffer, "application/pdf");
  } finally {
    process.stderr.write = origWrite;
  }
}

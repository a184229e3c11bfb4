/**
 * DOCX text extraction.
 *
 * A DOCX file is a ZIP archive whose main part is a WordprocessingML
 * document. Every paragraph becomes one line: runs contribute their text,
 * every tab element a "\t" (tab stop definitions included) and line/page
 * breaks a "\n". Empty paragraphs are kept as empty lines, so two
 * consecutive empty paragraphs leave a blank line that segmentation later
 * treats as a chunk boundary.
 */

import JSZip from "jszip";
import { parseStringPromise } from "xml2js";
import { parseDocument } from "htmlparser2";
import { isCDATA, isTag, isText, type ChildNode, type Element } from "domhandler";
import { ExtractionError, errorMessage } from "@/lib/errors";

const WORDML_NAMESPACES = new Set([
  "http://schemas.openxmlformats.org/wordprocessingml/2006/main",
  "http://purl.oclc.org/ooxml/wordprocessingml/main",
]);

const DEFAULT_MAIN_PART = "word/document.xml";
const PACKAGE_RELS = "_rels/.rels";

export async function extractDocxText(buffer: Buffer): Promise<string> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(buffer);
  } catch (err) {
    throw new ExtractionError(`Malformed DOCX archive: ${errorMessage(err)}`, err);
  }

  const partName = await findMainPart(zip);
  const entry = zip.file(partName);
  if (!entry) {
    throw new ExtractionError(`DOCX archive has no ${partName} entry`);
  }

  return docxTextFromXml(await entry.async("string"), partName);
}

/**
 * Extract paragraph text from the XML of a WordprocessingML main part.
 */
export async function docxTextFromXml(
  xml: string,
  partName = DEFAULT_MAIN_PART
): Promise<string> {
  await assertWellFormed(xml, partName);
  const dom = parseDocument(xml, { xmlMode: true });
  const root = dom.children.find(isTag);
  if (!root || !isWordElement(root, "document")) {
    throw new ExtractionError(`${partName} is not a WordprocessingML document`);
  }

  const paragraphs: Element[] = [];
  collectParagraphs(root.children, paragraphs);
  return paragraphs.map(paragraphText).join("\n");
}

// ============================================================================
// Internal helpers
// ============================================================================

/**
 * htmlparser2 recovers from broken markup, so a strict sax pass (through
 * xml2js) rejects truncated or mismatched XML first.
 */
async function assertWellFormed(xml: string, partName: string): Promise<void> {
  try {
    await parseStringPromise(xml, { strict: true });
  } catch (err) {
    throw new ExtractionError(`Malformed XML in ${partName}: ${errorMessage(err)}`, err);
  }
}

/**
 * The package relationships name the main document part; fall back to the
 * conventional location when they are absent.
 */
async function findMainPart(zip: JSZip): Promise<string> {
  const rels = zip.file(PACKAGE_RELS);
  if (!rels) return DEFAULT_MAIN_PART;

  const xml = await rels.async("string");
  await assertWellFormed(xml, PACKAGE_RELS);
  const dom = parseDocument(xml, { xmlMode: true });
  const target = findOfficeDocumentTarget(dom.children);
  return target ? target.replace(/^\/+/, "") : DEFAULT_MAIN_PART;
}

function findOfficeDocumentTarget(nodes: ChildNode[]): string | undefined {
  for (const node of nodes) {
    if (!isTag(node)) continue;
    const type = node.attribs.Type ?? "";
    if (localName(node) === "Relationship" && type.endsWith("/officeDocument")) {
      return node.attribs.Target;
    }
    const nested = findOfficeDocumentTarget(node.children);
    if (nested) return nested;
  }
  return undefined;
}

function collectParagraphs(nodes: ChildNode[], out: Element[]): void {
  for (const node of nodes) {
    if (!isTag(node)) continue;
    if (isWordElement(node, "p")) out.push(node);
    collectParagraphs(node.children, out);
  }
}

function paragraphText(paragraph: Element): string {
  const parts: string[] = [];
  walkRuns(paragraph.children, parts);
  return parts.join("");
}

function walkRuns(nodes: ChildNode[], parts: string[]): void {
  for (const node of nodes) {
    if (!isTag(node)) continue;

    if (isWordElement(node, "t")) {
      parts.push(leadingText(node));
    } else if (isWordElement(node, "tab")) {
      parts.push("\t");
    } else if (isWordElement(node, "br") || isWordElement(node, "cr")) {
      parts.push("\n");
    }
    walkRuns(node.children, parts);
  }
}

/** Text before the element's first child element. */
function leadingText(el: Element): string {
  let text = "";
  for (const child of el.children) {
    if (isTag(child)) break;
    if (isText(child)) text += child.data;
    else if (isCDATA(child)) {
      for (const inner of child.children) {
        if (isText(inner)) text += inner.data;
      }
    }
  }
  return text;
}

function isWordElement(el: Element, name: string): boolean {
  if (localName(el) !== name) return false;
  const ns = namespaceOf(el);
  return ns !== undefined && WORDML_NAMESPACES.has(ns);
}

function localName(el: Element): string {
  const idx = el.name.indexOf(":");
  return idx === -1 ? el.name : el.name.slice(idx + 1);
}

/** Resolve the element's prefix against the xmlns declarations in scope. */
function namespaceOf(el: Element): string | undefined {
  const idx = el.name.indexOf(":");
  const attr = idx === -1 ? "xmlns" : `xmlns:${el.name.slice(0, idx)}`;

  let current: Element | null = el;
  while (current) {
    const uri = current.attribs[attr];
    if (uri !== undefined) return uri;
    current = current.parent && isTag(current.parent) ? current.parent : null;
  }
  return undefined;
}

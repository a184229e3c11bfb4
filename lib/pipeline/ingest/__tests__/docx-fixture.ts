import JSZip from "jszip";

export const W_NS = "http://schemas.openxmlformats.org/wordprocessingml/2006/main";

export function documentXml(body: string): string {
  return (
    `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>\n` +
    `<w:document xmlns:w="${W_NS}"><w:body>${body}</w:body></w:document>`
  );
}

export function paragraph(text: string): string {
  return text === "" ? "<w:p/>" : `<w:p><w:r><w:t>${text}</w:t></w:r></w:p>`;
}

/** Build a minimal .docx archive in memory. */
export async function buildDocx(
  body: string,
  options: { partName?: string; rels?: boolean } = {}
): Promise<Buffer> {
  const partName = options.partName ?? "word/document.xml";
  const zip = new JSZip();
  zip.file(partName, documentXml(body));
  if (options.rels ?? true) {
    zip.file(
      "_rels/.rels",
      `<?xml version="1.0" encoding="UTF-8"?>` +
        `<Relationships xmlns="http://schemas.openxmlformats.org/package/2006/relationships">` +
        `<Relationship Id="rId1" Type="http://schemas.openxmlformats.org/officeDocument/2006/relationships/officeDocument" Target="${partName}"/>` +
        `</Relationships>`
    );
  }
  return zip.generateAsync({ type: "nodebuffer" });
}

import { describe, it, expect } from "vitest";
import { renderPrompt } from "../prompt";

describe("renderPrompt", () => {
  it("renders the semantic_draft template", async () => {
    const messages = await renderPrompt("semantic_draft", {
      chunk_id: "chunk-0001",
      chunk_text: "Solar panels convert light.",
    });
    expect(messages.map((m) => m.role)).toEqual(["system", "user"]);
  });

  it("substitutes the chunk into the user message", async () => {
    const messages = await renderPrompt("semantic_draft", {
      chunk_id: "chunk-0042",
      chunk_text: "Tides follow the moon.",
    });
    expect(messages[1].content).toBe(
      "Chunk ID: chunk-0042\n\nText:\nTides follow the moon."
    );
  });

  it("system content is a trimmed string", async () => {
    const messages = await renderPrompt("semantic_draft", {
      chunk_id: "chunk-0001",
      chunk_text: "x",
    });
    const system = messages[0].content;
    expect(system).not.toMatch(/^\s/);
    expect(system).not.toMatch(/\s$/);
    expect(system.startsWith("You are a careful extractor.")).toBe(true);
  });

  it("does not escape chunk text", async () => {
    const messages = await renderPrompt("semantic_draft", {
      chunk_id: "chunk-0001",
      chunk_text: 'Use <b> & "quotes"',
    });
    expect(messages[1].content.endsWith('Use <b> & "quotes"')).toBe(true);
  });
});

import { describe, expect, it } from "vitest";

import { buildContext, sourceLabel } from "./context.js";

describe("sourceLabel", () => {
  it("shortens URLs to host and path", () => {
    expect(sourceLabel("https://example.com/")).toBe("example.com");
    expect(sourceLabel("http://example.com:8080/docs/intro#top")).toBe("example.com:8080/docs/intro");
    expect(sourceLabel(`https://example.com/${"p".repeat(80)}`)).toBe(`example.com/${"p".repeat(49)}`);
  });

  it("uses the base name of file sources", () => {
    expect(sourceLabel("reports/2024/summary.pdf")).toBe("summary.pdf");
    expect(sourceLabel("notes.md")).toBe("notes.md");
  });

  it("falls back to unknown for an empty source", () => {
    expect(sourceLabel("")).toBe("unknown");
  });
});

describe("buildContext", () => {
  it("numbers chunks and names their source", () => {
    expect(
      buildContext([
        { chunkId: 1, source: "a.pdf", text: "First." },
        { chunkId: 2, source: "b.pdf", text: "Second." }
      ])
    ).toBe("Chunk 1 (a.pdf): First.\n\nChunk 2 (b.pdf): Second.");
  });

  it("is empty without blocks", () => {
    expect(buildContext([])).toBe("");
  });
});

import { HumanMessage } from "@langchain/core/messages";
import { FakeListChatModel } from "@langchain/core/utils/testing";
import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  EmbeddingProviderError,
  InvalidArgumentError,
  SummarizationError,
  UnreadableSourceError
} from "../errors.js";
import type { PdfInput, TextFileInput, UrlInput } from "../loaders/types.js";
import { SessionRegistry } from "../sessions/registry.js";
import { KeywordEmbeddings, StaticExtractor } from "../testing/fakes.js";
import { ingestSource, type IngestionDeps, type IngestionSettings } from "./ingest.js";

const settings: IngestionSettings = {
  embeddingModel: "test-embedding",
  chunkSize: 800,
  chunkOverlap: 200,
  distanceMetric: "l2",
  summaryCharBudget: 8000
};

const pdfBytes = new Uint8Array([37, 80, 68, 70]);

describe("ingestSource", () => {
  let registry: SessionRegistry;
  let embeddings: KeywordEmbeddings;
  let chatModel: FakeListChatModel;
  let pdf: StaticExtractor<PdfInput>;
  let url: StaticExtractor<UrlInput>;
  let text: StaticExtractor<TextFileInput>;
  let deps: IngestionDeps;

  beforeEach(() => {
    registry = new SessionRegistry();
    embeddings = new KeywordEmbeddings(["apple", "banana", "rocket"]);
    chatModel = new FakeListChatModel({ responses: ["The page covers rockets."] });
    pdf = new StaticExtractor<PdfInput>([
      { text: "Apples grow on trees.", pageNumber: 1 },
      { text: "Bananas are yellow.", pageNumber: 2 }
    ]);
    url = new StaticExtractor<UrlInput>([{ text: "Rockets launch from pads.", pageNumber: null }]);
    text = new StaticExtractor<TextFileInput>([{ text: "Plain notes about apples.", pageNumber: null }]);
    deps = { registry, embeddings, chatModel, extractors: { pdf, url, text }, settings };
  });

  it("indexes a PDF into a new session", async () => {
    const result = await ingestSource({ kind: "pdf", fileName: "report.pdf", data: pdfBytes }, deps);

    expect(result.summary).toBeUndefined();
    expect(result.stats).toEqual({
      chunkCount: 2,
      totalChars: 40,
      avgChunkSize: 20,
      chunkSize: 800,
      chunkOverlap: 200,
      embeddingModel: "test-embedding",
      embeddingDimension: 4,
      distanceMetric: "l2",
      sourceKind: "pdf"
    });

    const session = registry.get(result.sessionId);
    expect(session.sourceName).toBe("report.pdf");
    expect(session.indexStore.toStored().map((c) => [c.sourceId, c.pageNumber])).toEqual([
      ["report.pdf", 1],
      ["report.pdf", 2]
    ]);
    expect(pdf.inputs).toEqual([{ fileName: "report.pdf", data: pdfBytes }]);
  });

  it("sanitizes the PDF file name", async () => {
    const result = await ingestSource({ kind: "pdf", fileName: "my report (1).pdf", data: pdfBytes }, deps);
    expect(registry.get(result.sessionId).sourceName).toBe("my_report__1_.pdf");
  });

  it("summarizes web pages and cites the URL", async () => {
    const result = await ingestSource({ kind: "url", url: "  https://example.com/rockets  " }, deps);

    expect(result.summary).toBe("The page covers rockets.\n\n[Source: https://example.com/rockets]");
    expect(result.stats.sourceKind).toBe("url");
    const session = registry.get(result.sessionId);
    expect(session.sourceName).toBe("https://example.com/rockets");
    expect(session.summary).toBe(result.summary);
    expect(url.inputs).toEqual([{ url: "https://example.com/rockets" }]);
  });

  it("keeps a summary that already cites the URL", async () => {
    deps.chatModel = new FakeListChatModel({
      responses: ["Rockets need pads. [Source: https://example.com/rockets]"]
    });
    const result = await ingestSource({ kind: "url", url: "https://example.com/rockets" }, deps);
    expect(result.summary).toBe("Rockets need pads. [Source: https://example.com/rockets]");
  });

  it("truncates the page text to the summary budget", async () => {
    const invoke = vi.spyOn(chatModel, "invoke");
    deps.settings = { ...settings, summaryCharBudget: 10 };

    await ingestSource({ kind: "url", url: "https://example.com/rockets" }, deps);

    const [input] = invoke.mock.calls[0] ?? [];
    const first = Array.isArray(input) ? input[0] : undefined;
    expect(first).toBeInstanceOf(HumanMessage);
    const prompt = first instanceof HumanMessage ? String(first.content) : "";
    expect(prompt).toContain("Content:\nRockets la\n\n");
    expect(prompt).toContain("[Source: https://example.com/rockets]");
  });

  it("indexes markdown and text files", async () => {
    const result = await ingestSource({ kind: "text", filePath: "/data/notes.md" }, deps);
    expect(registry.get(result.sessionId).sourceName).toBe("notes.md");
    expect(text.inputs).toEqual([{ filePath: "/data/notes.md" }]);

    await expect(ingestSource({ kind: "text", filePath: "/data/table.csv" }, deps)).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
  });

  it("discards the session when embedding fails", async () => {
    vi.spyOn(embeddings, "embedDocuments").mockRejectedValueOnce(new Error("provider down"));
    const remove = vi.spyOn(registry, "delete");

    await expect(
      ingestSource({ kind: "pdf", fileName: "report.pdf", data: pdfBytes }, deps)
    ).rejects.toBeInstanceOf(EmbeddingProviderError);

    expect(remove).toHaveBeenCalledTimes(1);
    expect(registry.list()).toEqual([]);
  });

  it("keeps the ingestion error when discarding the session fails", async () => {
    vi.spyOn(embeddings, "embedDocuments").mockRejectedValueOnce(new Error("provider down"));
    vi.spyOn(registry, "delete").mockRejectedValueOnce(new Error("EACCES: permission denied"));
    const warn = vi.fn();

    await expect(
      ingestSource({ kind: "pdf", fileName: "report.pdf", data: pdfBytes }, { ...deps, log: { info: vi.fn(), warn } })
    ).rejects.toBeInstanceOf(EmbeddingProviderError);

    expect(warn).toHaveBeenCalledTimes(1);
    expect(String(warn.mock.calls[0]?.[0])).toMatch(
      /^\[Ingest\] Aborted report\.pdf; could not discard session [0-9a-f-]{36}: EACCES: permission denied$/
    );
  });

  it("discards the session when summarization fails", async () => {
    vi.spyOn(chatModel, "invoke").mockRejectedValueOnce(new Error("model overloaded"));
    const create = vi.spyOn(registry, "create");

    await expect(ingestSource({ kind: "url", url: "https://example.com/rockets" }, deps)).rejects.toBeInstanceOf(
      SummarizationError
    );

    const created = create.mock.results[0];
    const pendingId = created?.type === "return" ? created.value.sessionId : "";
    expect(pendingId).not.toBe("");
    expect(() => registry.get(pendingId)).toThrow();
    expect(registry.list()).toEqual([]);
  });

  it("rejects an empty summary", async () => {
    deps.chatModel = new FakeListChatModel({ responses: ["   "] });
    await expect(ingestSource({ kind: "url", url: "https://example.com/rockets" }, deps)).rejects.toBeInstanceOf(
      SummarizationError
    );
    expect(registry.list()).toEqual([]);
  });

  it("fails with UnreadableSource when nothing was extracted", async () => {
    deps.extractors = { pdf: new StaticExtractor<PdfInput>([{ text: "  ", pageNumber: 1 }]), url, text };
    const create = vi.spyOn(registry, "create");

    await expect(
      ingestSource({ kind: "pdf", fileName: "scan.pdf", data: pdfBytes }, deps)
    ).rejects.toBeInstanceOf(UnreadableSourceError);
    expect(create).not.toHaveBeenCalled();
    expect(embeddings.documentCalls).toBe(0);
  });

  it("wraps extractor failures as UnreadableSource", async () => {
    vi.spyOn(url, "extract").mockRejectedValueOnce(new Error("ECONNRESET"));

    const err = await ingestSource({ kind: "url", url: "https://example.com/rockets" }, deps).catch(
      (e: unknown) => e
    );
    expect(err).toBeInstanceOf(UnreadableSourceError);
    expect(err).toMatchObject({ message: "Could not read source: https://example.com/rockets" });
  });

  it("validates sources before extracting", async () => {
    await expect(ingestSource({ kind: "url", url: "http://localhost:8080/admin" }, deps)).rejects.toBeInstanceOf(
      InvalidArgumentError
    );
    await expect(
      ingestSource({ kind: "pdf", fileName: "notes.docx", data: pdfBytes }, deps)
    ).rejects.toBeInstanceOf(InvalidArgumentError);

    expect(url.inputs).toEqual([]);
    expect(pdf.inputs).toEqual([]);
  });
});

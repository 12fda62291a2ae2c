import type { Document } from "@langchain/core/documents";

import type { ExtractedPage } from "./types.js";

type AnyMetadata = Record<string, unknown>;

function pageNumberOf(metadata: AnyMetadata): number | null {
  const loc = metadata.loc;
  if (loc && typeof loc === "object" && "pageNumber" in loc) {
    const page = loc.pageNumber;
    if (typeof page === "number" && Number.isInteger(page)) return page;
  }
  return null;
}

/** Loader documents to pages; empty documents are dropped. */
export function documentsToPages(docs: readonly Document<AnyMetadata>[]): ExtractedPage[] {
  return docs
    .map((d) => ({ text: d.pageContent, pageNumber: pageNumberOf(d.metadata) }))
    .filter((p) => p.text.trim().length > 0);
}

import { RecursiveCharacterTextSplitter } from "@langchain/textsplitters";

import { InvalidArgumentError } from "../errors.js";
import type { ExtractedPage } from "../loaders/types.js";
import type { Chunk } from "../retrieval/types.js";

export const DEFAULT_CHUNK_SIZE = 800;
export const DEFAULT_CHUNK_OVERLAP = 200;

export type ChunkOptions = {
  sourceId: string;
  chunkSize?: number;
  chunkOverlap?: number;
};

function createSplitter(opts: ChunkOptions): RecursiveCharacterTextSplitter {
  const chunkSize = opts.chunkSize ?? DEFAULT_CHUNK_SIZE;
  const chunkOverlap = opts.chunkOverlap ?? DEFAULT_CHUNK_OVERLAP;

  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidArgumentError(`chunkSize must be a positive integer (got ${chunkSize})`);
  }
  if (!Number.isInteger(chunkOverlap) || chunkOverlap < 0 || chunkOverlap >= chunkSize) {
    throw new InvalidArgumentError(
      `chunkOverlap must be an integer in [0, chunkSize) (got ${chunkOverlap}, chunkSize ${chunkSize})`
    );
  }

  return new RecursiveCharacterTextSplitter({ chunkSize, chunkOverlap });
}

/**
 * Splits pages into overlapping chunks, preferring paragraph, then line, then
 * word boundaries. Chunks never cross a page; `positionIndex` runs across the
 * whole document.
 */
export async function splitPages(
  pages: readonly ExtractedPage[],
  opts: ChunkOptions
): Promise<Chunk[]> {
  const splitter = createSplitter(opts);

  const chunks: Chunk[] = [];
  for (const page of pages) {
    if (!page.text.trim()) continue;
    const parts = await splitter.splitText(page.text);
    for (const text of parts) {
      chunks.push({
        text,
        sourceId: opts.sourceId,
        positionIndex: chunks.length,
        pageNumber: page.pageNumber
      });
    }
  }
  return chunks;
}

export async function splitText(text: string, opts: ChunkOptions): Promise<Chunk[]> {
  return splitPages([{ text, pageNumber: null }], opts);
}

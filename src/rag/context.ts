import path from "node:path";

export const PREVIEW_CHARS = 200;

/** Short display name for a chunk source: host and path for URLs, base name for files. */
export function sourceLabel(sourceId: string): string {
  if (sourceId.startsWith("http://") || sourceId.startsWith("https://")) {
    try {
      const url = new URL(sourceId);
      const urlPath = url.pathname === "/" ? "" : url.pathname;
      return url.host + urlPath.slice(0, 50);
    } catch {
      return sourceId.slice(0, 60);
    }
  }
  if (!sourceId) return "unknown";
  return path.basename(sourceId);
}

export type ContextBlock = {
  chunkId: number;
  source: string;
  text: string;
};

export function buildContext(blocks: readonly ContextBlock[]): string {
  return blocks.map((b) => `Chunk ${b.chunkId} (${b.source}): ${b.text}`).join("\n\n");
}

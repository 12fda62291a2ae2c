import { promises as fs } from "node:fs";
import path from "node:path";

import type { App } from "../../app.js";
import { InvalidArgumentError, UnreadableSourceError } from "../../errors.js";
import type { IngestSource } from "../../rag/ingest.js";
import { formatIngestion } from "../format.js";

export async function toIngestSource(target: string): Promise<IngestSource> {
  if (/^https?:\/\//i.test(target)) {
    return { kind: "url", url: target };
  }
  if (path.extname(target).toLowerCase() === ".pdf") {
    let data: Buffer;
    try {
      data = await fs.readFile(target);
    } catch (err: unknown) {
      throw new UnreadableSourceError(`Could not read source: ${target}`, { cause: err });
    }
    return { kind: "pdf", fileName: path.basename(target), data };
  }
  return { kind: "text", filePath: target };
}

export async function runIngestCommand(args: string[], app: App): Promise<void> {
  const target = args[0];
  if (!target) {
    throw new InvalidArgumentError("Usage: askdoc ingest <file.pdf|file.txt|file.md|url>");
  }

  const result = await app.ingest(await toIngestSource(target));
  process.stdout.write(`${formatIngestion(result)}\n`);
}

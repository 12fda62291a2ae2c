import { promises as fs } from "node:fs";
import path from "node:path";

import { storedSessionSchema, type StoredSession } from "../retrieval/types.js";

function isNotFound(err: unknown): boolean {
  return typeof err === "object" && err !== null && "code" in err && err.code === "ENOENT";
}

export function sessionFilePath(sessionDir: string, sessionId: string): string {
  return path.join(sessionDir, `${sessionId}.json`);
}

export async function saveSessionFile(sessionDir: string, session: StoredSession): Promise<void> {
  await fs.mkdir(sessionDir, { recursive: true });
  const filePath = sessionFilePath(sessionDir, session.sessionId);
  // Write then rename so a reader never sees a half-written file.
  const tmpPath = `${filePath}.tmp`;
  await fs.writeFile(tmpPath, JSON.stringify(session), "utf-8");
  await fs.rename(tmpPath, filePath);
}

export async function loadSessionFile(filePath: string): Promise<StoredSession> {
  const raw = await fs.readFile(filePath, "utf-8");
  const result = storedSessionSchema.safeParse(JSON.parse(raw));
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join(".")}: ${e.message}`)
      .join("; ");
    throw new Error(`Invalid session file ${filePath}: ${errors}`);
  }
  return result.data;
}

export async function deleteSessionFile(sessionDir: string, sessionId: string): Promise<void> {
  try {
    await fs.unlink(sessionFilePath(sessionDir, sessionId));
  } catch (err: unknown) {
    if (isNotFound(err)) return;
    throw err;
  }
}

export async function listSessionFiles(sessionDir: string): Promise<string[]> {
  let names: string[];
  try {
    names = await fs.readdir(sessionDir);
  } catch (err: unknown) {
    if (isNotFound(err)) return [];
    throw err;
  }
  return names
    .filter((n) => n.endsWith(".json"))
    .sort()
    .map((n) => path.join(sessionDir, n));
}

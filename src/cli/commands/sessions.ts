import type { App } from "../../app.js";
import { InvalidArgumentError } from "../../errors.js";
import { formatSessionLine, formatSessionSummary } from "../format.js";

export async function runSessionsCommand(app: App): Promise<void> {
  const sessions = app.registry.list();
  if (sessions.length === 0) {
    process.stdout.write("No sessions\n");
    return;
  }
  process.stdout.write(`${sessions.map(formatSessionLine).join("\n")}\n`);
}

export async function runShowCommand(args: string[], app: App): Promise<void> {
  const sessionId = args[0];
  if (!sessionId) {
    throw new InvalidArgumentError("Usage: askdoc show <sessionId>");
  }
  process.stdout.write(`${formatSessionSummary(app.registry.describe(sessionId))}\n`);
}

export async function runDeleteCommand(args: string[], app: App): Promise<void> {
  const sessionId = args[0];
  if (!sessionId) {
    throw new InvalidArgumentError("Usage: askdoc delete <sessionId>");
  }
  await app.registry.delete(sessionId);
  process.stdout.write(`Deleted ${sessionId}\n`);
}

import type { App } from "../../app.js";
import { formatAnswer } from "../format.js";
import { parseAskArgs } from "../parse.js";

export async function runAskCommand(args: string[], app: App): Promise<void> {
  const parsed = parseAskArgs(args);
  const record = await app.answer({
    sessionId: parsed.sessionId,
    question: parsed.question,
    ...(parsed.similarityThreshold != null ? { similarityThreshold: parsed.similarityThreshold } : {}),
    ...(parsed.initialK != null ? { initialK: parsed.initialK } : {})
  });
  process.stdout.write(`${formatAnswer(record)}\n`);
}

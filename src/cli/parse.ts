import { InvalidArgumentError } from "../errors.js";

export type Command = "ingest" | "ask" | "sessions" | "show" | "delete";

const COMMANDS: readonly Command[] = ["ingest", "ask", "sessions", "show", "delete"];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

export function parseCli(argv: string[]): { command: Command; args: string[] } {
  const [, , command, ...rest] = argv;
  if (!isCommand(command)) {
    throw new InvalidArgumentError(`Usage: askdoc <${COMMANDS.join("|")}> [...]`);
  }
  return { command, args: rest };
}

export type AskArgs = {
  sessionId: string;
  question: string;
  similarityThreshold: number | null;
  initialK: number | null;
};

const ASK_USAGE = "Usage: askdoc ask [--threshold <0..1>] [--k <n>] <sessionId> <question>";

function readNumberFlag(name: string, value: string | undefined): number {
  const n = Number(value);
  if (value == null || value.trim() === "" || !Number.isFinite(n)) {
    throw new InvalidArgumentError(`${name} expects a number`);
  }
  return n;
}

export function parseAskArgs(args: string[]): AskArgs {
  let similarityThreshold: number | null = null;
  let initialK: number | null = null;
  const positional: string[] = [];

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i] ?? "";
    if (arg === "--threshold") {
      similarityThreshold = readNumberFlag(arg, args[i + 1]);
      i += 1;
    } else if (arg === "--k") {
      initialK = readNumberFlag(arg, args[i + 1]);
      i += 1;
    } else {
      positional.push(arg);
    }
  }

  const [sessionId, ...words] = positional;
  const question = words.join(" ").trim();
  if (!sessionId || !question) {
    throw new InvalidArgumentError(ASK_USAGE);
  }
  return { sessionId, question, similarityThreshold, initialK };
}

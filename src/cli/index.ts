#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";

function loadEnv(): void {
  const explicitPath = process.env.DOTENV_CONFIG_PATH;
  if (explicitPath) {
    dotenv.config({ path: explicitPath });
    return;
  }

  const cwd = process.cwd();
  const candidates = [path.join(cwd, ".env"), path.join(cwd, "..", ".env")];

  for (const candidate of candidates) {
    if (fs.existsSync(candidate)) {
      dotenv.config({ path: candidate });
      return;
    }
  }

  dotenv.config();
}

loadEnv();

import { createApp } from "../app.js";
import { loadSettings } from "../config/settings.js";
import { silentLogger } from "../logger.js";
import { runAskCommand } from "./commands/ask.js";
import { runIngestCommand } from "./commands/ingest.js";
import { runDeleteCommand, runSessionsCommand, runShowCommand } from "./commands/sessions.js";
import { formatCliError } from "./format.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);
  const settings = loadSettings();
  const app = await createApp(settings, { log: settings.verbose ? console : silentLogger });

  switch (parsed.command) {
    case "ingest":
      await runIngestCommand(parsed.args, app);
      return;
    case "ask":
      await runAskCommand(parsed.args, app);
      return;
    case "sessions":
      await runSessionsCommand(app);
      return;
    case "show":
      await runShowCommand(parsed.args, app);
      return;
    case "delete":
      await runDeleteCommand(parsed.args, app);
      return;
  }
}

try {
  await main(process.argv);
} catch (err: unknown) {
  process.stderr.write(`${formatCliError(err)}\n`);
  process.exitCode = 1;
}

#!/usr/bin/env node
import fs from "fs";
import path from "path";
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
}

loadEnv();

import { loadSettings } from "../config/settings.js";
import { createFilingRag } from "../core.js";
import { runAskCommand } from "./commands/ask.js";
import { runRebuildCommand, runResetCommand, runStatsCommand } from "./commands/cache.js";
import { runIngestCommand } from "./commands/ingest.js";
import { parseCli } from "./parse.js";

export async function main(argv: string[]): Promise<void> {
  const parsed = parseCli(argv);
  const rag = await createFilingRag(loadSettings());

  switch (parsed.command) {
    case "ingest":
      await runIngestCommand(parsed.args, rag);
      return;
    case "ask":
      await runAskCommand(parsed.args, rag);
      return;
    case "stats":
      await runStatsCommand(rag);
      return;
    case "reset":
      await runResetCommand(rag);
      return;
    case "rebuild":
      await runRebuildCommand(rag);
      return;
  }
}

try {
  await main(process.argv);
} catch (err: unknown) {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(`${message}\n`);
  process.exitCode = 1;
}

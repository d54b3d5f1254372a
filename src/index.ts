#!/usr/bin/env node
import * as path from "path";
import * as dotenv from "dotenv";
import { parseArgs } from "./cli/parseArgs";
import { runHistoryCommand, runResolveCommand, runValidateCommand } from "./cli/commands";
import type { CommandResult } from "./cli/commands";
import { loadConfig } from "./config";

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv);

  if (parsed.command === "validate") {
    return runValidateCommand(parsed).code;
  }

  // Load .env without overriding variables already set in the environment.
  dotenv.config({ path: path.resolve(process.cwd(), ".env"), override: false });
  const config = loadConfig(process.env);

  let result: CommandResult;
  if (parsed.command === "history") {
    result = runHistoryCommand(parsed, config);
  } else {
    result = await runResolveCommand(parsed, config);
  }
  return result.code;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err) => {
    console.error("[relink] Fatal error:", err);
    process.exit(1);
  });

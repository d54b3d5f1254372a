import * as path from "path";
import type { ReportFormat } from "../contracts";

// --- CLI Arg Types ---

export interface ResolveArgs {
  command: "resolve";
  packPath: string;
  assetPaths: string[];
  apply: boolean;
  outDir: string | null;
  formats: ReportFormat[];
  history: boolean;
}

export interface ValidateArgs {
  command: "validate";
  packPath: string;
}

export interface HistoryArgs {
  command: "history";
  limit: number;
}

export type ParsedArgs = ResolveArgs | ValidateArgs | HistoryArgs;

// --- Constants ---

const VALID_FORMATS: ReportFormat[] = ["json", "csv", "html"];
const DEFAULT_HISTORY_LIMIT = 20;

// --- CLI Parsing ---

function printUsage(): void {
  console.error("Usage:");
  console.error(
    "  relink resolve <pack.json> --assets <assets.json> [--assets <file>] [--apply] [--out <dir>] [--format json|csv|html] [--no-history]"
  );
  console.error("  relink validate <pack.json>");
  console.error("  relink history [--limit <n>]");
}

function fail(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}

function requireValue(args: string[], i: number, flag: string): string {
  if (i + 1 >= args.length || args[i + 1].startsWith("--")) {
    fail(`${flag} requires a value`);
  }
  return args[i + 1];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);

  if (args.length === 0) {
    console.error("Error: No command or arguments provided.");
    printUsage();
    process.exit(1);
  }

  const firstArg = args[0];

  // resolve <pack> --assets <file> [...]
  if (firstArg === "resolve") {
    if (args.length < 2 || args[1].startsWith("--")) {
      console.error("Error: 'resolve' requires a mapping pack path.");
      printUsage();
      process.exit(1);
    }
    const packPath = path.resolve(args[1]);
    const assetPaths: string[] = [];
    const formats: ReportFormat[] = [];
    let apply = false;
    let outDir: string | null = null;
    let history = true;

    for (let i = 2; i < args.length; i++) {
      const arg = args[i];
      if (arg === "--assets") {
        assetPaths.push(path.resolve(requireValue(args, i++, "--assets")));
      } else if (arg === "--out") {
        outDir = path.resolve(requireValue(args, i++, "--out"));
      } else if (arg === "--format") {
        const val = requireValue(args, i++, "--format");
        const format = VALID_FORMATS.find((f) => f === val);
        if (format === undefined) {
          fail(`--format must be one of: ${VALID_FORMATS.join(", ")}`);
        }
        if (!formats.includes(format)) formats.push(format);
      } else if (arg === "--apply") {
        apply = true;
      } else if (arg === "--dry-run") {
        apply = false;
      } else if (arg === "--no-history") {
        history = false;
      } else {
        fail(`Unknown argument "${arg}"`);
      }
    }

    if (assetPaths.length === 0) {
      fail("'resolve' requires at least one --assets file.");
    }

    return { command: "resolve", packPath, assetPaths, apply, outDir, formats, history };
  }

  // validate <pack>
  if (firstArg === "validate") {
    if (args.length < 2 || args[1].startsWith("--")) {
      console.error("Error: 'validate' requires a mapping pack path.");
      console.error("Usage: relink validate <pack.json>");
      process.exit(1);
    }
    if (args.length > 2) {
      fail("'validate' does not accept additional arguments.");
    }
    return { command: "validate", packPath: path.resolve(args[1]) };
  }

  // history [--limit n]
  if (firstArg === "history") {
    let limit = DEFAULT_HISTORY_LIMIT;
    for (let i = 1; i < args.length; i++) {
      if (args[i] === "--limit") {
        const val = Number(requireValue(args, i++, "--limit"));
        if (!Number.isInteger(val) || val <= 0) {
          fail("--limit must be a positive integer");
        }
        limit = val;
      } else {
        fail(`Unknown argument "${args[i]}"`);
      }
    }
    return { command: "history", limit };
  }

  if (firstArg.startsWith("--")) {
    console.error(`Error: Unknown flag "${firstArg}"`);
  } else {
    console.error(`Error: Unknown command "${firstArg}"`);
  }
  printUsage();
  process.exit(1);
}

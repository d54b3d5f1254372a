import * as path from "path";
import { loadMappingPack, MappingPackError, validateMappingPack } from "../pipeline/mappingPack";
import type { MappingPack } from "../pipeline/mappingPack";
import { AssetListError, loadAssetList } from "../pipeline/assets";
import { runAcrossProjects, runRelink, RELINK_TITLE, RELINK_TOOL_ID } from "../pipeline/relink";
import type { RelinkRun } from "../pipeline/relink";
import { ManifestSink, writeManifest } from "../pipeline/manifest";
import { ReportBuilder } from "../report/report";
import { writeReport } from "../report/export";
import { openDatabase } from "../store/connection";
import { ensureSchema } from "../store/schema";
import { listRuns, saveRun } from "../store/queries";
import type { RelinkConfig } from "../config";
import type { AssetProject, Report, ReportFormat } from "../contracts";
import type { HistoryArgs, ResolveArgs, ValidateArgs } from "./parseArgs";

const LOG_PREFIX = "[relink]";

/** Outcome of a CLI command. Commands never call process.exit(). */
export interface CommandResult {
  code: number;
  report?: Report;
  written?: Partial<Record<ReportFormat, string>>;
  manifestPath?: string;
}

function printItems(report: Report): void {
  for (const item of report.items) {
    if (item.severity === "warning") console.error(`Warning: ${item.message}`);
    if (item.severity === "error") console.error(`Error: ${item.message}`);
  }
}

function exportReport(
  report: Report,
  outDir: string,
  formats: readonly ReportFormat[]
): Partial<Record<ReportFormat, string>> {
  const written = writeReport(report, outDir, formats);
  for (const file of Object.values(written)) {
    console.log(`${LOG_PREFIX} Wrote ${file}`);
  }
  return written;
}

/** A configuration error ends the run as a report with one fatal item. */
function fatalReport(message: string, data: Record<string, unknown> = {}): Report {
  return new ReportBuilder(RELINK_TOOL_ID, RELINK_TITLE)
    .error("config", message, { data })
    .setSummary({ assets_scanned: 0 })
    .finish();
}

// --- resolve ---

export async function runResolveCommand(
  args: ResolveArgs,
  config: RelinkConfig
): Promise<CommandResult> {
  const outDir = args.outDir ?? config.reportsDir;
  const formats = args.formats.length > 0 ? args.formats : config.reportFormats;

  let pack: MappingPack;
  let projects: AssetProject[];
  try {
    pack = loadMappingPack(args.packPath);
    projects = args.assetPaths.map((p) => loadAssetList(p));
  } catch (err) {
    if (err instanceof MappingPackError || err instanceof AssetListError) {
      const details = err instanceof MappingPackError
        ? err.issues.map((i) => `${i.path}: ${i.message}`)
        : err.errors;
      const report = fatalReport(err.message, { details });
      printItems(report);
      const written = exportReport(report, outDir, formats);
      return { code: 1, report, written };
    }
    throw err;
  }

  const dryRun = !args.apply;
  const sink = dryRun ? undefined : new ManifestSink();
  console.log(
    `${LOG_PREFIX} ${dryRun ? "Dry run" : "Applying"}: ${projects.length} asset list(s), ${pack.rules.length} rule(s), ${pack.rootFolders.length} root folder(s)`
  );

  let report: Report;
  let runs: RelinkRun[];
  if (projects.length === 1) {
    const run = await runRelink({
      pack,
      assets: projects[0].assets,
      project: projects[0].project,
      dryRun,
      sink,
    });
    report = run.report;
    runs = [run];
  } else {
    const multi = await runAcrossProjects(pack, projects, { dryRun, sink });
    report = multi.report;
    runs = multi.runs;
  }

  printItems(report);
  const written = exportReport(report, outDir, formats);

  let manifestPath: string | undefined;
  if (sink !== undefined) {
    manifestPath = path.join(outDir, "relink-manifest.json");
    writeManifest(sink.toManifest(runs.map((r) => r.transaction.id)), manifestPath);
    console.log(`${LOG_PREFIX} Wrote ${manifestPath} (${sink.size} relink(s))`);
  }

  if (args.history && config.historyEnabled) {
    const db = openDatabase(config.dbPath);
    try {
      ensureSchema(db);
      for (const run of runs) {
        saveRun(db, { transaction: run.transaction, report: run.report, packPath: args.packPath });
      }
      console.log(`${LOG_PREFIX} Recorded ${runs.length} run(s) in ${config.dbPath}`);
    } finally {
      db.close();
    }
  }

  const errorCount = report.items.filter((i) => i.severity === "error").length;
  console.log(`${LOG_PREFIX} Summary: ${JSON.stringify(report.summary)}`);
  return { code: errorCount > 0 ? 1 : 0, report, written, manifestPath };
}

// --- validate ---

export function runValidateCommand(args: ValidateArgs): CommandResult {
  const result = validateMappingPack(args.packPath);

  for (const w of result.warnings) {
    console.error(`Warning: ${w}`);
  }
  for (const e of result.errors) {
    console.error(`Error: ${e}`);
  }

  if (result.valid) {
    console.log(`Validation passed: ${args.packPath}`);
    return { code: 0 };
  }
  console.error(`Validation failed: ${args.packPath}`);
  return { code: 1 };
}

// --- history ---

export function runHistoryCommand(args: HistoryArgs, config: RelinkConfig): CommandResult {
  const db = openDatabase(config.dbPath);
  try {
    ensureSchema(db);
    const runs = listRuns(db, { limit: args.limit });
    if (runs.length === 0) {
      console.log("No runs recorded.");
    }
    for (const run of runs) {
      const mode = run.dry_run === 1 ? "dry-run" : "applied";
      console.log(
        `${run.started_at}  ${run.id}  ${mode}  items=${run.item_count}  ${run.summary}`
      );
    }
  } finally {
    db.close();
  }
  return { code: 0 };
}

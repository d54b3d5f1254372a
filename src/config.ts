import * as path from "path";
import { REPORT_FORMATS } from "./report/export";
import type { ReportFormat } from "./contracts";

export interface RelinkConfig {
  /** Path to the SQLite run history database */
  dbPath: string;
  /** Directory that receives exported reports */
  reportsDir: string;
  /** Formats written at the end of a run (default: json, csv, html) */
  reportFormats: ReportFormat[];
  /** Whether closed runs are written to the history database */
  historyEnabled: boolean;
}

export function parseReportFormats(raw: string): ReportFormat[] {
  const formats: ReportFormat[] = [];
  for (const part of raw.split(",")) {
    const value = part.trim().toLowerCase();
    if (value.length === 0) continue;
    const format = REPORT_FORMATS.find((f) => f === value);
    if (format === undefined) {
      throw new Error(
        `Invalid report format "${value}". Must be one of: ${REPORT_FORMATS.join(", ")}`
      );
    }
    if (!formats.includes(format)) formats.push(format);
  }
  return formats;
}

function parseBoolean(raw: string, name: string): boolean {
  const value = raw.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(value)) return true;
  if (["0", "false", "no", "off"].includes(value)) return false;
  throw new Error(`Invalid ${name}: "${raw}". Use true or false.`);
}

/**
 * Build the configuration from environment variables. Nothing is cached:
 * callers pass the returned value to whatever needs it.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  baseDir: string = process.cwd()
): RelinkConfig {
  const dbPath = env.RELINK_DB_PATH
    ? path.resolve(baseDir, env.RELINK_DB_PATH)
    : path.resolve(baseDir, "relink.db");

  const reportsDir = env.RELINK_REPORTS_DIR
    ? path.resolve(baseDir, env.RELINK_REPORTS_DIR)
    : path.resolve(baseDir, "reports");

  const reportFormats = parseReportFormats(
    env.RELINK_REPORT_FORMATS ?? REPORT_FORMATS.join(",")
  );
  if (reportFormats.length === 0) {
    throw new Error("RELINK_REPORT_FORMATS must name at least one format.");
  }

  const historyEnabled = parseBoolean(env.RELINK_HISTORY ?? "true", "RELINK_HISTORY");

  return { dbPath, reportsDir, reportFormats, historyEnabled };
}

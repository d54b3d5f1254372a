import * as fs from "fs";
import * as path from "path";
import * as crypto from "crypto";
import { freezeReport } from "./report";
import { assertInsideDir, assertSafeFileName } from "../lib/pathSafety";
import type { Report, ReportFormat, ReportItem, Severity } from "../contracts";

export const REPORT_FORMATS: readonly ReportFormat[] = ["json", "csv", "html"];

const CSV_COLUMNS = [
  "category",
  "severity",
  "message",
  "timeline",
  "clip",
  "timecode",
  "data",
] as const;

const SEVERITIES: readonly Severity[] = ["info", "warning", "error"];

export class ReportFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ReportFormatError";
  }
}

// --- Structured (JSON) ---

interface ReportRecord {
  tool_id: string;
  title: string;
  created_at: string;
  summary: Record<string, unknown>;
  items: ReportItem[];
}

export function toRecord(report: Report): ReportRecord {
  return {
    tool_id: report.toolId,
    title: report.title,
    created_at: report.createdAt,
    summary: { ...report.summary },
    items: report.items.map((item) => ({
      category: item.category,
      severity: item.severity,
      message: item.message,
      timeline: item.timeline,
      clip: item.clip,
      timecode: item.timecode,
      data: item.data,
    })),
  };
}

export function toJson(report: Report): string {
  return JSON.stringify(toRecord(report), null, 2);
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function nullableString(value: unknown, label: string): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value !== "string") {
    throw new ReportFormatError(`${label} must be a string or null.`);
  }
  return value;
}

function requiredString(value: unknown, label: string): string {
  if (typeof value !== "string") {
    throw new ReportFormatError(`${label} must be a string.`);
  }
  return value;
}

function parseItem(raw: unknown, label: string): ReportItem {
  if (!isPlainObject(raw)) {
    throw new ReportFormatError(`${label} must be an object.`);
  }
  const severity = SEVERITIES.find((s) => s === raw.severity);
  if (severity === undefined) {
    throw new ReportFormatError(`${label}.severity must be one of: ${SEVERITIES.join(", ")}`);
  }
  const data = raw.data ?? {};
  if (!isPlainObject(data)) {
    throw new ReportFormatError(`${label}.data must be an object.`);
  }
  return {
    category: requiredString(raw.category, `${label}.category`),
    severity,
    message: requiredString(raw.message, `${label}.message`),
    timeline: nullableString(raw.timeline, `${label}.timeline`),
    clip: nullableString(raw.clip, `${label}.clip`),
    timecode: nullableString(raw.timecode, `${label}.timecode`),
    data,
  };
}

/** Reload a report written by toJson(). */
export function parseReportJson(text: string): Report {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new ReportFormatError("Report contains invalid JSON.");
  }
  if (!isPlainObject(parsed)) {
    throw new ReportFormatError("Report must be a JSON object.");
  }
  if (!Array.isArray(parsed.items)) {
    throw new ReportFormatError("Report 'items' must be an array.");
  }
  const summary = parsed.summary ?? {};
  if (!isPlainObject(summary)) {
    throw new ReportFormatError("Report 'summary' must be an object.");
  }

  return freezeReport({
    toolId: requiredString(parsed.tool_id, "tool_id"),
    title: requiredString(parsed.title, "title"),
    createdAt: requiredString(parsed.created_at, "created_at"),
    items: parsed.items.map((raw, i) => parseItem(raw, `items[${i}]`)),
    summary,
  });
}

// --- Tabular (CSV) ---

function csvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/** One row per item, CRLF line endings, data column as JSON. */
export function toCsv(report: Report): string {
  const lines = [CSV_COLUMNS.join(",")];
  for (const item of report.items) {
    const row = CSV_COLUMNS.map((column) => {
      if (column === "data") return csvField(JSON.stringify(item.data));
      return csvField(item[column] ?? "");
    });
    lines.push(row.join(","));
  }
  return lines.join("\r\n") + "\r\n";
}

// --- Rendered (HTML) ---

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

function formatSummaryValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

export function toHtml(report: Report): string {
  const title = escapeHtml(report.title);
  const lines = [
    "<!DOCTYPE html>",
    "<html><head><meta charset=\"utf-8\">",
    `<title>${title}</title>`,
    "</head><body>",
    `<h1>${title}</h1>`,
    `<p>Generated: ${escapeHtml(report.createdAt)}</p>`,
  ];

  const summaryEntries = Object.entries(report.summary);
  if (summaryEntries.length > 0) {
    lines.push("<h2>Summary</h2>", "<table border=\"1\" cellspacing=\"0\" cellpadding=\"4\">");
    for (const [key, value] of summaryEntries) {
      lines.push(
        `<tr><th>${escapeHtml(key)}</th><td>${escapeHtml(formatSummaryValue(value))}</td></tr>`
      );
    }
    lines.push("</table>");
  }

  lines.push(
    "<h2>Items</h2>",
    "<table border=\"1\" cellspacing=\"0\" cellpadding=\"4\">",
    "<tr><th>Severity</th><th>Category</th><th>Message</th><th>Timeline</th><th>Clip</th><th>Timecode</th></tr>"
  );
  for (const item of report.items) {
    lines.push(
      `<tr class="${item.severity}">` +
        `<td>${item.severity}</td>` +
        `<td>${escapeHtml(item.category)}</td>` +
        `<td>${escapeHtml(item.message)}</td>` +
        `<td>${escapeHtml(item.timeline ?? "")}</td>` +
        `<td>${escapeHtml(item.clip ?? "")}</td>` +
        `<td>${escapeHtml(item.timecode ?? "")}</td>` +
        "</tr>"
    );
  }
  lines.push("</table>", "</body></html>");
  return lines.join("\n");
}

// --- Writing ---

const RENDERERS: Record<ReportFormat, (report: Report) => string> = {
  json: toJson,
  csv: toCsv,
  html: toHtml,
};

export function renderReport(report: Report, format: ReportFormat): string {
  return RENDERERS[format](report);
}

/** "2026-03-04T05:06:07.089Z" -> "20260304_050607_089" */
export function reportStamp(createdAt: string): string {
  const digits = createdAt.replace(/\D/g, "");
  if (digits.length < 14) {
    throw new ReportFormatError(`Cannot derive a file stamp from "${createdAt}".`);
  }
  const millis = digits.slice(14, 17).padEnd(3, "0");
  return `${digits.slice(0, 8)}_${digits.slice(8, 14)}_${millis}`;
}

/** Write through a temp file in the same directory, then rename over the target. */
export function atomicWrite(filePath: string, data: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });
  const tmpPath = path.join(
    dir,
    `.${path.basename(filePath)}.${crypto.randomBytes(4).toString("hex")}.tmp`
  );
  try {
    fs.writeFileSync(tmpPath, data, "utf-8");
    fs.renameSync(tmpPath, filePath);
  } finally {
    if (fs.existsSync(tmpPath)) {
      fs.rmSync(tmpPath, { force: true });
    }
  }
}

/**
 * Write the report in each requested format as <toolId>_<stamp>.<ext>
 * inside `outputDir`. When any of those files already exists the base name
 * gets a _2, _3, ... suffix, so an earlier report is never replaced.
 * Returns format -> written path.
 */
export function writeReport(
  report: Report,
  outputDir: string,
  formats: readonly ReportFormat[] = REPORT_FORMATS
): Partial<Record<ReportFormat, string>> {
  const stem = `${report.toolId}_${reportStamp(report.createdAt)}`;
  assertSafeFileName(stem, "Report file name");

  const taken = (base: string): boolean =>
    formats.some((format) => fs.existsSync(path.join(outputDir, `${base}.${format}`)));

  let baseName = stem;
  for (let n = 2; taken(baseName); n++) {
    baseName = `${stem}_${n}`;
  }

  const written: Partial<Record<ReportFormat, string>> = {};
  for (const format of formats) {
    const outputPath = path.join(outputDir, `${baseName}.${format}`);
    assertInsideDir(outputPath, outputDir, "Report output path");
    atomicWrite(outputPath, renderReport(report, format));
    written[format] = outputPath;
  }
  return written;
}

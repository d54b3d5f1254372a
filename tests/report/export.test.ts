import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { ReportBuilder } from "../../src/report/report";
import {
  ReportFormatError,
  escapeHtml,
  parseReportJson,
  renderReport,
  reportStamp,
  toCsv,
  toHtml,
  toJson,
  toRecord,
  writeReport,
} from "../../src/report/export";
import { PathEscapeError } from "../../src/lib/pathSafety";
import { createTempDir, cleanupDir } from "../fixtures";

const CREATED_AT = "2026-03-04T05:06:07.000Z";

function sampleReport(toolId = "relink") {
  return new ReportBuilder(toolId, "Asset Relink", CREATED_AT)
    .warning("match", 'No target, "b"', { timeline: "Edit 1", clip: "b.mov", data: { score: 0.5 } })
    .info("swap", "ok")
    .setSummary({ matched: 3, mode: "dry" })
    .finish();
}

describe("JSON export", () => {
  it("uses snake_case top-level keys", () => {
    const record = toRecord(sampleReport());
    expect(Object.keys(record)).toEqual(["tool_id", "title", "created_at", "summary", "items"]);
    expect(record.tool_id).toBe("relink");
    expect(record.created_at).toBe(CREATED_AT);
  });

  it("reloads what it wrote", () => {
    const report = sampleReport();
    expect(parseReportJson(toJson(report))).toEqual(report);
  });

  it("rejects malformed report documents", () => {
    expect(() => parseReportJson("{")).toThrow("Report contains invalid JSON.");
    expect(() => parseReportJson("[]")).toThrow("Report must be a JSON object.");
    expect(() => parseReportJson('{"items": {}}')).toThrow("Report 'items' must be an array.");
    expect(() =>
      parseReportJson(
        '{"tool_id":"t","title":"T","created_at":"c","items":[{"category":"c","severity":"fatal","message":"m"}]}'
      )
    ).toThrow(new ReportFormatError("items[0].severity must be one of: info, warning, error"));
  });
});

describe("CSV export", () => {
  it("writes one quoted row per item with CRLF endings", () => {
    expect(toCsv(sampleReport())).toBe(
      "category,severity,message,timeline,clip,timecode,data\r\n" +
        'match,warning,"No target, ""b""",Edit 1,b.mov,,"{""score"":0.5}"\r\n' +
        "swap,info,ok,,,,{}\r\n"
    );
  });

  it("writes only the header for an empty report", () => {
    const empty = new ReportBuilder("t", "T", CREATED_AT).finish();
    expect(toCsv(empty)).toBe("category,severity,message,timeline,clip,timecode,data\r\n");
  });
});

describe("HTML export", () => {
  it("escapes markup-significant characters", () => {
    expect(escapeHtml(`<b>&"x"'`)).toBe("&lt;b&gt;&amp;&quot;x&quot;&#39;");
  });

  it("renders the summary and one row per item", () => {
    const report = new ReportBuilder("relink", "Relink <Test>", CREATED_AT)
      .error("swap", "<script>", { clip: "a&b", timecode: "01:00:00:00" })
      .setSummary({ matched: 3, mode: "dry" })
      .finish();

    const lines = toHtml(report).split("\n");

    expect(lines).toContain("<title>Relink &lt;Test&gt;</title>");
    expect(lines).toContain("<tr><th>matched</th><td>3</td></tr>");
    expect(lines).toContain("<tr><th>mode</th><td>dry</td></tr>");
    expect(lines).toContain(
      '<tr class="error"><td>error</td><td>swap</td><td>&lt;script&gt;</td><td></td><td>a&amp;b</td><td>01:00:00:00</td></tr>'
    );
  });

  it("omits the summary table when there is no summary", () => {
    const report = new ReportBuilder("t", "T", CREATED_AT).finish();
    expect(toHtml(report)).not.toContain("<h2>Summary</h2>");
  });

  it("dispatches through renderReport", () => {
    const report = sampleReport();
    expect(renderReport(report, "csv")).toBe(toCsv(report));
    expect(renderReport(report, "html")).toBe(toHtml(report));
    expect(renderReport(report, "json")).toBe(toJson(report));
  });
});

describe("writeReport", () => {
  let tmpDir: string;

  afterEach(() => {
    if (tmpDir) cleanupDir(tmpDir);
  });

  it("derives file stamps from the creation time", () => {
    expect(reportStamp(CREATED_AT)).toBe("20260304_050607_000");
    expect(reportStamp("2026-03-04T05:06:07.089Z")).toBe("20260304_050607_089");
    expect(reportStamp("2026-03-04T05:06:07Z")).toBe("20260304_050607_000");
    expect(() => reportStamp("yesterday")).toThrow(ReportFormatError);
  });

  it("writes each requested format and leaves no temp files", () => {
    tmpDir = createTempDir();
    const outDir = path.join(tmpDir, "reports");
    const report = sampleReport();

    const written = writeReport(report, outDir);

    expect(written).toEqual({
      json: path.join(outDir, "relink_20260304_050607_000.json"),
      csv: path.join(outDir, "relink_20260304_050607_000.csv"),
      html: path.join(outDir, "relink_20260304_050607_000.html"),
    });
    expect(fs.readdirSync(outDir).sort()).toEqual([
      "relink_20260304_050607_000.csv",
      "relink_20260304_050607_000.html",
      "relink_20260304_050607_000.json",
    ]);
    expect(fs.readFileSync(path.join(outDir, "relink_20260304_050607_000.csv"), "utf-8")).toBe(
      toCsv(report)
    );
  });

  it("writes only the formats asked for", () => {
    tmpDir = createTempDir();
    const written = writeReport(sampleReport(), tmpDir, ["csv"]);
    expect(Object.keys(written)).toEqual(["csv"]);
    expect(fs.readdirSync(tmpDir)).toEqual(["relink_20260304_050607_000.csv"]);
  });

  it("never overwrites a report written at the same instant", () => {
    tmpDir = createTempDir();
    const first = sampleReport();
    const second = new ReportBuilder("relink", "Asset Relink", CREATED_AT).info("swap", "later").finish();

    writeReport(first, tmpDir, ["csv", "json"]);
    const written = writeReport(second, tmpDir, ["csv", "json"]);
    const third = writeReport(second, tmpDir, ["csv"]);

    expect(written).toEqual({
      csv: path.join(tmpDir, "relink_20260304_050607_000_2.csv"),
      json: path.join(tmpDir, "relink_20260304_050607_000_2.json"),
    });
    expect(third.csv).toBe(path.join(tmpDir, "relink_20260304_050607_000_3.csv"));
    expect(fs.readFileSync(path.join(tmpDir, "relink_20260304_050607_000.csv"), "utf-8")).toBe(
      toCsv(first)
    );
  });

  it("refuses tool ids that would leave the output directory", () => {
    tmpDir = createTempDir();
    expect(() => writeReport(sampleReport("../escape"), tmpDir)).toThrow(PathEscapeError);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});

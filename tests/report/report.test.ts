import { describe, it, expect } from "vitest";
import {
  ReportBuilder,
  createItem,
  itemError,
  itemInfo,
  itemWarning,
  mergeReports,
} from "../../src/report/report";

describe("report items", () => {
  it("fills unset tags with null and data with an empty object", () => {
    expect(createItem("info", "swap", "done")).toEqual({
      category: "swap",
      severity: "info",
      message: "done",
      timeline: null,
      clip: null,
      timecode: null,
      data: {},
    });
  });

  it("has one helper per severity", () => {
    expect(itemInfo("c", "m").severity).toBe("info");
    expect(itemWarning("c", "m").severity).toBe("warning");
    expect(itemError("c", "m", { clip: "A001", data: { n: 1 } })).toMatchObject({
      severity: "error",
      clip: "A001",
      data: { n: 1 },
    });
  });
});

describe("ReportBuilder", () => {
  it("keeps items in insertion order and counts by severity", () => {
    const builder = new ReportBuilder("relink", "Asset Relink", "2026-03-04T05:06:07.000Z")
      .info("swap", "one")
      .warning("match", "two")
      .error("swap", "three")
      .warning("index", "four");

    expect(builder.size).toBe(4);
    expect(builder.count("warning")).toBe(2);
    expect(builder.count("error")).toBe(1);

    const report = builder.setSummary({ matched: 1 }).finish();
    expect(report.toolId).toBe("relink");
    expect(report.createdAt).toBe("2026-03-04T05:06:07.000Z");
    expect(report.items.map((i) => i.message)).toEqual(["one", "two", "three", "four"]);
    expect(report.summary).toEqual({ matched: 1 });
  });

  it("returns a frozen report", () => {
    const report = new ReportBuilder("t", "T").info("c", "m").finish();
    expect(Object.isFrozen(report)).toBe(true);
    expect(Object.isFrozen(report.items)).toBe(true);
    expect(Object.isFrozen(report.items[0])).toBe(true);
    expect(Object.isFrozen(report.summary)).toBe(true);
  });

  it("rejects changes after finish", () => {
    const builder = new ReportBuilder("relink", "T");
    builder.finish();
    expect(() => builder.info("c", "m")).toThrow('Report "relink" is already finished.');
    expect(() => builder.setSummary({})).toThrow('Report "relink" is already finished.');
    expect(() => builder.finish()).toThrow('Report "relink" is already finished.');
  });

  it("copies the summary it is given", () => {
    const summary: Record<string, unknown> = { n: 1 };
    const builder = new ReportBuilder("t", "T").setSummary(summary);
    summary.n = 2;
    expect(builder.finish().summary).toEqual({ n: 1 });
  });
});

describe("mergeReports", () => {
  it("concatenates items in report order", () => {
    const a = new ReportBuilder("a", "A").info("c", "a1").finish();
    const b = new ReportBuilder("b", "B").warning("c", "b1").error("c", "b2").finish();

    const merged = mergeReports([a, b], "All projects");

    expect(merged.toolId).toBe("aggregate");
    expect(merged.title).toBe("All projects");
    expect(merged.items.map((i) => i.message)).toEqual(["a1", "b1", "b2"]);
    expect(merged.summary).toEqual({ reports: 2 });
  });
});

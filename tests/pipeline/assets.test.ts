import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { AssetListError, loadAssetList, parseAssetList } from "../../src/pipeline/assets";
import { createTempDir, writeJson, cleanupDir } from "../fixtures";

function errorsOf(document: unknown): string[] {
  try {
    parseAssetList(document, "fallback");
  } catch (err) {
    if (err instanceof AssetListError) return err.errors;
    throw err;
  }
  throw new Error("expected parseAssetList to throw");
}

describe("parseAssetList", () => {
  it("accepts a bare array, with strings as shorthand", () => {
    expect(parseAssetList(["a.mov", { name: "b.mov", optional: true }], "reel")).toEqual({
      project: "reel",
      assets: [{ name: "a.mov" }, { name: "b.mov", optional: true }],
    });
  });

  it("accepts a named project with full descriptors", () => {
    const list = parseAssetList(
      {
        project: "Episode 3",
        assets: [
          {
            name: "A001.mov",
            resolution: "3840x2160",
            transforms: ["Zoom"],
            clip: "A001",
            timeline: "Main",
            timecode: "00:01:00:00",
            optional: false,
          },
        ],
      },
      "fallback"
    );

    expect(list).toEqual({
      project: "Episode 3",
      assets: [
        {
          name: "A001.mov",
          resolution: "3840x2160",
          transforms: ["Zoom"],
          clip: "A001",
          timeline: "Main",
          timecode: "00:01:00:00",
        },
      ],
    });
  });

  it("keeps an empty name for the run to report", () => {
    expect(parseAssetList([{ name: "" }], "p").assets).toEqual([{ name: "" }]);
  });

  it("collects every entry problem", () => {
    expect(
      errorsOf([
        42,
        { resolution: "wide" },
        { name: "x", transforms: "Zoom", optional: "yes" },
      ])
    ).toEqual([
      "assets[0] must be a string or an object.",
      "assets[1].name is required and must be a string.",
      'assets[1].resolution must look like "1920x1080".',
      "assets[2].transforms must be an array of strings.",
      "assets[2].optional must be a boolean.",
    ]);
  });

  it("rejects documents without an assets array", () => {
    expect(errorsOf({ project: "p" })).toEqual(["'assets' must be an array."]);
    expect(errorsOf({ project: "", assets: [] })).toEqual(["'project' must be a non-empty string."]);
    expect(errorsOf("a.mov")).toEqual([
      "Asset list must be an array or an object with an 'assets' array.",
    ]);
  });

  it("leads the thrown message with the first problem", () => {
    expect(() => parseAssetList({ assets: [7] }, "p")).toThrow(
      "Invalid asset list: assets[0] must be a string or an object."
    );
  });
});

describe("loadAssetList", () => {
  let tmpDir: string;

  afterEach(() => {
    if (tmpDir) cleanupDir(tmpDir);
  });

  it("names a bare list after its file", () => {
    tmpDir = createTempDir();
    const file = writeJson(tmpDir, "trailer_cut.json", ["a.mov"]);

    expect(loadAssetList(file)).toEqual({ project: "trailer_cut", assets: [{ name: "a.mov" }] });
  });

  it("reports unreadable and malformed files", () => {
    tmpDir = createTempDir();
    const missing = path.join(tmpDir, "none.json");
    expect(() => loadAssetList(missing)).toThrow(`Asset list not found or unreadable: ${missing}`);

    const broken = path.join(tmpDir, "broken.json");
    fs.writeFileSync(broken, "[");
    expect(() => loadAssetList(broken)).toThrow(`Asset list contains invalid JSON: ${broken}`);
  });
});

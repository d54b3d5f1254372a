import { describe, it, expect, afterEach } from "vitest";
import * as fs from "fs";
import * as path from "path";
import { buildIndex } from "../../src/pipeline/nameIndex";
import { createMediaTree, cleanupDir } from "../fixtures";

describe("buildIndex", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs) cleanupDir(dir);
    dirs.length = 0;
  });

  it("maps normalized file names to absolute paths, recursively", () => {
    const root = createMediaTree(["a/Clip_Final.mov", "b/deep/notes.txt", "top.wav"]);
    dirs.push(root);

    const index = buildIndex([root]);

    expect(index.entries.size).toBe(3);
    expect(index.entries.get("clipfinalmov")).toBe(path.join(root, "a", "Clip_Final.mov"));
    expect(index.entries.get("notestxt")).toBe(path.join(root, "b", "deep", "notes.txt"));
    expect(index.entries.get("topwav")).toBe(path.join(root, "top.wav"));
    expect(index.collisions).toEqual([]);
  });

  it("skips roots that do not exist or are not directories", () => {
    const root = createMediaTree(["one.mov"]);
    dirs.push(root);
    const filePath = path.join(root, "one.mov");

    const index = buildIndex(["/nonexistent/relink/root", filePath, root]);

    expect([...index.entries.keys()]).toEqual(["onemov"]);
  });

  it("returns an empty index for no roots", () => {
    const index = buildIndex([]);
    expect(index.entries.size).toBe(0);
    expect(index.collisions).toEqual([]);
  });

  it("indexes files before descending, so a nested duplicate wins and is recorded", () => {
    const root = createMediaTree(["take_1.mov", "sub/Take-1.MOV"]);
    dirs.push(root);

    const index = buildIndex([root]);

    const top = path.join(root, "take_1.mov");
    const nested = path.join(root, "sub", "Take-1.MOV");
    expect(index.entries.get("take1mov")).toBe(nested);
    expect(index.collisions).toEqual([{ key: "take1mov", replaced: top, path: nested }]);
  });

  it("lets a later root overwrite an earlier one", () => {
    const first = createMediaTree(["shot.mov"]);
    const second = createMediaTree(["SHOT.mov"]);
    dirs.push(first, second);

    const index = buildIndex([first, second]);

    expect(index.entries.get("shotmov")).toBe(path.join(second, "SHOT.mov"));
    expect(index.collisions).toHaveLength(1);
  });

  it("ignores directories whose names look like files", () => {
    const root = createMediaTree(["real.mov"]);
    dirs.push(root);
    fs.mkdirSync(path.join(root, "folder.mov"));

    const index = buildIndex([root]);

    expect(index.entries.has("foldermov")).toBe(false);
    expect(index.entries.get("realmov")).toBe(path.join(root, "real.mov"));
  });
});

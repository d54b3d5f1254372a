import * as fs from "fs";
import * as path from "path";
import * as os from "os";

/**
 * Create an empty temporary directory. Caller is responsible for cleanup.
 */
export function createTempDir(prefix = "relink-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Create a temporary media tree containing the given relative file paths.
 * Files get placeholder content; only names matter to the resolver.
 * Returns the root directory.
 */
export function createMediaTree(files: string[]): string {
  const root = createTempDir("relink-media-");
  for (const file of files) {
    const fullPath = path.join(root, file);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, "placeholder");
  }
  return root;
}

/**
 * Write `data` as pretty JSON to dir/name. Returns the file path.
 */
export function writeJson(dir: string, name: string, data: unknown): string {
  const filePath = path.join(dir, name);
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
  return filePath;
}

/**
 * Remove a test directory and all contents.
 */
export function cleanupDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

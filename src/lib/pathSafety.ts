import * as path from "path";

export class PathEscapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PathEscapeError";
  }
}

// Reserved on at least one filesystem reports may land on
const UNSAFE_NAME_CHARS = /[\u0000-\u001f<>:"|?*]/;

/**
 * Throw unless `filePath` lies strictly inside `dir` once both are
 * resolved. The directory itself does not count as inside.
 */
export function assertInsideDir(filePath: string, dir: string, label: string): void {
  const relative = path.relative(path.resolve(dir), path.resolve(filePath));
  if (
    relative === "" ||
    relative === ".." ||
    relative.startsWith(`..${path.sep}`) ||
    path.isAbsolute(relative)
  ) {
    throw new PathEscapeError(
      `${label} must stay inside ${path.resolve(dir)}: ${path.resolve(filePath)}`
    );
  }
}

/**
 * Check a report base name built from a tool id: a single path segment,
 * not hidden, with no characters a filesystem would reject.
 */
export function assertSafeFileName(name: string, label: string): void {
  if (name.length === 0) {
    throw new PathEscapeError(`${label} is empty.`);
  }
  if (path.basename(name) !== name || name.includes("/") || name.includes("\\")) {
    throw new PathEscapeError(`${label} must not contain directory parts: "${name}"`);
  }
  if (name.startsWith(".")) {
    throw new PathEscapeError(`${label} must not start with a dot: "${name}"`);
  }
  if (UNSAFE_NAME_CHARS.test(name)) {
    throw new PathEscapeError(`${label} contains a reserved character: "${name}"`);
  }
}

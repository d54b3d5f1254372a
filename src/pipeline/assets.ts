import * as fs from "fs";
import * as path from "path";
import type { AssetDescriptor, AssetProject } from "../contracts";

export type { AssetDescriptor, AssetProject };

export class AssetListError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(message);
    this.name = "AssetListError";
    this.errors = errors;
  }
}

function optionalString(
  obj: Record<string, unknown>,
  key: string,
  label: string,
  errors: string[]
): string | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    errors.push(`${label}.${key} must be a string.`);
    return undefined;
  }
  return value;
}

/**
 * Parse one asset entry. A bare string is shorthand for { name }.
 *
 * Malformed entry policy:
 * - Not a string or object -> error
 * - Missing name -> error (an empty string is kept; the run reports it)
 * - Wrong type on an optional field -> error
 * - resolution not "<w>x<h>" -> error
 */
function parseAsset(raw: unknown, label: string, errors: string[]): AssetDescriptor | null {
  if (typeof raw === "string") {
    return { name: raw };
  }
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    errors.push(`${label} must be a string or an object.`);
    return null;
  }

  const obj = raw as Record<string, unknown>;
  const before = errors.length;

  if (typeof obj.name !== "string") {
    errors.push(`${label}.name is required and must be a string.`);
  }

  const resolution = optionalString(obj, "resolution", label, errors);
  if (resolution !== undefined && !/^\s*\d+\s*x\s*\d+\s*$/i.test(resolution)) {
    errors.push(`${label}.resolution must look like "1920x1080".`);
  }

  let transforms: string[] | undefined;
  if (obj.transforms !== undefined && obj.transforms !== null) {
    if (
      !Array.isArray(obj.transforms) ||
      !obj.transforms.every((t): t is string => typeof t === "string")
    ) {
      errors.push(`${label}.transforms must be an array of strings.`);
    } else {
      transforms = obj.transforms;
    }
  }

  const clip = optionalString(obj, "clip", label, errors);
  const timeline = optionalString(obj, "timeline", label, errors);
  const timecode = optionalString(obj, "timecode", label, errors);

  if (obj.optional !== undefined && typeof obj.optional !== "boolean") {
    errors.push(`${label}.optional must be a boolean.`);
  }

  if (errors.length > before || typeof obj.name !== "string") {
    return null;
  }

  const asset: AssetDescriptor = { name: obj.name };
  if (resolution !== undefined) asset.resolution = resolution;
  if (transforms !== undefined) asset.transforms = transforms;
  if (clip !== undefined) asset.clip = clip;
  if (timeline !== undefined) asset.timeline = timeline;
  if (timecode !== undefined) asset.timecode = timecode;
  if (obj.optional === true) asset.optional = true;
  return asset;
}

/**
 * Parse an asset list document. Accepts either a bare array of assets or
 * { project, assets }. `fallbackProject` names a bare array.
 */
export function parseAssetList(document: unknown, fallbackProject: string): AssetProject {
  const errors: string[] = [];
  let project = fallbackProject;
  let rawAssets: unknown;

  if (Array.isArray(document)) {
    rawAssets = document;
  } else if (typeof document === "object" && document !== null) {
    const obj = document as Record<string, unknown>;
    if (obj.project !== undefined) {
      if (typeof obj.project === "string" && obj.project.length > 0) {
        project = obj.project;
      } else {
        errors.push("'project' must be a non-empty string.");
      }
    }
    rawAssets = obj.assets;
    if (!Array.isArray(rawAssets)) {
      errors.push("'assets' must be an array.");
    }
  } else {
    errors.push("Asset list must be an array or an object with an 'assets' array.");
  }

  const assets: AssetDescriptor[] = [];
  if (Array.isArray(rawAssets)) {
    rawAssets.forEach((raw, i) => {
      const asset = parseAsset(raw, `assets[${i}]`, errors);
      if (asset !== null) assets.push(asset);
    });
  }

  if (errors.length > 0) {
    throw new AssetListError(`Invalid asset list: ${errors[0]}`, errors);
  }

  return { project, assets };
}

/** Read and parse an asset list JSON file. The project defaults to the file name. */
export function loadAssetList(filePath: string): AssetProject {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch {
    throw new AssetListError(`Asset list not found or unreadable: ${filePath}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new AssetListError(`Asset list contains invalid JSON: ${filePath}`);
  }

  return parseAssetList(parsed, path.basename(filePath, path.extname(filePath)));
}

import * as fs from "fs";
import * as path from "path";
import Ajv from "ajv";
import type { ErrorObject } from "ajv";
import mappingPackSchema from "../schemas/mapping_pack.schema.json";
import { compileRulePattern, ruleLabel } from "./resolve";
import type { MappingPack, Rule, ValidationResult } from "../contracts";

export type { MappingPack, Rule };

// --- Constants ---

export const DEFAULT_SIMILARITY_THRESHOLD = 0.9;
export const DEFAULT_ASPECT_TOLERANCE = 0.05;

// --- Document Shape (as declared by the JSON schema) ---

interface RuleDocument {
  id?: string;
  source: string;
  strategy?: "" | "exact" | "regex" | "token" | "similarity";
  target: string;
  expected_resolution?: string;
  expected_aspect?: number;
  similarity_threshold?: number;
}

interface MappingPackDocument {
  name?: string;
  description?: string;
  rules: RuleDocument[];
  root_folders?: string[];
  similarity_threshold?: number;
  aspect_tolerance?: number;
}

// --- Errors ---

export interface MappingPackIssue {
  /** JSON pointer to the offending field, "(root)" for the document itself */
  path: string;
  message: string;
}

export class MappingPackError extends Error {
  readonly issues: MappingPackIssue[];

  constructor(message: string, issues: MappingPackIssue[] = []) {
    super(message);
    this.name = "MappingPackError";
    this.issues = issues;
  }
}

// --- Schema Validation ---

const ajv = new Ajv({ allErrors: true });
const validateDocument = ajv.compile<MappingPackDocument>(mappingPackSchema);

function toIssue(error: ErrorObject): MappingPackIssue {
  return {
    path: error.instancePath === "" ? "(root)" : error.instancePath,
    message: error.message ?? error.keyword,
  };
}

function formatIssues(issues: MappingPackIssue[]): string {
  return issues.map((i) => `${i.path}: ${i.message}`).join("; ");
}

function toRule(doc: RuleDocument, index: number): Rule {
  const base = {
    index,
    id: doc.id ?? null,
    source: doc.source,
    target: doc.target,
    expectedResolution: doc.expected_resolution ?? null,
    expectedAspect: doc.expected_aspect ?? null,
  };

  let rule: Rule;
  switch (doc.strategy) {
    case "regex":
      rule = { ...base, strategy: "regex" };
      break;
    case "token":
      rule = { ...base, strategy: "token" };
      break;
    case "similarity":
      rule = {
        ...base,
        strategy: "similarity",
        similarityThreshold: doc.similarity_threshold ?? null,
      };
      break;
    default:
      // Missing or empty strategy means exact
      rule = { ...base, strategy: "exact" };
  }
  return Object.freeze(rule);
}

/**
 * Validate an in-memory mapping pack document and build the immutable pack.
 * Throws MappingPackError listing every schema violation.
 */
export function parseMappingPack(document: unknown): MappingPack {
  if (!validateDocument(document)) {
    const issues = (validateDocument.errors ?? []).map(toIssue);
    throw new MappingPackError(
      `Mapping pack failed schema validation: ${formatIssues(issues)}`,
      issues
    );
  }

  const rules = document.rules.map((r, i) => toRule(r, i));

  return Object.freeze({
    rules: Object.freeze(rules),
    rootFolders: Object.freeze([...(document.root_folders ?? [])]),
    similarityThreshold:
      document.similarity_threshold ?? DEFAULT_SIMILARITY_THRESHOLD,
    aspectTolerance: document.aspect_tolerance ?? DEFAULT_ASPECT_TOLERANCE,
  });
}

function readDocument(packPath: string): unknown {
  let content: string;
  try {
    content = fs.readFileSync(packPath, "utf-8");
  } catch {
    throw new MappingPackError(`Mapping pack not found or unreadable: ${packPath}`);
  }

  try {
    return JSON.parse(content);
  } catch {
    throw new MappingPackError(`Mapping pack contains invalid JSON: ${packPath}`);
  }
}

/**
 * Load and validate a mapping pack from a JSON file.
 *
 * Relative root folders and relative rule targets resolve against the
 * pack's own directory, so a pack can ship next to the media it points at.
 */
export function loadMappingPack(packPath: string): MappingPack {
  const document = readDocument(packPath);
  const pack = parseMappingPack(document);
  const packDir = path.dirname(path.resolve(packPath));

  const rules = pack.rules.map((rule): Rule =>
    path.isAbsolute(rule.target)
      ? rule
      : Object.freeze({ ...rule, target: path.resolve(packDir, rule.target) })
  );

  return Object.freeze({
    ...pack,
    rules: Object.freeze(rules),
    rootFolders: Object.freeze(
      pack.rootFolders.map((root) => path.resolve(packDir, root))
    ),
  });
}

/**
 * Check a mapping pack without throwing. Uses the same primitives as
 * loadMappingPack(). Regex rules that do not compile and root folders that
 * do not exist are warnings: the run skips them.
 */
export function validateMappingPack(packPath: string): ValidationResult {
  let pack: MappingPack;
  try {
    pack = loadMappingPack(packPath);
  } catch (err) {
    if (err instanceof MappingPackError) {
      const errors =
        err.issues.length > 0
          ? err.issues.map((i) => `${i.path}: ${i.message}`)
          : [err.message];
      return { valid: false, errors, warnings: [] };
    }
    throw err;
  }

  const warnings: string[] = [];

  for (const rule of pack.rules) {
    if (rule.strategy !== "regex") continue;
    const compiled = compileRulePattern(rule.source);
    if (!compiled.ok) {
      warnings.push(
        `Rule ${ruleLabel(rule)} has an invalid regex and will be skipped: ${compiled.message}`
      );
    }
  }

  for (const root of pack.rootFolders) {
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      warnings.push(`Root folder not found: ${root}`);
    }
  }

  if (pack.rules.length === 0 && pack.rootFolders.length === 0) {
    warnings.push("Mapping pack has no rules and no root folders; nothing can resolve.");
  }

  return { valid: true, errors: [], warnings };
}

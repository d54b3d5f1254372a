/**
 * Shared contract types for the relink resolver.
 *
 * Pipeline, report and store modules import shared types from here.
 * No pipeline module should import types from another pipeline module.
 */

// --- Assets ---

/** One asset name taken from a media project, plus optional metadata. */
export interface AssetDescriptor {
  name: string;
  /** Source resolution formatted "<width>x<height>" */
  resolution?: string;
  /** Transform-related metadata keys reported by the host (zoom, pan, ...) */
  transforms?: string[];
  clip?: string;
  timeline?: string;
  timecode?: string;
  /** A non-match of an optional asset is informational, not a warning. */
  optional?: boolean;
}

/** A named list of assets, one per project. */
export interface AssetProject {
  project: string;
  assets: AssetDescriptor[];
}

// --- Mapping Pack ---

export type RuleStrategy = "exact" | "regex" | "token" | "similarity";

interface RuleBase {
  /** Position of the rule in the pack, used for precedence and labels */
  index: number;
  id: string | null;
  source: string;
  target: string;
  expectedResolution: string | null;
  expectedAspect: number | null;
}

export interface ExactRule extends RuleBase {
  strategy: "exact";
}

export interface RegexRule extends RuleBase {
  strategy: "regex";
}

export interface TokenRule extends RuleBase {
  strategy: "token";
}

export interface SimilarityRule extends RuleBase {
  strategy: "similarity";
  /** Overrides the pack-level threshold when set */
  similarityThreshold: number | null;
}

export type Rule = ExactRule | RegexRule | TokenRule | SimilarityRule;

export interface MappingPack {
  readonly rules: readonly Rule[];
  readonly rootFolders: readonly string[];
  readonly similarityThreshold: number;
  readonly aspectTolerance: number;
}

// --- Matching ---

export interface MatchResult {
  candidate: string;
  score: number;
  method: string;
}

export interface IndexCollision {
  key: string;
  replaced: string;
  path: string;
}

export interface NameIndex {
  /** normalized filename -> absolute path */
  entries: Map<string, string>;
  collisions: IndexCollision[];
}

export type ResolutionMethod = "rule" | "index" | "fuzzy" | "none";

/** A rule that could not be evaluated and was skipped. */
export interface RuleFault {
  rule: Rule;
  message: string;
}

export interface Resolution {
  target: string | null;
  rule: Rule | null;
  method: ResolutionMethod;
  /** Similarity score for rule/fuzzy matches computed by ratio, else null */
  score: number | null;
  faults: RuleFault[];
}

// --- Transaction ---

export interface TransactionAction {
  action: string;
  [key: string]: unknown;
}

export interface TransactionRecord {
  readonly id: string;
  readonly name: string;
  readonly dryRun: boolean;
  readonly startedAt: string;
  readonly closedAt: string;
  readonly actions: readonly TransactionAction[];
  readonly rollback: readonly TransactionAction[];
}

// --- Report ---

export type Severity = "info" | "warning" | "error";

export interface ReportItem {
  category: string;
  severity: Severity;
  message: string;
  timeline: string | null;
  clip: string | null;
  timecode: string | null;
  data: Record<string, unknown>;
}

export type ReportSummary = Record<string, unknown>;

export interface Report {
  readonly toolId: string;
  readonly title: string;
  readonly createdAt: string;
  readonly items: readonly ReportItem[];
  readonly summary: ReportSummary;
}

export type ReportFormat = "json" | "csv" | "html";

// --- Validation Result ---

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

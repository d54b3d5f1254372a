import { buildIndex } from "./nameIndex";
import { resolve, ruleLabel } from "./resolve";
import { checkMetadata } from "./metadata";
import type { MetadataIssue } from "./metadata";
import { ReportBuilder } from "../report/report";
import type { ItemDetails } from "../report/report";
import { TransactionBuilder } from "../report/transaction";
import type {
  AssetDescriptor,
  AssetProject,
  MappingPack,
  Report,
  Resolution,
  TransactionAction,
  TransactionRecord,
} from "../contracts";

export const RELINK_TOOL_ID = "relink";
export const RELINK_TITLE = "Asset Relink";

// --- Sink ---

export interface RelinkRequest {
  asset: AssetDescriptor;
  target: string;
  resolution: Resolution;
  /** Transaction id of the run issuing the relink */
  runId: string;
  /** Project the asset belongs to, when the caller named one */
  project: string | null;
}

export interface RelinkOutcome {
  ok: boolean;
  /** Why the sink refused, when ok is false */
  error?: string;
  /** Compensating action the sink can replay to undo this relink */
  rollback?: TransactionAction;
}

/**
 * Whatever performs the actual relink in the host project. The engine never
 * mutates anything itself; in a dry run the sink is not called.
 */
export interface RelinkSink {
  relink(request: RelinkRequest): RelinkOutcome | Promise<RelinkOutcome>;
}

// --- Run ---

export interface RelinkOptions {
  pack: MappingPack;
  assets: readonly AssetDescriptor[];
  dryRun: boolean;
  /** Required unless dryRun */
  sink?: RelinkSink;
  /** Passed to the sink with every request */
  project?: string;
  toolId?: string;
  title?: string;
}

export interface RelinkRun {
  report: Report;
  transaction: TransactionRecord;
}

interface RunCounters {
  matched: number;
  unmatched: number;
  fuzzy: number;
  mismatched: number;
  applied: number;
  failed: number;
  skipped: number;
}

function assetDetails(asset: AssetDescriptor, data?: Record<string, unknown>): ItemDetails {
  return {
    clip: asset.clip ?? asset.name,
    timeline: asset.timeline ?? null,
    timecode: asset.timecode ?? null,
    data,
  };
}

function reportMetadataIssue(
  report: ReportBuilder,
  asset: AssetDescriptor,
  issue: MetadataIssue
): void {
  switch (issue.kind) {
    case "appearance":
      report.warning(
        "appearance",
        `Clip may have transforms; verify framing after relink: ${asset.name}`,
        assetDetails(asset, { transform_fields: issue.transforms })
      );
      break;
    case "resolution":
      report.warning(
        "resolution",
        `Clip resolution ${issue.actual} differs from expected ${issue.expected}`,
        assetDetails(asset, { actual: issue.actual, expected: issue.expected })
      );
      break;
    case "aspect":
      report.warning(
        "aspect",
        `Clip aspect ${issue.actual.toFixed(2)} differs from expected ${issue.expected}`,
        assetDetails(asset, { actual: issue.actual, expected: issue.expected })
      );
      break;
  }
}

/**
 * Resolve every asset against the pack and record each decision.
 *
 * Never throws for per-asset or per-rule problems: those become report
 * items. A missing sink outside a dry run is a precondition failure and
 * stops the run before any resolution.
 */
export async function runRelink(options: RelinkOptions): Promise<RelinkRun> {
  const { pack, assets, dryRun, sink } = options;
  const report = new ReportBuilder(options.toolId ?? RELINK_TOOL_ID, options.title ?? RELINK_TITLE);
  const transaction = new TransactionBuilder(report.toolId, dryRun);

  if (!dryRun && sink === undefined) {
    report.error("config", "No relink sink available; run as a dry run or supply a sink.");
    report.setSummary({ assets_scanned: 0, dry_run: dryRun });
    return { report: report.finish(), transaction: transaction.close() };
  }

  if (assets.length === 0) {
    report.warning("assets", "No assets supplied; nothing to resolve.");
  }

  const index = buildIndex(pack.rootFolders);
  for (const collision of index.collisions) {
    report.warning(
      "index",
      `Duplicate normalized name "${collision.key}": ${collision.path} replaces ${collision.replaced}`,
      { data: { key: collision.key, kept: collision.path, replaced: collision.replaced } }
    );
  }

  const faultedRules = new Set<number>();
  const counters: RunCounters = {
    matched: 0,
    unmatched: 0,
    fuzzy: 0,
    mismatched: 0,
    applied: 0,
    failed: 0,
    skipped: 0,
  };

  for (const asset of assets) {
    if (asset.name.trim().length === 0) {
      report.error("asset", "Asset has no name; skipped.", assetDetails(asset));
      counters.skipped++;
      continue;
    }

    const resolution = resolve(asset.name, pack, index);

    for (const fault of resolution.faults) {
      if (faultedRules.has(fault.rule.index)) continue;
      faultedRules.add(fault.rule.index);
      report.warning(
        "rule",
        `Rule ${ruleLabel(fault.rule)} skipped: invalid regex "${fault.rule.source}" (${fault.message})`,
        { data: { rule: ruleLabel(fault.rule), source: fault.rule.source } }
      );
    }

    const target = resolution.target;
    if (target === null) {
      counters.unmatched++;
      const message = `No target found for ${asset.name}`;
      if (asset.optional) {
        report.info("match", message, assetDetails(asset));
      } else {
        report.warning("match", message, assetDetails(asset));
      }
      continue;
    }

    counters.matched++;
    if (resolution.method === "fuzzy") {
      counters.fuzzy++;
      report.warning(
        "match",
        `Fuzzy match used for ${asset.name} -> ${target} (score ${(resolution.score ?? 0).toFixed(3)})`,
        assetDetails(asset, { score: resolution.score, target })
      );
    }

    const issues = checkMetadata(asset, resolution.rule, pack);
    if (issues.some((i) => i.kind !== "appearance")) counters.mismatched++;
    for (const issue of issues) {
      reportMetadataIssue(report, asset, issue);
    }

    transaction.record({
      action: "relink",
      clip: asset.name,
      target,
      method: resolution.method,
      rule: resolution.rule ? ruleLabel(resolution.rule) : null,
      dry_run: dryRun,
    });

    if (dryRun || sink === undefined) {
      report.info("swap", `Dry run: relink ${asset.name} -> ${target}`, assetDetails(asset));
      continue;
    }

    let outcome: RelinkOutcome;
    try {
      outcome = await sink.relink({
        asset,
        target,
        resolution,
        runId: transaction.id,
        project: options.project ?? null,
      });
    } catch (err) {
      outcome = { ok: false, error: err instanceof Error ? err.message : String(err) };
    }

    if (outcome.ok) {
      counters.applied++;
      report.info("swap", `Relinked ${asset.name} -> ${target}`, assetDetails(asset));
      if (outcome.rollback) transaction.recordRollback(outcome.rollback);
    } else {
      counters.failed++;
      const reason = outcome.error ? `: ${outcome.error}` : "";
      report.error("swap", `Failed to relink ${asset.name} -> ${target}${reason}`, assetDetails(asset));
    }
  }

  report.setSummary({
    assets_scanned: assets.length,
    matched: counters.matched,
    unmatched: counters.unmatched,
    fuzzy: counters.fuzzy,
    mismatched: counters.mismatched,
    applied: counters.applied,
    failed: counters.failed,
    skipped: counters.skipped,
    index_entries: index.entries.size,
    dry_run: dryRun,
  });

  return { report: report.finish(), transaction: transaction.close() };
}

// --- Multi-project ---

export interface ProjectRun extends RelinkRun {
  project: string;
}

export interface MultiProjectRun {
  report: Report;
  runs: ProjectRun[];
}

/**
 * Apply one mapping pack to several projects in order. Each project gets
 * its own transaction and report; the combined report merges every
 * project's items behind a per-project header item, with each broken rule
 * warned about once.
 */
export async function runAcrossProjects(
  pack: MappingPack,
  projects: readonly AssetProject[],
  options: Omit<RelinkOptions, "pack" | "assets">
): Promise<MultiProjectRun> {
  const combined = new ReportBuilder(
    options.toolId ?? RELINK_TOOL_ID,
    options.title ?? RELINK_TITLE
  );
  if (projects.length === 0) {
    combined.warning("config", "No projects provided; nothing to resolve.");
  }

  const runs: ProjectRun[] = [];
  const reportedRules = new Set<string>();
  for (const project of projects) {
    combined.info("project", `Applying mapping pack to ${project.project}`, {
      data: { project: project.project, assets: project.assets.length },
    });
    const run = await runRelink({
      ...options,
      pack,
      assets: project.assets,
      project: project.project,
    });
    runs.push({ project: project.project, ...run });

    // A broken rule is reported once in the combined report, not per project
    for (const item of run.report.items) {
      const rule = item.data.rule;
      if (item.category === "rule" && typeof rule === "string") {
        if (reportedRules.has(rule)) continue;
        reportedRules.add(rule);
      }
      combined.add(item);
    }
  }

  combined.setSummary({ projects: projects.length, processed: runs.length });
  return { report: combined.finish(), runs };
}

import * as fs from "fs";
import * as path from "path";
import { ruleLabel } from "./resolve";
import type { RelinkOutcome, RelinkRequest, RelinkSink } from "./relink";

export interface RelinkManifest {
  schemaVersion: string;
  /** Every run that fed the manifest, in run order */
  runIds: string[];
  generatedAt: string;
  relinks: Array<{
    runId: string;
    project: string | null;
    asset: string;
    clip: string | null;
    timeline: string | null;
    target: string;
    method: string;
    rule: string | null;
    score: number | null;
  }>;
}

function toForwardSlash(p: string): string {
  return p.replace(/\\/g, "/");
}

/**
 * Sink that commits relinks into a manifest for the host integration to
 * apply. Targets must exist on disk; a missing target is refused so the
 * manifest never points at nothing.
 */
export class ManifestSink implements RelinkSink {
  private readonly relinks: RelinkManifest["relinks"] = [];

  relink(request: RelinkRequest): RelinkOutcome {
    const { asset, target, resolution, runId, project } = request;
    if (!fs.existsSync(target)) {
      return { ok: false, error: `target not found on disk: ${target}` };
    }

    const manifestTarget = toForwardSlash(path.resolve(target));
    this.relinks.push({
      runId,
      project,
      asset: asset.name,
      clip: asset.clip ?? null,
      timeline: asset.timeline ?? null,
      target: manifestTarget,
      method: resolution.method,
      rule: resolution.rule ? ruleLabel(resolution.rule) : null,
      score: resolution.score,
    });

    return {
      ok: true,
      rollback: { action: "revert_relink", clip: asset.name, target: manifestTarget },
    };
  }

  get size(): number {
    return this.relinks.length;
  }

  toManifest(
    runIds: readonly string[],
    generatedAt: string = new Date().toISOString()
  ): RelinkManifest {
    return {
      schemaVersion: "1.1",
      runIds: [...runIds],
      generatedAt,
      relinks: this.relinks.map((r) => ({ ...r })),
    };
  }
}

export function writeManifest(manifest: RelinkManifest, outputPath: string): void {
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(manifest, null, 2), "utf-8");
}

import type { AssetDescriptor, MappingPack, Rule } from "../contracts";

const TRANSFORM_MARKERS = ["zoom", "pan", "position", "rotation"];

export type MetadataIssue =
  | { kind: "appearance"; transforms: string[] }
  | { kind: "resolution"; actual: string; expected: string }
  | { kind: "aspect"; actual: number; expected: number };

/** Transform keys that may change framing once the media is swapped. */
export function transformFields(transforms: readonly string[]): string[] {
  return transforms.filter((key) => {
    const lowered = key.toLowerCase();
    return TRANSFORM_MARKERS.some((marker) => lowered.includes(marker));
  });
}

/** Width / height of a "<w>x<h>" string, or null when unparseable. */
export function aspectRatio(resolution: string): number | null {
  const match = /^\s*(\d+)\s*x\s*(\d+)\s*$/i.exec(resolution);
  if (!match) return null;
  const width = Number(match[1]);
  const height = Number(match[2]);
  if (height === 0) return null;
  return width / height;
}

/**
 * Compare an asset's metadata with what the matched rule expects.
 * Rule expectations only apply to rule matches; transforms always apply.
 */
export function checkMetadata(
  asset: AssetDescriptor,
  rule: Rule | null,
  pack: MappingPack
): MetadataIssue[] {
  const issues: MetadataIssue[] = [];

  const transforms = transformFields(asset.transforms ?? []);
  if (transforms.length > 0) {
    issues.push({ kind: "appearance", transforms });
  }

  const actual = asset.resolution;
  if (rule === null || actual === undefined) return issues;

  if (
    rule.expectedResolution !== null &&
    rule.expectedResolution.toLowerCase() !== actual.trim().toLowerCase()
  ) {
    issues.push({
      kind: "resolution",
      actual,
      expected: rule.expectedResolution,
    });
  }

  if (rule.expectedAspect !== null) {
    const aspect = aspectRatio(actual);
    if (
      aspect !== null &&
      Math.abs(aspect - rule.expectedAspect) > pack.aspectTolerance
    ) {
      issues.push({ kind: "aspect", actual: aspect, expected: rule.expectedAspect });
    }
  }

  return issues;
}

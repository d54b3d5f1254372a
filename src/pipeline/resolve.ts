import { normalize, tokenize } from "../lib/normalize";
import { bestMatch, similarityRatio } from "../lib/similarity";
import type {
  MappingPack,
  NameIndex,
  Resolution,
  Rule,
  RuleFault,
} from "../contracts";

export type { Resolution };

// --- Pattern Compilation ---

export type CompiledPattern =
  | { ok: true; regex: RegExp }
  | { ok: false; message: string };

/** Compile a regex rule source, case-insensitive. Never throws. */
export function compileRulePattern(source: string): CompiledPattern {
  try {
    return { ok: true, regex: new RegExp(source, "i") };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { ok: false, message };
  }
}

/** Label used for a rule in report items and warnings. */
export function ruleLabel(rule: Rule): string {
  return rule.id ?? `rules[${rule.index}]`;
}

// --- Rule Evaluation ---

type RuleOutcome =
  | { matched: true; score: number | null }
  | { matched: false; fault?: string };

const NO_MATCH: RuleOutcome = { matched: false };

function evaluateExact(source: string, normalizedName: string): RuleOutcome {
  const key = normalize(source);
  if (key.length > 0 && key === normalizedName) {
    return { matched: true, score: null };
  }
  return NO_MATCH;
}

function evaluateRegex(source: string, name: string): RuleOutcome {
  const compiled = compileRulePattern(source);
  if (!compiled.ok) {
    return { matched: false, fault: compiled.message };
  }
  return compiled.regex.test(name) ? { matched: true, score: null } : NO_MATCH;
}

function evaluateToken(source: string, name: string): RuleOutcome {
  const sourceTokens = new Set(tokenize(source));
  if (sourceTokens.size === 0) return NO_MATCH;

  const nameTokens = new Set(tokenize(name));
  for (const token of sourceTokens) {
    if (!nameTokens.has(token)) return NO_MATCH;
  }
  return { matched: true, score: null };
}

function evaluateSimilarity(
  source: string,
  normalizedName: string,
  threshold: number
): RuleOutcome {
  const score = similarityRatio(normalize(source), normalizedName);
  return score >= threshold ? { matched: true, score } : NO_MATCH;
}

function evaluateRule(
  rule: Rule,
  name: string,
  normalizedName: string,
  pack: MappingPack
): RuleOutcome {
  switch (rule.strategy) {
    case "exact":
      return evaluateExact(rule.source, normalizedName);
    case "regex":
      return evaluateRegex(rule.source, name);
    case "token":
      return evaluateToken(rule.source, name);
    case "similarity":
      return evaluateSimilarity(
        rule.source,
        normalizedName,
        rule.similarityThreshold ?? pack.similarityThreshold
      );
    default:
      // Packs are validated at load; anything else falls through to the index
      return NO_MATCH;
  }
}

// --- Resolution ---

/**
 * Resolve one asset name to at most one target.
 *
 * Order is fixed: rules in declaration order (first match wins), then an
 * exact hit on the normalized index, then the best fuzzy index candidate
 * at or above the pack threshold. A non-match is returned, not thrown.
 * Rules that cannot be evaluated are skipped and listed in `faults`.
 */
export function resolve(
  name: string,
  pack: MappingPack,
  index: NameIndex
): Resolution {
  const normalizedName = normalize(name);
  const faults: RuleFault[] = [];

  for (const rule of pack.rules) {
    const outcome = evaluateRule(rule, name, normalizedName, pack);
    if (outcome.matched) {
      return {
        target: rule.target,
        rule,
        method: "rule",
        score: outcome.score,
        faults,
      };
    }
    if (outcome.fault !== undefined) {
      faults.push({ rule, message: outcome.fault });
    }
  }

  const indexed = index.entries.get(normalizedName);
  if (indexed !== undefined) {
    return { target: indexed, rule: null, method: "index", score: null, faults };
  }

  const best = bestMatch(name, index.entries.keys());
  if (best !== null && best.score >= pack.similarityThreshold) {
    const fuzzyTarget = index.entries.get(best.candidate);
    if (fuzzyTarget !== undefined) {
      return {
        target: fuzzyTarget,
        rule: null,
        method: "fuzzy",
        score: best.score,
        faults,
      };
    }
  }

  return { target: null, rule: null, method: "none", score: null, faults };
}

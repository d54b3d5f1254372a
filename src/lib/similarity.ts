import { normalize } from "./normalize";
import type { MatchResult } from "../contracts";

/**
 * Unit-cost edit distance (insert, delete, substitute).
 * Keeps two rows sized to the shorter input.
 */
export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Columns follow the shorter string
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];

  let prev: number[] = [];
  for (let j = 0; j <= inner.length; j++) prev.push(j);

  for (let i = 1; i <= outer.length; i++) {
    const curr: number[] = [i];
    for (let j = 1; j <= inner.length; j++) {
      const insert = curr[j - 1] + 1;
      const remove = prev[j] + 1;
      const replace = prev[j - 1] + (outer[i - 1] === inner[j - 1] ? 0 : 1);
      curr.push(Math.min(insert, remove, replace));
    }
    prev = curr;
  }

  return prev[inner.length];
}

/** 1 - distance / longest length. Two empty strings are identical. */
export function similarityRatio(a: string, b: string): number {
  if (a.length === 0 && b.length === 0) return 1.0;
  const dist = levenshtein(a, b);
  return 1.0 - dist / Math.max(a.length, b.length);
}

/**
 * Score `target` against every candidate (both normalized) and return the
 * highest. Ties keep the first candidate seen. Linear scan: candidate sets
 * are one project's worth of names.
 */
export function bestMatch(
  target: string,
  candidates: Iterable<string>
): MatchResult | null {
  const normalizedTarget = normalize(target);
  let best: MatchResult | null = null;

  for (const candidate of candidates) {
    const score = similarityRatio(normalizedTarget, normalize(candidate));
    if (best === null || score > best.score) {
      best = { candidate, score, method: "levenshtein" };
    }
  }

  return best;
}

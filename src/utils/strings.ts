import { DISTANCE_WEIGHTS, type DistanceWeights } from "../config/constants.js";

export function truncateMiddle(text: string | undefined | null, limit: number): string {
  if (!text || text.length <= limit) return text ?? "";

  const startLength = Math.floor(limit * 0.6);
  const endLength = limit - startLength - 5;

  const start = text.slice(0, startLength);
  const end = text.slice(-endLength);
  return `${start} ... ${end}`;
}

/** Collapse whitespace runs to one space without trimming the ends. */
export function collapseWhitespace(text: string): string {
  return text.replaceAll(/\s+/g, " ");
}

export function splitWords(text: string): string[] {
  return text
    .split(/\s+/)
    .map((w) => w.trim())
    .filter((w) => w.length > 0);
}

/**
 * Edit distance from `source` to `target` with separate costs for
 * inserting, deleting and substituting a character. Compares code points,
 * so astral characters count once.
 */
export function weightedLevenshtein(
  source: string,
  target: string,
  weights: DistanceWeights = DISTANCE_WEIGHTS
): number {
  const { insertion, deletion, substitution } = weights;
  const a = Array.from(source);
  const b = Array.from(target);

  if (a.length === 0) return b.length * insertion;
  if (b.length === 0) return a.length * deletion;

  let previous = b.map((_, j) => (j + 1) * insertion);
  previous.unshift(0);
  let current = new Array<number>(b.length + 1).fill(0);

  for (let i = 1; i <= a.length; i++) {
    current[0] = i * deletion;
    for (let j = 1; j <= b.length; j++) {
      const replaceCost = a[i - 1] === b[j - 1] ? 0 : substitution;
      current[j] = Math.min(
        (previous[j - 1] ?? 0) + replaceCost,
        (previous[j] ?? 0) + deletion,
        (current[j - 1] ?? 0) + insertion
      );
    }
    [previous, current] = [current, previous];
  }

  return previous[b.length] ?? 0;
}

/** Smallest distance any pair of strings with these lengths can have. */
export function distanceLowerBound(
  sourceLength: number,
  targetLength: number,
  weights: DistanceWeights = DISTANCE_WEIGHTS
): number {
  return sourceLength > targetLength
    ? (sourceLength - targetLength) * weights.deletion
    : (targetLength - sourceLength) * weights.insertion;
}

import { canonicalKey } from "../shared/canonical.js";
import type { Batch } from "../shared/record.js";
import type { CollectedSource } from "./collect.js";

export type Random = () => number;

/**
 * Uniform sample of `size` items without replacement. Picks by partial Fisher-Yates over
 * indices, then restores the input order.
 */
export const sampleWithoutReplacement = <T>(items: readonly T[], size: number, random: Random = Math.random): T[] => {
  if (size >= items.length) return [...items];
  if (size <= 0) return [];
  const indices = items.map((_, index) => index);
  for (let i = 0; i < size; i += 1) {
    const j = i + Math.floor(random() * (indices.length - i));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  return indices
    .slice(0, size)
    .sort((a, b) => a - b)
    .map((index) => items[index]);
};

/** Drops from each later source the headlines an earlier source already produced. */
export const dropCrossSourceDuplicates = (collected: CollectedSource[]): CollectedSource[] => {
  const seen = new Set<string>();
  return collected.map(({ source, headlines }) => {
    const own = headlines.filter((text) => !seen.has(canonicalKey(text)));
    for (const text of own) seen.add(canonicalKey(text));
    return { source, headlines: own };
  });
};

/**
 * Builds one run's batch with equal per-source counts. The smallest list sets the size;
 * when any source came back empty nothing is kept.
 */
export const buildBalancedBatch = (collected: CollectedSource[], collectionDate: string, random: Random = Math.random): Batch => {
  if (collected.length === 0) return [];
  const lists = dropCrossSourceDuplicates(collected);
  const n = Math.min(...lists.map(({ headlines }) => headlines.length));
  if (n === 0) return [];

  return lists.flatMap(({ source, headlines }) =>
    sampleWithoutReplacement(headlines, n, random).map((headline) => ({
      headline,
      source,
      collection_date: collectionDate
    }))
  );
};

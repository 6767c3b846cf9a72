export type CanonicalKey = string;

/**
 * Identity used for every duplicate check: lowercased, surrounding whitespace trimmed.
 * Punctuation and Unicode forms are left alone, so "Storm hits" and "Storm hits." differ.
 */
export const canonicalKey = (text: string): CanonicalKey => text.toLowerCase().trim();

export const dedupeBy = <T>(items: Iterable<T>, getText: (item: T) => string, seen = new Set<CanonicalKey>()): T[] => {
  const unique: T[] = [];
  for (const item of items) {
    const key = canonicalKey(getText(item));
    if (seen.has(key)) continue;
    seen.add(key);
    unique.push(item);
  }
  return unique;
};

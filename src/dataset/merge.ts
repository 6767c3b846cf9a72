import { dedupeBy } from "../shared/canonical.js";
import type { Batch, HeadlineRecord } from "../shared/record.js";

/**
 * Keep-first union of original, prior integrated and batch, in that order. An original
 * record always survives over a later record with the same canonical key. Absent inputs
 * count as empty.
 */
export const mergeDatasets = (
  original: HeadlineRecord[] | null,
  integrated: HeadlineRecord[] | null,
  batch: Batch
): HeadlineRecord[] => dedupeBy([...(original ?? []), ...(integrated ?? []), ...batch], (record) => record.headline);

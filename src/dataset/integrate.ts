import type { Batch, HeadlineRecord, ReportRow } from "../shared/record.js";
import { withLock } from "./lock.js";
import { mergeDatasets } from "./merge.js";
import { appendReportRow, buildReportRow } from "./report.js";
import { loadDataset, saveDataset, type DatasetLoad } from "./store.js";

export type StorePaths = {
  original: string;
  integrated: string;
  report: string;
};

export type IntegrateOptions = {
  paths: StorePaths;
  batch: Batch;
  date: string;
  perSourceCounts: Record<string, number>;
  dryRun?: boolean;
};

export type IntegrationResult = {
  report: ReportRow;
  merged: HeadlineRecord[];
  written: boolean;
  degraded: string[];
};

// Sentinels for stores written before collection dates were tracked.
export const ORIGINAL_DATE_SENTINEL = "initial";
export const INTEGRATED_DATE_SENTINEL = "unknown";

export const lockPathFor = (paths: StorePaths) => `${paths.integrated}.lock`;

const usableRecords = (load: DatasetLoad, label: string, degraded: string[]): HeadlineRecord[] | null => {
  switch (load.status) {
    case "absent":
      console.log(`  ${label} dataset not found: ${load.path}`);
      return null;
    case "invalid": {
      const message = `${label} dataset skipped (${load.reason}): ${load.path}`;
      console.warn(`  Warning: ${message}`);
      degraded.push(message);
      return null;
    }
    case "ok":
      console.log(`  Loaded ${label} dataset: ${load.records.length} headlines`);
      return load.records;
  }
};

const integrate = (options: IntegrateOptions): IntegrationResult => {
  const { paths, batch } = options;
  const degraded: string[] = [];

  const original = usableRecords(loadDataset(paths.original, ORIGINAL_DATE_SENTINEL), "Original", degraded);
  const integrated = usableRecords(
    loadDataset(paths.integrated, INTEGRATED_DATE_SENTINEL),
    "Integrated",
    degraded
  );

  const existing = mergeDatasets(original, integrated, []);
  const merged = batch.length > 0 ? mergeDatasets(original, integrated, batch) : existing;
  const report = buildReportRow({
    date: options.date,
    perSourceCounts: options.perSourceCounts,
    batch,
    existing,
    merged
  });

  if (options.dryRun) {
    return { report, merged, written: false, degraded };
  }

  let written = false;
  if (batch.length > 0) {
    saveDataset(paths.integrated, merged);
    written = true;
    console.log(`  Saved ${merged.length} headlines to ${paths.integrated}`);
  } else {
    console.log("  No new headlines to integrate; integrated dataset left as is");
  }
  appendReportRow(paths.report, report);
  return { report, merged, written, degraded };
};

/**
 * Folds a batch into the integrated store and appends one ledger row. The original store
 * is only read. Writes happen under the store lock; a dry run takes no lock and writes nothing.
 */
export const integrateBatch = async (options: IntegrateOptions): Promise<IntegrationResult> => {
  if (options.dryRun) {
    return integrate(options);
  }
  return withLock(lockPathFor(options.paths), async () => integrate(options));
};

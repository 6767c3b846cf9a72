import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { canonicalKey } from "../shared/canonical.js";
import type { Batch, HeadlineRecord, ReportRow } from "../shared/record.js";

export const REPORT_COLUMNS = [
  "date",
  "total_scraped",
  "per_source_counts",
  "batch_size",
  "headlines_added",
  "duplicates_skipped",
  "dataset_size_before",
  "dataset_size_after"
] as const;

export type ReportInput = {
  date: string;
  perSourceCounts: Record<string, number>;
  batch: Batch;
  /** Keep-first union of the stores as they were before this run's merge. */
  existing: HeadlineRecord[];
  merged: HeadlineRecord[];
};

export const buildReportRow = (input: ReportInput): ReportRow => {
  const existingKeys = new Set(input.existing.map((record) => canonicalKey(record.headline)));
  const newKeys = new Set(
    input.batch.map((record) => canonicalKey(record.headline)).filter((key) => !existingKeys.has(key))
  );
  const headlinesAdded = newKeys.size;

  return {
    date: input.date,
    total_scraped: Object.values(input.perSourceCounts).reduce((sum, count) => sum + count, 0),
    per_source_counts: input.perSourceCounts,
    batch_size: input.batch.length,
    headlines_added: headlinesAdded,
    duplicates_skipped: input.batch.length - headlinesAdded,
    dataset_size_before: input.existing.length,
    dataset_size_after: input.merged.length
  };
};

const toCsvRecord = (row: ReportRow) => ({
  ...row,
  per_source_counts: JSON.stringify(row.per_source_counts)
});

export const appendReportRow = (filePath: string, row: ReportRow) => {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const needsHeader = !fs.existsSync(filePath) || fs.statSync(filePath).size === 0;
  const line = stringify([toCsvRecord(row)], { header: needsHeader, columns: [...REPORT_COLUMNS] });
  fs.appendFileSync(filePath, line, "utf-8");
};

const countsSchema = z.record(z.number());

const reportRowSchema = z.object({
  date: z.string(),
  total_scraped: z.coerce.number(),
  per_source_counts: z.string().transform((value, ctx) => {
    let decoded: unknown;
    try {
      decoded = JSON.parse(value);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `per_source_counts is not JSON: ${value}` });
      return z.NEVER;
    }
    const counts = countsSchema.safeParse(decoded);
    if (!counts.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `per_source_counts is not a count map: ${value}` });
      return z.NEVER;
    }
    return counts.data;
  }),
  batch_size: z.coerce.number(),
  headlines_added: z.coerce.number(),
  duplicates_skipped: z.coerce.number(),
  dataset_size_before: z.coerce.number(),
  dataset_size_after: z.coerce.number()
});

export const readReport = (filePath: string): ReportRow[] => {
  if (!fs.existsSync(filePath)) return [];
  const raw: unknown = parse(fs.readFileSync(filePath, "utf-8"), {
    bom: true,
    columns: true,
    skip_empty_lines: true
  });
  const rows = z.array(reportRowSchema).safeParse(raw);
  if (!rows.success) {
    throw new Error(`Malformed report ledger ${filePath}: ${rows.error.issues[0]?.message ?? "unknown issue"}`);
  }
  return rows.data;
};

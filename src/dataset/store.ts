import fs from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type { HeadlineRecord } from "../shared/record.js";

export const DATASET_COLUMNS = ["headline", "source", "collection_date"] as const;
export const REQUIRED_COLUMNS = ["headline", "source"] as const;

export type DatasetLoad =
  | { status: "absent"; path: string }
  | { status: "invalid"; path: string; reason: string }
  | { status: "ok"; path: string; records: HeadlineRecord[] };

type ParsedDataset = { ok: true; records: HeadlineRecord[] } | { ok: false; reason: string };

const rowsSchema = z.array(z.array(z.string()));

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const parseDatasetCsv = (content: string, defaultDate: string): ParsedDataset => {
  let raw: unknown;
  try {
    raw = parse(content, { bom: true, skip_empty_lines: true, relax_column_count: true });
  } catch (error) {
    return { ok: false, reason: `unparsable CSV (${describeError(error)})` };
  }

  const rows = rowsSchema.safeParse(raw);
  if (!rows.success) {
    return { ok: false, reason: "unexpected CSV shape" };
  }
  const [header, ...body] = rows.data;
  if (!header) {
    return { ok: false, reason: "empty file" };
  }

  const columns = header.map((name) => name.trim());
  const missing = REQUIRED_COLUMNS.filter((name) => !columns.includes(name));
  if (missing.length > 0) {
    return { ok: false, reason: `missing required columns: ${missing.join(", ")}` };
  }

  const headlineAt = columns.indexOf("headline");
  const sourceAt = columns.indexOf("source");
  const dateAt = columns.indexOf("collection_date");

  const records: HeadlineRecord[] = [];
  for (const row of body) {
    const headline = row[headlineAt] ?? "";
    if (headline.trim() === "") continue;
    records.push({
      headline,
      source: row[sourceAt] ?? "",
      collection_date: dateAt >= 0 && row[dateAt] ? row[dateAt] : defaultDate
    });
  }
  return { ok: true, records };
};

/**
 * Reads a headline CSV. A missing file is "absent"; a file that cannot serve as a merge
 * input is "invalid" and carries the reason.
 */
export const loadDataset = (filePath: string, defaultDate: string): DatasetLoad => {
  if (!fs.existsSync(filePath)) {
    return { status: "absent", path: filePath };
  }
  const parsed = parseDatasetCsv(fs.readFileSync(filePath, "utf-8"), defaultDate);
  if (!parsed.ok) {
    return { status: "invalid", path: filePath, reason: parsed.reason };
  }
  return { status: "ok", path: filePath, records: parsed.records };
};

export const serializeDataset = (records: HeadlineRecord[]) =>
  stringify(records, { header: true, columns: [...DATASET_COLUMNS] });

/** Replaces the file wholesale: the new content is written beside it, then renamed over it. */
export const writeFileAtomic = (filePath: string, content: string) => {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  fs.writeFileSync(tmpPath, content, "utf-8");
  fs.renameSync(tmpPath, filePath);
};

export const saveDataset = (filePath: string, records: HeadlineRecord[]) => {
  writeFileAtomic(filePath, serializeDataset(records));
};

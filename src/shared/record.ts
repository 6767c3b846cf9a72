export const SOURCES = ["FoxNews", "NBC"] as const;

export type Source = (typeof SOURCES)[number];

export type HeadlineRecord = {
  headline: string;
  source: string; // persisted stores may carry labels outside SOURCES
  collection_date: string; // YYYY-MM-DD, or a sentinel such as "initial"
};

export type Batch = HeadlineRecord[];

export type ReportRow = {
  date: string;
  total_scraped: number;
  per_source_counts: Record<string, number>;
  batch_size: number;
  headlines_added: number;
  duplicates_skipped: number;
  dataset_size_before: number;
  dataset_size_after: number;
};

import express from "express";
import { config } from "../shared/config.js";
import type { HeadlineRecord } from "../shared/record.js";
import { INTEGRATED_DATE_SENTINEL } from "../dataset/integrate.js";
import { readReport } from "../dataset/report.js";
import { loadDataset } from "../dataset/store.js";

export type AppOptions = {
  datasetPath: string;
  reportPath: string;
  apiKey: string;
};

const defaultOptions = (): AppOptions => ({
  datasetPath: config.integratedDatasetPath,
  reportPath: config.reportPath,
  apiKey: config.apiKey
});

const getApiKey = (req: express.Request): string | null => {
  const headerKey = req.header("x-api-key");
  if (headerKey) return headerKey;
  const auth = req.header("authorization");
  if (!auth) return null;
  const match = auth.match(/^Bearer\s+(.+)$/i);
  return match ? match[1] : null;
};

const authMiddleware =
  (expected: string): express.RequestHandler =>
  (req, res, next) => {
    if (req.path === "/health") {
      return next();
    }
    if (!expected) {
      return res.status(500).json({ error: "API_KEY not configured" });
    }
    const provided = getApiKey(req);
    if (!provided || provided !== expected) {
      return res.status(401).json({ error: "Unauthorized" });
    }
    return next();
  };

const parseLimit = (value: string | undefined, fallback: number) => {
  const parsed = Math.floor(Number(value));
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return Math.min(parsed, 200);
};

const parseOffset = (value: string | undefined) => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : 0;
};

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

const dateSortKey = (date: string) => (DATE_PATTERN.test(date) ? date : "");

const queryString = (value: unknown) => (typeof value === "string" && value !== "" ? value : undefined);

const readHeadlines = (datasetPath: string): HeadlineRecord[] => {
  const load = loadDataset(datasetPath, INTEGRATED_DATE_SENTINEL);
  if (load.status === "invalid") {
    throw new Error(`Integrated dataset unreadable: ${load.reason}`);
  }
  return load.status === "ok" ? load.records : [];
};

const countBy = (records: HeadlineRecord[], key: (record: HeadlineRecord) => string) => {
  const counts: Record<string, number> = {};
  for (const record of records) {
    const value = key(record);
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
};

export const createApp = (options: AppOptions = defaultOptions()) => {
  const app = express();
  app.use(express.json());
  app.use(authMiddleware(options.apiKey));

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/headlines", (req, res) => {
    try {
      const q = queryString(req.query.q)?.toLowerCase();
      const source = queryString(req.query.source);
      const date = queryString(req.query.date);
      const limitValue = parseLimit(queryString(req.query.limit), 50);
      const offsetValue = parseOffset(queryString(req.query.offset));

      const matches = readHeadlines(options.datasetPath)
        .filter((record) => !q || record.headline.toLowerCase().includes(q))
        .filter((record) => !source || record.source === source)
        .filter((record) => !date || record.collection_date === date);
      // Newest collection first; sentinel dates sort after real ones. Stable within a date.
      const ordered = [...matches].sort((a, b) =>
        dateSortKey(b.collection_date).localeCompare(dateSortKey(a.collection_date))
      );
      const page = ordered.slice(offsetValue, offsetValue + limitValue);

      res.json({
        total: matches.length,
        count: page.length,
        headlines: page
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Dataset error";
      res.status(500).json({ error: message });
    }
  });

  app.get("/headlines/stats", (_req, res) => {
    try {
      const records = readHeadlines(options.datasetPath);
      res.json({
        total: records.length,
        bySource: countBy(records, (record) => record.source),
        byDate: countBy(records, (record) => record.collection_date)
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Dataset error";
      res.status(500).json({ error: message });
    }
  });

  app.get("/reports", (req, res) => {
    try {
      const limitValue = parseLimit(queryString(req.query.limit), 30);
      const rows = readReport(options.reportPath).reverse().slice(0, limitValue);
      res.json({ count: rows.length, reports: rows });
    } catch (error) {
      const message = error instanceof Error ? error.message : "Report error";
      res.status(500).json({ error: message });
    }
  });

  return app;
};

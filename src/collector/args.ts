import { config } from "../shared/config.js";
import { todayUtc, type RunOptions } from "./run.js";

export type CliOptions = RunOptions & {
  maxLoadMore: number;
};

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const parseArgs = (argv: string[], fallbackMaxLoadMore = config.maxLoadMore): CliOptions => {
  const args = new Map<string, string | boolean>();
  for (const arg of argv) {
    if (arg === "--dry-run") {
      args.set("dry-run", true);
      continue;
    }
    if (arg === "--no-browser") {
      args.set("no-browser", true);
      continue;
    }
    if (arg.startsWith("--date=")) {
      args.set("date", arg.split("=")[1]);
      continue;
    }
    if (arg.startsWith("--max-load-more=")) {
      args.set("max-load-more", arg.split("=")[1]);
      continue;
    }
    throw new Error(`Unknown argument: ${arg}`);
  }

  const date = args.get("date");
  if (typeof date === "string" && !DATE_PATTERN.test(date)) {
    throw new Error(`--date must be YYYY-MM-DD, got ${date}`);
  }
  const maxLoadMore = Number(args.get("max-load-more") ?? fallbackMaxLoadMore);
  if (!Number.isInteger(maxLoadMore) || maxLoadMore < 0) {
    throw new Error(`--max-load-more must be a non-negative integer`);
  }

  return {
    dryRun: args.get("dry-run") === true,
    useBrowser: args.get("no-browser") !== true,
    date: typeof date === "string" ? date : todayUtc(),
    maxLoadMore
  };
};

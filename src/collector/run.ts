import type { AppConfig } from "../shared/config.js";
import type { Batch } from "../shared/record.js";
import { integrateBatch, type IntegrationResult } from "../dataset/integrate.js";
import { detectPageExpander, type PageExpander } from "./browser.js";
import { collectHeadlines, type CollectedSource } from "./collect.js";
import { loadExclusions } from "./exclusions.js";
import { createHttpFetcher, type Fetcher } from "./fetcher.js";
import { buildBalancedBatch, type Random } from "./sampler.js";
import { buildSourceDefinitions } from "./sources.js";

export type RunSettings = Pick<
  AppConfig,
  | "foxUrl"
  | "nbcUrl"
  | "fetchMaxAttempts"
  | "fetchRetryDelayMs"
  | "fetchTimeoutMs"
  | "sourceCooldownMs"
  | "maxLoadMore"
  | "originalDatasetPath"
  | "integratedDatasetPath"
  | "reportPath"
  | "exclusionsPath"
  | "browserExecutablePath"
>;

export type RunOptions = {
  dryRun: boolean;
  date: string;
  useBrowser: boolean;
};

export type RunOverrides = {
  fetcher?: Fetcher;
  /** null forces single-page extraction without probing for a browser. */
  expander?: PageExpander | null;
  random?: Random;
  sleep?: (ms: number) => Promise<void>;
};

export type RunSummary = IntegrationResult & {
  collected: CollectedSource[];
  batch: Batch;
};

export const todayUtc = (now = new Date()) => now.toISOString().slice(0, 10);

export const runCollection = async (
  settings: RunSettings,
  options: RunOptions,
  overrides: RunOverrides = {}
): Promise<RunSummary> => {
  const exclusions = loadExclusions(settings.exclusionsPath);
  const definitions = buildSourceDefinitions(
    { FoxNews: settings.foxUrl, NBC: settings.nbcUrl },
    exclusions,
    settings.maxLoadMore
  );
  const fetcher =
    overrides.fetcher ??
    createHttpFetcher({
      maxAttempts: settings.fetchMaxAttempts,
      delayMs: settings.fetchRetryDelayMs,
      timeoutMs: settings.fetchTimeoutMs,
      sleep: overrides.sleep
    });
  const expander =
    overrides.expander !== undefined
      ? overrides.expander
      : await detectPageExpander({
          executablePath: settings.browserExecutablePath,
          disabled: !options.useBrowser,
          timeoutMs: settings.fetchTimeoutMs
        });
  if (!expander) {
    console.log("Browser automation off; paginated sources use a single page");
  }

  console.log(`Collection date: ${options.date}`);
  let collected: CollectedSource[];
  try {
    collected = await collectHeadlines({
      definitions,
      fetcher,
      expander,
      cooldownMs: settings.sourceCooldownMs,
      sleep: overrides.sleep
    });
  } finally {
    await expander?.close();
  }

  const batch = buildBalancedBatch(collected, options.date, overrides.random);
  const perSourceCounts = Object.fromEntries(collected.map(({ source, headlines }) => [source, headlines.length]));
  console.log(
    `Batch: ${batch.length} headlines (${collected.map(({ source }) => `${source} ${batch.filter((r) => r.source === source).length}`).join(", ")})`
  );

  const result = await integrateBatch({
    paths: {
      original: settings.originalDatasetPath,
      integrated: settings.integratedDatasetPath,
      report: settings.reportPath
    },
    batch,
    date: options.date,
    perSourceCounts,
    dryRun: options.dryRun
  });

  const { report } = result;
  console.log(
    `Added ${report.headlines_added}, skipped ${report.duplicates_skipped} duplicates; ` +
      `dataset ${report.dataset_size_before} -> ${report.dataset_size_after}`
  );
  return { ...result, collected, batch };
};

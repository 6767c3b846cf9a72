#!/usr/bin/env node
import { config, envInfo } from "../shared/config.js";
import { parseArgs } from "./args.js";
import { runCollection } from "./run.js";

const run = async () => {
  const options = parseArgs(process.argv.slice(2));
  console.log(`Daily headline collection (${envInfo.envFileExists ? envInfo.envFile : "no env file"})`);

  const summary = await runCollection({ ...config, maxLoadMore: options.maxLoadMore }, options);

  if (options.dryRun) {
    console.log(`Dry-run: would add ${summary.report.headlines_added} headlines; nothing written`);
  }
  for (const message of summary.degraded) {
    console.warn(`Degraded input: ${message}`);
  }
  console.log("Daily collection complete.");
};

run().catch((err) => {
  console.error("Collection failed:", err instanceof Error ? (err.stack ?? err.message) : err);
  process.exitCode = 1;
});

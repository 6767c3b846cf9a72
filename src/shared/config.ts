import fs from "fs";
import path from "path";
import dotenv from "dotenv";

const isProdEnv = process.env.HEADLINES_ENV === "prod" || process.env.NODE_ENV === "production";
const envFile = isProdEnv ? ".env.prod" : ".env.dev";
const envPath = path.resolve(process.cwd(), envFile);
const envFileExists = fs.existsSync(envPath);

if (envFileExists) {
  dotenv.config({ path: envPath });
}

export const envInfo = {
  envFile,
  envPath,
  envFileExists
};

const numberEnv = (key: string, fallback: number): number => {
  const raw = process.env[key];
  if (raw === undefined || raw === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed < 0) {
    throw new Error(`Invalid numeric env var: ${key}=${raw}`);
  }
  return parsed;
};

const dataDir = path.resolve(process.cwd(), process.env.DATA_DIR ?? "data");

export const config = {
  foxUrl: process.env.FOX_URL ?? "https://www.foxnews.com",
  nbcUrl: process.env.NBC_URL ?? "https://www.nbcnews.com",
  fetchMaxAttempts: numberEnv("FETCH_MAX_ATTEMPTS", 3),
  fetchRetryDelayMs: numberEnv("FETCH_RETRY_DELAY_MS", 1000),
  fetchTimeoutMs: numberEnv("FETCH_TIMEOUT_MS", 15000),
  sourceCooldownMs: numberEnv("SOURCE_COOLDOWN_MS", 2000),
  maxLoadMore: numberEnv("MAX_LOAD_MORE", 3),
  dataDir,
  originalDatasetPath:
    process.env.ORIGINAL_DATASET_PATH ?? path.join(dataDir, "scraped_headlines_data.csv"),
  integratedDatasetPath:
    process.env.INTEGRATED_DATASET_PATH ?? path.join(dataDir, "daily_updated_headlines_data.csv"),
  reportPath: process.env.REPORT_PATH ?? path.join(dataDir, "collection_report.csv"),
  exclusionsPath:
    process.env.EXCLUSIONS_PATH ?? path.resolve(process.cwd(), "config", "exclusions.json"),
  browserExecutablePath: process.env.BROWSER_EXECUTABLE_PATH ?? "",
  apiKey: process.env.API_KEY ?? "",
  port: Number(process.env.PORT ?? 3000)
};

export type AppConfig = typeof config;

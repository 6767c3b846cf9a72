import { once } from "events";
import type { Server } from "http";
import path from "path";
import { afterAll, beforeAll, describe, it, expect } from "vitest";
import { appendReportRow } from "../../src/dataset/report.js";
import { saveDataset } from "../../src/dataset/store.js";
import { createApp } from "../../src/server/app.js";
import type { ReportRow } from "../../src/shared/record.js";
import { makeTempDir } from "../helpers.js";

const API_KEY = "test-secret";

const report = (date: string, added: number): ReportRow => ({
  date,
  total_scraped: 20,
  per_source_counts: { FoxNews: 12, NBC: 8 },
  batch_size: 16,
  headlines_added: added,
  duplicates_skipped: 16 - added,
  dataset_size_before: 100,
  dataset_size_after: 100 + added
});

describe("dataset API", () => {
  let server: Server;
  let baseUrl = "";

  beforeAll(async () => {
    const dir = makeTempDir();
    const datasetPath = path.join(dir, "daily_updated_headlines_data.csv");
    const reportPath = path.join(dir, "collection_report.csv");
    saveDataset(datasetPath, [
      { headline: "Old headline from the seed set", source: "NBC", collection_date: "initial" },
      { headline: "Fresh story from monday morning", source: "FoxNews", collection_date: "2026-10-18" },
      { headline: "Fresh story from tuesday morning", source: "NBC", collection_date: "2026-10-19" }
    ]);
    appendReportRow(reportPath, report("2026-10-18", 9));
    appendReportRow(reportPath, report("2026-10-19", 4));

    server = createApp({ datasetPath, reportPath, apiKey: API_KEY }).listen(0, "127.0.0.1");
    await once(server, "listening");
    const address = server.address();
    if (!address || typeof address === "string") throw new Error("server has no port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    server.close();
    await once(server, "close");
  });

  const get = (route: string, headers: Record<string, string> = { "x-api-key": API_KEY }) =>
    fetch(`${baseUrl}${route}`, { headers });

  it("serves health checks without a key", async () => {
    const res = await get("/health", {});
    expect(res.status).toBe(200);
    expect(await res.text()).toBe("OK");
  });

  it("rejects requests without the right key", async () => {
    expect((await get("/headlines", {})).status).toBe(401);
    expect((await get("/headlines", { authorization: "Bearer wrong" })).status).toBe(401);
    expect((await get("/headlines", { authorization: `Bearer ${API_KEY}` })).status).toBe(200);
  });

  it("lists headlines newest collection first", async () => {
    const body = await (await get("/headlines")).json();
    expect(body.total).toBe(3);
    expect(body.headlines.map((record: { collection_date: string }) => record.collection_date)).toEqual([
      "2026-10-19",
      "2026-10-18",
      "initial"
    ]);
  });

  it("filters by text, source and date and pages the result", async () => {
    expect(await (await get("/headlines?q=FRESH&source=NBC")).json()).toEqual({
      total: 1,
      count: 1,
      headlines: [{ headline: "Fresh story from tuesday morning", source: "NBC", collection_date: "2026-10-19" }]
    });
    const byDate = await (await get("/headlines?date=2026-10-18")).json();
    expect(byDate.count).toBe(1);
    const paged = await (await get("/headlines?limit=1&offset=1")).json();
    expect(paged).toMatchObject({ total: 3, count: 1 });
    expect(paged.headlines[0].headline).toBe("Fresh story from monday morning");
  });

  it("uses the default page size for a limit that rounds down to zero", async () => {
    expect(await (await get("/headlines?limit=0.5")).json()).toMatchObject({ total: 3, count: 3 });
    expect(await (await get("/headlines?limit=1.9")).json()).toMatchObject({ total: 3, count: 1 });
  });

  it("summarizes the dataset", async () => {
    expect(await (await get("/headlines/stats")).json()).toEqual({
      total: 3,
      bySource: { NBC: 2, FoxNews: 1 },
      byDate: { initial: 1, "2026-10-18": 1, "2026-10-19": 1 }
    });
  });

  it("returns the latest ledger rows first", async () => {
    expect(await (await get("/reports?limit=1")).json()).toEqual({ count: 1, reports: [report("2026-10-19", 4)] });
  });
});

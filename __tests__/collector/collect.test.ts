import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import { assertPageLoaded, type BrowserSession, type PageExpander } from "../../src/collector/browser.js";
import { collectHeadlines, extractPaginated, extractSource } from "../../src/collector/collect.js";
import { createRuleExtractor } from "../../src/collector/extract.js";
import type { Fetcher } from "../../src/collector/fetcher.js";
import type { SourceDefinition } from "../../src/collector/sources.js";

const headingExtractor = (source: "FoxNews" | "NBC") =>
  createRuleExtractor(source, [{ name: "headings", scope: "h2", text: "link-or-heading" }], {
    minLength: 15,
    maxLength: 200,
    excludeKeywords: [],
    photoCreditPatterns: []
  });

const page = (...headlines: string[]) => headlines.map((text) => `<h2>${text}</h2>`).join("\n");

const A = "First headline on the listing";
const B = "Second headline on the listing";
const C = "Third headline after load more";
const D = "Fourth headline after load more";

const paginatedSource = (maxExpansions = 5): SourceDefinition => ({
  source: "FoxNews",
  url: "https://fox.example.test/politics",
  extractor: headingExtractor("FoxNews"),
  pagination: { loadMoreSelector: "button.load-more", maxExpansions, settleMs: 0 }
});

const fakeSession = (pages: string[], clickable = true) => {
  let shown = 0;
  const session: BrowserSession = {
    content: async () => pages[Math.min(shown, pages.length - 1)],
    loadMore: vi.fn(async (_selector: string, _settleMs: number) => {
      if (!clickable) return false;
      shown += 1;
      return true;
    }),
    close: vi.fn(async () => undefined)
  };
  return session;
};

const fakeExpander = (session: BrowserSession): PageExpander => ({
  open: vi.fn(async (_url: string) => session),
  close: vi.fn(async () => undefined)
});

const fakeFetcher = (pages: Record<string, string | null>): Fetcher => ({
  fetch: vi.fn(async (url: string) => pages[url] ?? null)
});

describe("extractPaginated", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("appends new headlines after each expansion and stops when nothing new shows up", async () => {
    const session = fakeSession([page(A, B), page(A, B, C), page(A, B, C)]);
    const definition = paginatedSource();

    const headlines = await extractPaginated(definition, fakeExpander(session), {
      loadMoreSelector: "button.load-more",
      maxExpansions: 5,
      settleMs: 0
    });

    expect(headlines).toEqual([A, B, C]);
    expect(session.loadMore).toHaveBeenCalledTimes(2);
    expect(session.loadMore).toHaveBeenCalledWith("button.load-more", 0);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it("stops when the load-more affordance is gone", async () => {
    const session = fakeSession([page(A, B), page(A, B, C)], false);

    const headlines = await extractPaginated(paginatedSource(), fakeExpander(session), {
      loadMoreSelector: "button.load-more",
      maxExpansions: 5,
      settleMs: 0
    });

    expect(headlines).toEqual([A, B]);
    expect(session.loadMore).toHaveBeenCalledTimes(1);
  });

  it("respects the expansion bound", async () => {
    const session = fakeSession([page(A), page(A, B), page(A, B, C), page(A, B, C, D)]);

    const headlines = await extractPaginated(paginatedSource(2), fakeExpander(session), {
      loadMoreSelector: "button.load-more",
      maxExpansions: 2,
      settleMs: 0
    });

    expect(headlines).toEqual([A, B, C]);
    expect(session.loadMore).toHaveBeenCalledTimes(2);
  });

  it("keeps the headlines gathered so far when a later expansion fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    let reads = 0;
    const session: BrowserSession = {
      content: async () => {
        reads += 1;
        if (reads === 3) throw new Error("Execution context was destroyed");
        return reads === 1 ? page(A) : page(A, B);
      },
      loadMore: vi.fn(async (_selector: string, _settleMs: number) => true),
      close: vi.fn(async () => undefined)
    };

    const headlines = await extractPaginated(paginatedSource(), fakeExpander(session), {
      loadMoreSelector: "button.load-more",
      maxExpansions: 5,
      settleMs: 0
    });

    expect(headlines).toEqual([A, B]);
    expect(session.loadMore).toHaveBeenCalledTimes(2);
    expect(session.close).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith("Load-more 2 failed for FoxNews: Execution context was destroyed");
  });
});

describe("extractSource", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("uses a single fetched page when no browser is available", async () => {
    const definition = paginatedSource();
    const fetcher = fakeFetcher({ [definition.url]: page(A, B) });

    await expect(extractSource(definition, fetcher, null)).resolves.toEqual([A, B]);
  });

  it("falls back to a single page when the browser fails", async () => {
    const definition = paginatedSource();
    const fetcher = fakeFetcher({ [definition.url]: page(A) });
    const expander: PageExpander = {
      open: vi.fn(async (_url: string): Promise<BrowserSession> => {
        throw new Error("browser crashed");
      }),
      close: vi.fn(async () => undefined)
    };

    await expect(extractSource(definition, fetcher, expander)).resolves.toEqual([A]);
    expect(fetcher.fetch).toHaveBeenCalledWith(definition.url);
  });

  it("falls back to the fetched page when the browser navigation is not a 200", async () => {
    const definition = paginatedSource();
    const fetcher = fakeFetcher({ [definition.url]: page(A, B) });
    const blocked = fakeSession([page(C)]);
    const expander: PageExpander = {
      open: vi.fn(async (url: string): Promise<BrowserSession> => {
        assertPageLoaded({ status: () => 403 }, url);
        return blocked;
      }),
      close: vi.fn(async () => undefined)
    };

    await expect(extractSource(definition, fetcher, expander)).resolves.toEqual([A, B]);
    expect(fetcher.fetch).toHaveBeenCalledWith(definition.url);
    expect(blocked.loadMore).not.toHaveBeenCalled();
  });

  it("never opens the browser for a source without pagination", async () => {
    const definition: SourceDefinition = {
      source: "NBC",
      url: "https://nbc.example.test/",
      extractor: headingExtractor("NBC")
    };
    const expander = fakeExpander(fakeSession([page(C)]));
    const fetcher = fakeFetcher({ [definition.url]: page(D) });

    await expect(extractSource(definition, fetcher, expander)).resolves.toEqual([D]);
    expect(expander.open).not.toHaveBeenCalled();
  });

  it("yields zero headlines for a source that could not be fetched", async () => {
    const definition = paginatedSource();
    await expect(extractSource(definition, fakeFetcher({}), null)).resolves.toEqual([]);
  });
});

describe("collectHeadlines", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("scrapes sources one after another with a cooldown in between", async () => {
    const events: string[] = [];
    const fox: SourceDefinition = { source: "FoxNews", url: "https://fox.example.test/", extractor: headingExtractor("FoxNews") };
    const nbc: SourceDefinition = { source: "NBC", url: "https://nbc.example.test/", extractor: headingExtractor("NBC") };
    const fetcher: Fetcher = {
      fetch: async (url) => {
        events.push(`fetch ${url}`);
        return url === fox.url ? page(A, B) : page(C);
      }
    };
    const sleep = vi.fn(async (ms: number) => {
      events.push(`sleep ${ms}`);
    });

    const collected = await collectHeadlines({
      definitions: [fox, nbc],
      fetcher,
      expander: null,
      cooldownMs: 2000,
      sleep
    });

    expect(collected).toEqual([
      { source: "FoxNews", headlines: [A, B] },
      { source: "NBC", headlines: [C] }
    ]);
    expect(events).toEqual(["fetch https://fox.example.test/", "sleep 2000", "fetch https://nbc.example.test/"]);
  });
});

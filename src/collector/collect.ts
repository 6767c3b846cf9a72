import { dedupeBy, type CanonicalKey } from "../shared/canonical.js";
import type { Source } from "../shared/record.js";
import type { PageExpander } from "./browser.js";
import { sleep as defaultSleep, type Fetcher } from "./fetcher.js";
import type { PaginationSettings, SourceDefinition } from "./sources.js";

export type CollectedSource = {
  source: Source;
  headlines: string[];
};

export type CollectOptions = {
  definitions: SourceDefinition[];
  fetcher: Fetcher;
  expander: PageExpander | null;
  cooldownMs: number;
  sleep?: (ms: number) => Promise<void>;
};

const describeError = (error: unknown) => (error instanceof Error ? error.message : String(error));

export const extractSinglePage = async (definition: SourceDefinition, fetcher: Fetcher): Promise<string[]> => {
  const html = await fetcher.fetch(definition.url);
  if (html === null) return [];
  return definition.extractor.parse(html);
};

export const extractPaginated = async (
  definition: SourceDefinition,
  expander: PageExpander,
  pagination: PaginationSettings
): Promise<string[]> => {
  const session = await expander.open(definition.url);
  try {
    const seen = new Set<CanonicalKey>();
    const headlines = dedupeBy(definition.extractor.parse(await session.content()), (text) => text, seen);

    for (let expansion = 1; expansion <= pagination.maxExpansions; expansion += 1) {
      let fresh: string[];
      try {
        if (!(await session.loadMore(pagination.loadMoreSelector, pagination.settleMs))) break;
        fresh = dedupeBy(definition.extractor.parse(await session.content()), (text) => text, seen);
      } catch (error) {
        // Keep what the earlier pages gave.
        console.warn(`Load-more ${expansion} failed for ${definition.source}: ${describeError(error)}`);
        break;
      }
      if (fresh.length === 0) break;
      console.log(`  Load-more ${expansion}: +${fresh.length} headlines from ${definition.source}`);
      headlines.push(...fresh);
    }
    return headlines;
  } finally {
    await session.close();
  }
};

export const extractSource = async (
  definition: SourceDefinition,
  fetcher: Fetcher,
  expander: PageExpander | null
): Promise<string[]> => {
  if (definition.pagination && expander) {
    try {
      return await extractPaginated(definition, expander, definition.pagination);
    } catch (error) {
      console.warn(
        `Pagination failed for ${definition.source}, using a single page instead: ${describeError(error)}`
      );
    }
  }
  return extractSinglePage(definition, fetcher);
};

export const collectHeadlines = async (options: CollectOptions): Promise<CollectedSource[]> => {
  const wait = options.sleep ?? defaultSleep;
  const collected: CollectedSource[] = [];

  for (const [index, definition] of options.definitions.entries()) {
    if (index > 0) {
      await wait(options.cooldownMs);
    }
    console.log(`[${index + 1}/${options.definitions.length}] Scraping ${definition.source} (${definition.url})`);
    const headlines = await extractSource(definition, options.fetcher, options.expander);
    console.log(`  ${headlines.length} unique headlines from ${definition.source}`);
    collected.push({ source: definition.source, headlines });
  }
  return collected;
};

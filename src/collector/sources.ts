import type { Source } from "../shared/record.js";
import {
  DEFAULT_LENGTH_BOUNDS,
  createRuleExtractor,
  type SelectionRule,
  type SourceExtractor
} from "./extract.js";
import type { Exclusions } from "./exclusions.js";

export type PaginationSettings = {
  loadMoreSelector: string;
  maxExpansions: number;
  settleMs: number;
};

export type SourceDefinition = {
  source: Source;
  url: string;
  extractor: SourceExtractor;
  pagination?: PaginationSettings;
};

// Every region puts the headline in <h3 class="title"><a>...</a></h3>.
export const FOX_RULES: SelectionRule[] = [
  { name: "featured-story", scope: "article.story-1", headings: ["h3.title"], text: "link" },
  { name: "top-thumbs", scope: "div.thumbs-2-7 article", headings: ["h3.title"], text: "link" },
  {
    name: "secondary-sidebar",
    scope: "div.region-content-sidebar-secondary article",
    headings: ["h3.title"],
    text: "link"
  },
  {
    name: "topic-collections",
    scope: "section.collection.collection-section article",
    headings: ["h3.title"],
    text: "link"
  },
  { name: "info-headers", scope: "header.info-header", headings: ["h3.title"], text: "link" }
];

const NBC_HEADINGS = ["h2", "h3", "h4"];

// Class names are CSS-module hashes such as styles_featuredStory__x1, hence the `i` flags.
export const NBC_RULES: SelectionRule[] = [
  { name: "article-headings", scope: "article", headings: NBC_HEADINGS, text: "link-or-heading" },
  {
    name: "headingless-articles",
    scope: "article",
    unless: NBC_HEADINGS.join(", "),
    links: "a[href]",
    text: "link",
    href: { hosts: ["nbcnews.com"], excludePaths: [] }
  },
  {
    name: "teases",
    scope: "div[class*='tease' i], div[class*='card' i]",
    headings: NBC_HEADINGS,
    text: "link-or-heading"
  },
  {
    name: "story-blocks",
    scope: "div[class*='story' i], section[class*='story' i]",
    headings: NBC_HEADINGS,
    text: "link-or-heading"
  },
  {
    name: "article-links",
    scope: "a[href]",
    text: "link",
    href: {
      hosts: ["nbcnews.com"],
      excludePaths: ["/video/", "/live/", "/podcast/", "/newsletter", "/subscribe", "/account", "/login"]
    }
  }
];

export const FOX_LOAD_MORE_SELECTOR = "div.button.load-more a, button.load-more";

export type SourceUrls = Record<Source, string>;

export const buildSourceDefinitions = (
  urls: SourceUrls,
  exclusions: Exclusions,
  maxLoadMore: number
): SourceDefinition[] => {
  const policyFor = (source: Source) => ({
    ...DEFAULT_LENGTH_BOUNDS,
    excludeKeywords: exclusions.keywords[source],
    photoCreditPatterns: exclusions.photoCreditPatterns
  });

  return [
    {
      source: "FoxNews",
      url: urls.FoxNews,
      extractor: createRuleExtractor("FoxNews", FOX_RULES, policyFor("FoxNews")),
      pagination: {
        loadMoreSelector: FOX_LOAD_MORE_SELECTOR,
        maxExpansions: maxLoadMore,
        settleMs: 1500
      }
    },
    {
      source: "NBC",
      url: urls.NBC,
      extractor: createRuleExtractor("NBC", NBC_RULES, policyFor("NBC"))
    }
  ];
};

import * as cheerio from "cheerio";
import { dedupeBy } from "../shared/canonical.js";
import type { Source } from "../shared/record.js";

export type HrefFilter = {
  /** Hostnames (suffix match) a link may point at. Relative links are always internal. */
  hosts: string[];
  /** Path fragments that disqualify a link, compared case-insensitively. */
  excludePaths: string[];
};

/**
 * One region of markup believed to hold headlines. Each element matched by `scope`
 * contributes at most one headline: the first of its alternatives that passes validation.
 */
export type SelectionRule = {
  name: string;
  scope: string;
  /** Alternatives in order, the first match of each selector. Omitted: the scope element itself. */
  headings?: string[];
  /** Alternatives in order, every match of this selector inside the scope. */
  links?: string;
  /** Scope elements containing a match of this selector are skipped. */
  unless?: string;
  /**
   * "link": only the text of an anchor inside the heading counts.
   * "link-or-heading": anchor text when there is one, otherwise the heading text.
   */
  text: "link" | "link-or-heading";
  href?: HrefFilter;
};

export type ValidityPolicy = {
  minLength: number;
  maxLength: number;
  excludeKeywords: string[];
  photoCreditPatterns: string[];
};

export type SourceExtractor = {
  source: Source;
  parse: (html: string) => string[];
};

export const DEFAULT_LENGTH_BOUNDS = { minLength: 15, maxLength: 200 };

export const cleanText = (raw: string) => raw.replace(/\s+/g, " ").trim();

export const isValidHeadline = (text: string, policy: ValidityPolicy): boolean => {
  const cleaned = cleanText(text);
  if (cleaned.length < policy.minLength || cleaned.length > policy.maxLength) return false;
  if (!cleaned.includes(" ")) return false;
  const lower = cleaned.toLowerCase();
  if (policy.excludeKeywords.some((keyword) => lower.includes(keyword.toLowerCase()))) return false;
  if (policy.photoCreditPatterns.some((pattern) => lower.includes(pattern.toLowerCase()))) return false;
  return true;
};

export const isAllowedHref = (href: string | undefined, filter: HrefFilter): boolean => {
  if (!href) return false;
  const lower = href.toLowerCase();
  if (filter.excludePaths.some((fragment) => lower.includes(fragment.toLowerCase()))) return false;
  if (href.startsWith("/") && !href.startsWith("//")) return true;
  try {
    const url = new URL(href.startsWith("//") ? `https:${href}` : href);
    return filter.hosts.some((host) => url.hostname === host || url.hostname.endsWith(`.${host}`));
  } catch {
    return false;
  }
};

/** One list of alternative texts per matched scope element, in document and rule order. */
export const collectCandidates = (html: string, rules: SelectionRule[]): string[][] => {
  const $ = cheerio.load(html);
  const groups: string[][] = [];

  for (const rule of rules) {
    $(rule.scope).each((_, element) => {
      const scope = $(element);
      if (rule.unless && scope.find(rule.unless).length > 0) return;

      const textOf = (target: typeof scope): string | null => {
        const link = target.is("a") ? target : target.find("a").first();
        if (link.length > 0) {
          if (rule.href && !isAllowedHref(link.attr("href"), rule.href)) return null;
          return cleanText(link.text());
        }
        return rule.text === "link" ? null : cleanText(target.text());
      };

      const targets = rule.headings
        ? rule.headings.map((selector) => scope.find(selector).first()).filter((found) => found.length > 0)
        : rule.links
          ? scope
              .find(rule.links)
              .toArray()
              .map((link) => $(link))
          : [scope];
      const alternatives = targets.map((target) => textOf(target)).filter((text): text is string => Boolean(text));
      if (alternatives.length > 0) groups.push(alternatives);
    });
  }
  return groups;
};

export const createRuleExtractor = (
  source: Source,
  rules: SelectionRule[],
  policy: ValidityPolicy
): SourceExtractor => ({
  source,
  parse: (html) => {
    const valid = collectCandidates(html, rules).flatMap((alternatives) => {
      const first = alternatives.find((text) => isValidHeadline(text, policy));
      return first === undefined ? [] : [first];
    });
    return dedupeBy(valid, (text) => text);
  }
});

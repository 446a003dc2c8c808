import * as cheerio from "cheerio";
import { SINA } from "./config";
import type { NewsArticle } from "../types/news";

const DATE_PATTERN = /\d{4}-\d{2}-\d{2}/;

/**
 * Root-relative hrefs are joined to `origin`, http(s) URLs pass through,
 * anything else (relative, protocol-relative, javascript:) yields null.
 */
export function resolveHref(href: string | undefined, origin: string): string | null {
  if (!href) return null;
  if (href.startsWith("//")) return null;
  if (href.startsWith("/")) return origin + href;
  if (/^https?:\/\//.test(href)) return href;
  return null;
}

export function findDate(text: string): string | null {
  const match = DATE_PATTERN.exec(text);
  return match ? match[0] : null;
}

/**
 * Collects up to `limit` articles from the listing's datelist anchors,
 * in document order. Skipped anchors do not count toward the limit.
 */
export function extractArticles(
  html: string,
  opts: { origin: string; limit: number }
): NewsArticle[] {
  const $ = cheerio.load(html);
  const articles: NewsArticle[] = [];

  for (const anchor of $(SINA.anchorSelector).toArray()) {
    if (articles.length >= opts.limit) break;
    const $anchor = $(anchor);

    const url = resolveHref($anchor.attr("href"), opts.origin);
    if (url === null) continue;

    articles.push({
      // empty titles are kept as ""
      title: $anchor.text().trim(),
      url,
      date: findDate($anchor.parent().text()),
    });
  }

  return articles;
}

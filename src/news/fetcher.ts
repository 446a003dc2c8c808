import { TextDecoder } from "util";
import { SINA } from "./config";
import { extractArticles } from "./parse";
import { parseNewsQuery, type RawNewsQuery } from "./query";
import { axiosTransport, type PageTransport } from "./transport";
import { ENV, type Env } from "../lib/env";
import { getLogger } from "../lib/logger";
import {
  fail,
  ok,
  type NewsArticle,
  type NewsQuery,
  type NewsResult,
  type Result,
  type StockSymbol,
} from "../types/news";

const log = getLogger("news-fetcher");

export type NewsFetcherConfig = {
  /** Listing page URL; `{symbol}` is replaced per request. */
  listingUrl: string;
  /** Prefix for root-relative article links. */
  origin: string;
  timeoutMs: number;
  /** Forced body encoding; the page's own charset declaration is ignored. */
  encoding: string;
  headers: Record<string, string>;
  transport: PageTransport;
};

function causeOf(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

/**
 * Looks up a stock's news on the Sina listing page.
 * Holds no per-request state.
 */
export class NewsFetcher {
  private readonly decoder: TextDecoder;
  private readonly origin: string;

  constructor(private readonly config: NewsFetcherConfig) {
    // RangeError here for an unknown encoding label
    this.decoder = new TextDecoder(config.encoding, { fatal: false });
    this.origin = config.origin.replace(/\/+$/, "");
  }

  buildUrl(symbol: StockSymbol): string {
    return this.config.listingUrl.replace("{symbol}", encodeURIComponent(symbol));
  }

  /** Validates raw input, then fetches. Nothing is requested for invalid input. */
  async lookup(input: RawNewsQuery): Promise<Result<NewsResult>> {
    const query = parseNewsQuery(input);
    if (!query.ok) return query;
    return this.fetch(query.data);
  }

  async fetch({ symbol, limit }: NewsQuery): Promise<Result<NewsResult>> {
    const url = this.buildUrl(symbol);
    log.debug({ symbol, limit, url }, "fetching news listing");

    let body: Buffer;
    try {
      body = await this.config.transport.get(url, {
        headers: this.config.headers,
        timeoutMs: this.config.timeoutMs,
      });
    } catch (e) {
      const cause = causeOf(e);
      log.warn({ symbol, url, cause }, "news listing request failed");
      return fail({ kind: "FetchError", message: `Request failed: ${cause}`, cause });
    }

    let articles: NewsArticle[];
    try {
      const html = this.decoder.decode(body);
      articles = extractArticles(html, { origin: this.origin, limit });
    } catch (e) {
      const cause = causeOf(e);
      log.error({ symbol, cause }, "failed to parse news listing");
      return fail({ kind: "ParseError", message: `Failed to parse news: ${cause}`, cause });
    }

    if (articles.length === 0) {
      return fail({ kind: "NotFound", message: `No news found for stock symbol ${symbol}` });
    }

    log.info({ symbol, count: articles.length }, "news extracted");
    return ok({ symbol, count: articles.length, articles });
  }
}

export function createNewsFetcher(
  env: Env = ENV,
  transport: PageTransport = axiosTransport
): NewsFetcher {
  return new NewsFetcher({
    listingUrl: env.SINA_NEWS_URL,
    origin: env.SINA_ORIGIN,
    timeoutMs: env.NEWS_TIMEOUT_MS,
    encoding: env.NEWS_ENCODING,
    headers: SINA.headers,
    transport,
  });
}

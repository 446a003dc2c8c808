import { NextFunction, Router, Request, Response } from "express";
import { getLogger } from "../lib/logger";
import type { NewsFetcher } from "../news/fetcher";
import { readRawQuery, type RawNewsQuery } from "../news/query";
import type { NewsErrorKind } from "../types/news";
import type { ErrorResponse, NewsResponse } from "../types/api";

const log = getLogger("news-route");

const STATUS_BY_KIND: Record<NewsErrorKind, number> = {
  InvalidSymbol: 400,
  InvalidLimit: 400,
  NotFound: 404,
  FetchError: 500,
  ParseError: 500,
};

/**
 * GET /news?symbol=sh600000&limit=5
 * POST /news  { "symbol": "sh600000", "limit": 5 }
 */
export function newsRouter(fetcher: NewsFetcher) {
  const router = Router();

  async function respond(input: RawNewsQuery, req: Request, res: Response) {
    const result = await fetcher.lookup(input);
    if (!result.ok) {
      const status = STATUS_BY_KIND[result.error.kind];
      const logFields = { path: req.path, kind: result.error.kind, cause: result.error.cause };
      if (status >= 500) log.error(logFields, result.error.message);
      else log.warn(logFields, result.error.message);

      const body: ErrorResponse = { error: result.error.kind, message: result.error.message };
      return res.status(status).json(body);
    }

    const { symbol, count, articles } = result.data;
    const payload: NewsResponse = { symbol, news_count: count, articles };
    return res.json(payload);
  }

  router.get("/news", (req: Request, res: Response, next: NextFunction) => {
    respond({ symbol: req.query.symbol, limit: req.query.limit }, req, res).catch(next);
  });

  router.post("/news", (req: Request, res: Response, next: NextFunction) => {
    respond(readRawQuery(req.body), req, res).catch(next);
  });

  return router;
}

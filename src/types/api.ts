import type { NewsArticle, NewsErrorKind } from "./news";

export type NewsResponse = {
  symbol: string;
  news_count: number;
  articles: NewsArticle[];
};

export type ErrorResponse = {
  error: NewsErrorKind | "BadRequest" | "NotFound" | "InternalError";
  message: string;
};

export type HealthResponse = {
  status: "ok";
  timestamp: string; // ISO
};

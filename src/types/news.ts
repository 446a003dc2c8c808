/** Market-prefixed ticker, e.g. "sh600000". Only `validateSymbol` produces one. */
export type StockSymbol = string & { readonly __brand: "StockSymbol" };

export type NewsQuery = {
  symbol: StockSymbol;
  limit: number; // 1..20
};

export type NewsArticle = {
  title: string;
  url: string; // absolute http(s)
  date: string | null; // YYYY-MM-DD
};

export type NewsResult = {
  symbol: StockSymbol;
  count: number; // always articles.length
  articles: NewsArticle[];
};

export type NewsErrorKind =
  | "InvalidSymbol"
  | "InvalidLimit"
  | "FetchError"
  | "ParseError"
  | "NotFound";

export type NewsError = {
  kind: NewsErrorKind;
  message: string;
  cause?: string;
};

/**
 * Outcome of every core news operation. These functions do not throw.
 */
export type Result<TData, TError = NewsError> =
  | { ok: true; data: TData }
  | { ok: false; error: TError };

export function ok<TData>(data: TData): Result<TData, never> {
  return { ok: true, data };
}

export function fail<TError>(error: TError): Result<never, TError> {
  return { ok: false, error };
}

import { z } from "zod";
import { LIMITS } from "./config";
import { validateSymbol } from "./symbol";
import { fail, ok, type NewsQuery, type Result } from "../types/news";

// Query strings arrive as text and JSON bodies may send null; both fall back to the default.
// Only numbers and digit strings are read as a limit.
const LimitSchema = z.preprocess(
  (v) => (v === null || v === "" ? undefined : v),
  z
    .union([z.number(), z.string().regex(/^\d+$/)])
    .pipe(z.coerce.number().int().min(LIMITS.min).max(LIMITS.max))
    .default(LIMITS.default)
);

export type RawNewsQuery = {
  symbol?: unknown;
  limit?: unknown;
};

export function parseNewsQuery(input: RawNewsQuery): Result<NewsQuery> {
  const symbol = validateSymbol(input.symbol);
  if (!symbol.ok) return symbol;

  const limit = LimitSchema.safeParse(input.limit);
  if (!limit.success) {
    return fail({
      kind: "InvalidLimit",
      message: `limit must be an integer between ${LIMITS.min} and ${LIMITS.max}`,
    });
  }

  return ok({ symbol: symbol.data, limit: limit.data });
}

const RawBodySchema = z.object({ symbol: z.unknown(), limit: z.unknown() });

/** Reads `{symbol, limit}` off a JSON body; non-object bodies read as empty. */
export function readRawQuery(body: unknown): RawNewsQuery {
  const parsed = RawBodySchema.safeParse(body);
  return parsed.success ? parsed.data : {};
}

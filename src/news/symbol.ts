import { fail, ok, type Result, type StockSymbol } from "../types/news";

const SYMBOL_PATTERN = /^(sh|sz)\d{6}$/;

function isStockSymbol(value: string): value is StockSymbol {
  return SYMBOL_PATTERN.test(value);
}

/** Trims and lowercases, then checks for sh/sz + 6 digits. */
export function validateSymbol(raw: unknown): Result<StockSymbol> {
  if (typeof raw !== "string") {
    return fail({
      kind: "InvalidSymbol",
      message: "Missing stock symbol. Use sh600000 (Shanghai) or sz000001 (Shenzhen).",
    });
  }
  const normalized = raw.trim().toLowerCase();
  if (!isStockSymbol(normalized)) {
    return fail({
      kind: "InvalidSymbol",
      message: `Invalid stock symbol "${raw}". Use sh600000 (Shanghai) or sz000001 (Shenzhen).`,
    });
  }
  return ok(normalized);
}

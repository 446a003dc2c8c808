import { loadEnv } from "../env";

describe("loadEnv", () => {
  it("fills defaults for an empty environment", () => {
    expect(loadEnv({})).toEqual({
      NODE_ENV: "development",
      PORT: 8000,
      HOST: "0.0.0.0",
      SINA_ORIGIN: "https://vip.stock.finance.sina.com.cn",
      SINA_NEWS_URL:
        "https://vip.stock.finance.sina.com.cn/corp/view/vCB_AllNewsStock.php?symbol={symbol}&Page=1",
      NEWS_TIMEOUT_MS: 10000,
      NEWS_ENCODING: "gbk",
    });
  });

  it("parses numeric variables", () => {
    const env = loadEnv({ PORT: "3001", NEWS_TIMEOUT_MS: "2500" });
    expect(env.PORT).toBe(3001);
    expect(env.NEWS_TIMEOUT_MS).toBe(2500);
  });

  it("rejects a non-numeric timeout", () => {
    expect(() => loadEnv({ NEWS_TIMEOUT_MS: "soon" })).toThrow(/NEWS_TIMEOUT_MS/);
  });

  it("requires the {symbol} placeholder in the listing url", () => {
    expect(() => loadEnv({ SINA_NEWS_URL: "https://news.test/list" })).toThrow(/SINA_NEWS_URL/);
  });
});

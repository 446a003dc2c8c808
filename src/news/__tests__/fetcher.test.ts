import * as parse from "../parse";
import { createNewsFetcher } from "../fetcher";
import type { PageRequestOptions } from "../transport";
import { loadEnv } from "../../lib/env";
import { dailyItems, listingPage } from "./fixtures/listing";

const env = loadEnv({ NODE_ENV: "test" });

function fakeTransport(respond: () => Promise<Buffer>) {
  const get = jest.fn((_url: string, _opts: PageRequestOptions) => respond());
  return { get };
}

function servePage(html: string | Buffer) {
  return fakeTransport(async () => (typeof html === "string" ? Buffer.from(html) : html));
}

describe("NewsFetcher", () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it("returns the first articles for a normalized symbol", async () => {
    const transport = servePage(listingPage(dailyItems(5)));
    const fetcher = createNewsFetcher(env, transport);

    const res = await fetcher.lookup({ symbol: "SH600000", limit: 2 });

    expect(res).toEqual({
      ok: true,
      data: {
        symbol: "sh600000",
        count: 2,
        articles: [
          {
            title: "Title 1",
            url: "https://vip.stock.finance.sina.com.cn/finance/x/1.shtml",
            date: "2024-01-01",
          },
          {
            title: "Title 2",
            url: "https://vip.stock.finance.sina.com.cn/finance/x/2.shtml",
            date: "2024-01-02",
          },
        ],
      },
    });
  });

  it("requests page 1 of the listing with browser headers", async () => {
    const transport = servePage(listingPage(dailyItems(1)));
    const fetcher = createNewsFetcher(env, transport);

    await fetcher.lookup({ symbol: "sz000001" });

    expect(transport.get).toHaveBeenCalledTimes(1);
    const [url, opts] = transport.get.mock.calls[0];
    expect(url).toBe(
      "https://vip.stock.finance.sina.com.cn/corp/view/vCB_AllNewsStock.php?symbol=sz000001&Page=1"
    );
    expect(opts.timeoutMs).toBe(10_000);
    expect(opts.headers["User-Agent"]).toMatch(/^Mozilla\/5\.0 /);
    expect(opts.headers["Accept"]).toBe(
      "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8"
    );
    expect(opts.headers["Accept-Language"]).toBe("zh-CN,zh;q=0.9,en;q=0.8");
  });

  it("keeps count equal to the number of articles", async () => {
    const fetcher = createNewsFetcher(env, servePage(listingPage(dailyItems(3))));
    const res = await fetcher.lookup({ symbol: "sh600000", limit: 20 });
    expect(res.ok).toBe(true);
    if (!res.ok) return;
    expect(res.data.count).toBe(3);
    expect(res.data.articles).toHaveLength(3);
  });

  it.each([
    [{ symbol: "sh60000" }, "InvalidSymbol"],
    [{ symbol: "sh600000", limit: 50 }, "InvalidLimit"],
  ])("does not touch the network for %j", async (input, kind) => {
    const transport = servePage(listingPage(dailyItems(1)));
    const fetcher = createNewsFetcher(env, transport);

    const res = await fetcher.lookup(input);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe(kind);
    expect(transport.get).not.toHaveBeenCalled();
  });

  it("maps transport failures to FetchError with the cause", async () => {
    const transport = fakeTransport(async () => {
      throw new Error("timeout of 10000ms exceeded");
    });
    const fetcher = createNewsFetcher(env, transport);

    const res = await fetcher.lookup({ symbol: "sh600000" });

    expect(res).toEqual({
      ok: false,
      error: {
        kind: "FetchError",
        message: "Request failed: timeout of 10000ms exceeded",
        cause: "timeout of 10000ms exceeded",
      },
    });
    expect(transport.get).toHaveBeenCalledTimes(1);
  });

  it("maps parser exceptions to ParseError", async () => {
    jest.spyOn(parse, "extractArticles").mockImplementation(() => {
      throw new Error("unexpected markup");
    });
    const fetcher = createNewsFetcher(env, servePage(listingPage(dailyItems(1))));

    const res = await fetcher.lookup({ symbol: "sh600000" });

    expect(res).toEqual({
      ok: false,
      error: {
        kind: "ParseError",
        message: "Failed to parse news: unexpected markup",
        cause: "unexpected markup",
      },
    });
  });

  it("reports NotFound instead of an empty success", async () => {
    const fetcher = createNewsFetcher(
      env,
      servePage(listingPage([{ href: "javascript:void(0)", title: "Hidden" }]))
    );

    const res = await fetcher.lookup({ symbol: "sz000002" });

    expect(res).toEqual({
      ok: false,
      error: { kind: "NotFound", message: "No news found for stock symbol sz000002" },
    });
  });

  it("reports NotFound when the page has no datelist", async () => {
    const fetcher = createNewsFetcher(env, servePage("<html><body><p>维护中</p></body></html>"));
    const res = await fetcher.lookup({ symbol: "sh600000" });
    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.error.kind).toBe("NotFound");
  });

  describe("decoding", () => {
    const ascii = (s: string) => Buffer.from(s, "latin1");
    const gbkPage = (title: Buffer) =>
      Buffer.concat([
        ascii('<div class="datelist"><ul><li>2024-06-01 <a href="/n/1.shtml">'),
        title,
        ascii("</a></li></ul></div>"),
      ]);

    it("decodes the body as GBK", async () => {
      // 新闻 in GBK
      const page = gbkPage(Buffer.from([0xd0, 0xc2, 0xce, 0xc5]));
      const fetcher = createNewsFetcher(env, servePage(page));

      const res = await fetcher.lookup({ symbol: "sh600000" });

      expect(res.ok && res.data.articles[0].title).toBe("新闻");
    });

    it("substitutes invalid byte sequences instead of failing", async () => {
      const page = gbkPage(Buffer.concat([ascii("A"), Buffer.from([0xff]), ascii(" B")]));
      const fetcher = createNewsFetcher(env, servePage(page));

      const res = await fetcher.lookup({ symbol: "sh600000" });

      expect(res.ok).toBe(true);
      if (!res.ok) return;
      expect(res.data.articles[0].title).toMatch(/^A.+B$/);
      expect(res.data.articles[0].date).toBe("2024-06-01");
    });

    it("honours a configured encoding", async () => {
      const page = listingPage([{ href: "/n/2.shtml", title: "新闻", date: "2024-06-02" }]);
      const fetcher = createNewsFetcher({ ...env, NEWS_ENCODING: "utf-8" }, servePage(page));

      const res = await fetcher.lookup({ symbol: "sh600000" });

      expect(res.ok && res.data.articles[0].title).toBe("新闻");
    });

    it("rejects an unknown encoding label at construction", () => {
      expect(() =>
        createNewsFetcher({ ...env, NEWS_ENCODING: "not-a-charset" }, servePage(""))
      ).toThrow();
    });
  });

  it("joins links to a configured origin without doubling slashes", async () => {
    const fetcher = createNewsFetcher(
      { ...env, SINA_ORIGIN: "https://mirror.test/" },
      servePage(listingPage(dailyItems(1)))
    );
    const res = await fetcher.lookup({ symbol: "sh600000" });
    expect(res.ok && res.data.articles[0].url).toBe("https://mirror.test/finance/x/1.shtml");
  });
});

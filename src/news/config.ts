// Sina rejects or serves a stripped page to non-browser clients.
const BROWSER_HEADERS: Record<string, string> = {
  "User-Agent":
    "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36",
  Accept: "text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8",
  "Accept-Language": "zh-CN,zh;q=0.9,en;q=0.8",
};

export const SINA = {
  headers: BROWSER_HEADERS,
  anchorSelector: "div.datelist a",
};

export const LIMITS = {
  min: 1,
  max: 20,
  default: 5,
};

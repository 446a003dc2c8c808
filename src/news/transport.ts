import axios from "axios";

export type PageRequestOptions = {
  headers: Record<string, string>;
  timeoutMs: number;
};

/**
 * Fetches a page's raw bytes. Rejects on network error, timeout or non-2xx.
 */
export interface PageTransport {
  get(url: string, options: PageRequestOptions): Promise<Buffer>;
}

export const axiosTransport: PageTransport = {
  async get(url, { headers, timeoutMs }) {
    // arraybuffer: the body is decoded by the caller, not by axios
    const { data } = await axios.get<ArrayBuffer>(url, {
      headers,
      timeout: timeoutMs,
      responseType: "arraybuffer",
    });
    return Buffer.from(data);
  },
};

import * as cheerio from "cheerio";
import type { WebsiteFetcher } from "./WebsiteFetcher.js";
import { withScheme } from "../domain/normalize.js";
import { NonRetriableCapabilityError, ServiceUnavailableError, classifyHttpFailure } from "../resilience/errors.js";

export type HttpFetcherOptions = {
  timeoutMs: number;
  userAgent: string;
  // Bytes of body read per page; the rest is discarded.
  maxBytes?: number;
};

const DEFAULT_MAX_BYTES = 2 * 1024 * 1024;

async function readCapped(res: Response, maxBytes: number): Promise<string> {
  if (!res.body) return "";
  const reader = res.body.getReader();
  const chunks: Uint8Array[] = [];
  let size = 0;
  while (size < maxBytes) {
    const { done, value } = await reader.read();
    if (done) break;
    chunks.push(value);
    size += value.byteLength;
  }
  await reader.cancel();
  return new TextDecoder().decode(Buffer.concat(chunks).subarray(0, maxBytes));
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html || "");
  $("script, style, noscript, svg").remove();
  const title = $("title").first().text().trim();
  const body = $("body").text().replace(/\s+/g, " ").trim();
  return [title, body].filter(Boolean).join("\n");
}

export class HttpWebsiteFetcher implements WebsiteFetcher {
  constructor(private readonly opts: HttpFetcherOptions) {}

  hasCredentials(): boolean {
    return true;
  }

  async fetch(url: string): Promise<string> {
    const target = withScheme(url);
    const ctrl = new AbortController();
    const t = setTimeout(() => ctrl.abort(), this.opts.timeoutMs);

    try {
      let res: Response;
      try {
        res = await fetch(target, {
          method: "GET",
          redirect: "follow",
          headers: {
            "User-Agent": this.opts.userAgent,
            "Accept": "text/html,application/xhtml+xml,*/*"
          },
          signal: ctrl.signal
        });
      } catch (err) {
        // DNS failures, resets and our own abort all land here.
        throw new ServiceUnavailableError(`fetch ${target} failed: ${String(err)}`, { cause: err });
      }

      if (!res.ok) {
        await res.body?.cancel();
        throw classifyHttpFailure(`fetch ${target}`, res.status, res.statusText);
      }

      const ct = (res.headers.get("content-type") || "").toLowerCase();
      const isHtml =
        !ct ||
        ct.includes("text/html") ||
        ct.includes("application/xhtml+xml") ||
        ct.startsWith("text/");
      if (!isHtml) {
        await res.body?.cancel();
        throw new NonRetriableCapabilityError(`fetch ${target}: not a web page (${ct})`);
      }

      return htmlToText(await readCapped(res, this.opts.maxBytes ?? DEFAULT_MAX_BYTES));
    } finally {
      clearTimeout(t);
    }
  }
}

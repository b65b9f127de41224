import type { SerpProvider, SerpOrganicResult } from "./SerpProvider.js";
import { classifyHttpFailure, ServiceUnavailableError } from "../resilience/errors.js";
import { sleep } from "../resilience/retry.js";

type SerpApiResponse = {
  organic_results?: Array<{ link?: string; title?: string; snippet?: string }>;
  error?: string;
};

export type SerpApiOptions = {
  apiKey: string;
  minDelayMs?: number;
  maxResults?: number;
};

export class SerpApiProvider implements SerpProvider {
  private queue: Promise<unknown> = Promise.resolve();
  private lastRequestAt = 0;

  constructor(private readonly opts: SerpApiOptions) {}

  hasCredentials(): boolean {
    return Boolean(this.opts.apiKey);
  }

  // Requests are serialized per instance so the min-delay throttle holds.
  private enqueue<T>(fn: () => Promise<T>): Promise<T> {
    const next = this.queue.then(fn, fn);
    this.queue = next.then(
      () => undefined,
      () => undefined
    );
    return next;
  }

  async search(query: string): Promise<SerpOrganicResult[]> {
    return this.enqueue(async () => {
      const minDelay = Math.max(0, this.opts.minDelayMs || 0);
      if (minDelay) {
        const waitMs = Math.max(0, this.lastRequestAt + minDelay - Date.now());
        if (waitMs) await sleep(waitMs);
      }

      const url = new URL("https://serpapi.com/search");
      url.searchParams.set("engine", "google");
      url.searchParams.set("q", query);
      url.searchParams.set("api_key", this.opts.apiKey);

      let res: Response;
      try {
        res = await fetch(url.toString(), { method: "GET" });
      } catch (err) {
        throw new ServiceUnavailableError(`SerpApi request failed: ${String(err)}`, { cause: err });
      } finally {
        this.lastRequestAt = Date.now();
      }

      if (!res.ok) throw classifyHttpFailure("SerpApi", res.status, await res.text());

      let json: SerpApiResponse;
      try {
        json = (await res.json()) as SerpApiResponse;
      } catch (err) {
        throw new ServiceUnavailableError(`SerpApi returned a body that is not JSON: ${String(err)}`, { cause: err });
      }
      // SerpApi reports "no results" as an error string on a 200.
      if (json.error && !/hasn't returned any results/i.test(json.error)) {
        throw classifyHttpFailure("SerpApi", 400, json.error);
      }
      const organic = json.organic_results || [];
      return organic
        .filter((r) => Boolean(r.link))
        .slice(0, this.opts.maxResults ?? 5)
        .map((r) => ({ link: r.link || "", title: r.title || "", snippet: r.snippet || "" }));
    });
  }
}

import { afterEach, describe, expect, it, vi } from "vitest";
import { HttpWebsiteFetcher, htmlToText } from "../src/crawl/fetch.js";
import { SerpApiProvider } from "../src/serp/SerpApiProvider.js";
import {
  NonRetriableCapabilityError,
  RateLimitedError,
  ServiceUnavailableError
} from "../src/resilience/errors.js";

function respond(body: string, init: ResponseInit = {}) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => new Response(body, init));
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("htmlToText", () => {
  it("keeps the title and visible body text", () => {
    const html =
      "<html><head><title>Acme</title><script>track()</script></head>" +
      "<body><h1>Acme Bakery</h1>\n<p>Fresh   bread</p><style>p{}</style></body></html>";

    expect(htmlToText(html)).toBe("Acme\nAcme Bakery Fresh bread");
  });
});

describe("HttpWebsiteFetcher", () => {
  const fetcher = new HttpWebsiteFetcher({ timeoutMs: 1000, userAgent: "test-agent" });

  it("returns page text and adds a missing scheme", async () => {
    const fetchMock = respond("<title>Acme</title><p>Open daily</p>", { headers: { "content-type": "text/html" } });

    expect(await fetcher.fetch("acme.example")).toBe("Acme\nOpen daily");
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://acme.example");
  });

  it("reads no more than maxBytes of a page", async () => {
    respond("<p>" + "a".repeat(100), { headers: { "content-type": "text/html" } });
    const capped = new HttpWebsiteFetcher({ timeoutMs: 1000, userAgent: "test-agent", maxBytes: 20 });

    expect(await capped.fetch("https://acme.example")).toBe("a".repeat(17));
  });

  it("releases the body of a failed response", async () => {
    const res = new Response("gateway error page", { status: 502 });
    vi.stubGlobal("fetch", vi.fn(async () => res));

    await expect(fetcher.fetch("https://acme.example")).rejects.toBeInstanceOf(ServiceUnavailableError);
    expect(res.bodyUsed).toBe(true);
  });

  it("classifies failures", async () => {
    respond("down", { status: 503 });
    await expect(fetcher.fetch("https://acme.example")).rejects.toBeInstanceOf(ServiceUnavailableError);

    respond("missing", { status: 404 });
    await expect(fetcher.fetch("https://acme.example")).rejects.toBeInstanceOf(NonRetriableCapabilityError);

    respond("%PDF", { headers: { "content-type": "application/pdf" } });
    await expect(fetcher.fetch("https://acme.example/menu.pdf")).rejects.toThrow("not a web page (application/pdf)");

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new TypeError("getaddrinfo ENOTFOUND");
      })
    );
    await expect(fetcher.fetch("https://nowhere.example")).rejects.toBeInstanceOf(ServiceUnavailableError);
  });
});

describe("SerpApiProvider", () => {
  const provider = new SerpApiProvider({ apiKey: "test-secret", maxResults: 2 });

  it("maps organic results", async () => {
    const fetchMock = respond(
      JSON.stringify({
        organic_results: [
          { link: "https://acme.example", title: "Acme", snippet: "Bakery" },
          { title: "no link" },
          { link: "https://yelp.com/acme", title: "Acme on Yelp" },
          { link: "https://third.example" }
        ]
      })
    );

    expect(await provider.search("Acme Bakery")).toEqual([
      { link: "https://acme.example", title: "Acme", snippet: "Bakery" },
      { link: "https://yelp.com/acme", title: "Acme on Yelp", snippet: "" }
    ]);
    const url = new URL(String(fetchMock.mock.calls[0]?.[0]));
    expect(url.searchParams.get("q")).toBe("Acme Bakery");
    expect(url.searchParams.get("api_key")).toBe("test-secret");
  });

  it("treats a no-results error as an empty list", async () => {
    respond(JSON.stringify({ error: "Google hasn't returned any results for this query." }));

    expect(await provider.search("zzzz")).toEqual([]);
  });

  it("classifies errors", async () => {
    respond("slow down", { status: 429 });
    await expect(provider.search("Acme")).rejects.toBeInstanceOf(RateLimitedError);

    respond(JSON.stringify({ error: "Invalid API key." }));
    await expect(provider.search("Acme")).rejects.toThrow("SerpApi 400: Invalid API key.");
  });

  it("classifies a body that is not JSON as a retriable failure", async () => {
    respond("<html>maintenance</html>", { headers: { "content-type": "text/html" } });

    await expect(provider.search("Acme")).rejects.toBeInstanceOf(ServiceUnavailableError);
  });

  it("reports missing credentials", () => {
    expect(new SerpApiProvider({ apiKey: "" }).hasCredentials()).toBe(false);
    expect(provider.hasCredentials()).toBe(true);
  });
});

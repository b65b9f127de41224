import type { Capabilities } from "../domain/capabilities.js";
import type { SerpOrganicResult } from "../serp/SerpProvider.js";
import type { AggregatorRemoval, Extraction, LanguageModel, WebsiteVerification } from "../llm/LanguageModel.js";
import { PAYMENT_AGGREGATORS } from "../domain/blocklists.js";
import { QuotaExceededError, RateLimitedError } from "../resilience/errors.js";

export type MockOptions = {
  // Every Nth language-model call fails once with a rate-limit error.
  rateLimitEvery?: number;
  // Search calls allowed before the quota error kicks in.
  searchDailyLimit?: number;
  // Merchant names containing this marker fail extraction with a non-retriable error.
  failMarker?: string;
};

const PREFIX = new RegExp(`^\\s*(?:${["SQ", "TST", ...PAYMENT_AGGREGATORS].map((a) => a.replace(/\s+/g, "\\s*")).join("|")})\\s*\\*\\s*`, "i");

export function stripKnownPrefix(rawName: string): string {
  return rawName.replace(PREFIX, "").trim();
}

function slug(s: string): string {
  return s
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function titleCase(s: string): string {
  return s.toLowerCase().replace(/\b[a-z]/g, (c) => c.toUpperCase());
}

class MockLanguageModel implements LanguageModel {
  private calls = 0;

  constructor(private readonly opts: MockOptions) {}

  hasCredentials(): boolean {
    return true;
  }

  private tick() {
    this.calls++;
    const every = this.opts.rateLimitEvery ?? 0;
    if (every > 0 && this.calls % every === 0) {
      throw new RateLimitedError(`mock model rate limit (call ${this.calls})`);
    }
  }

  async removeAggregator(rawName: string): Promise<AggregatorRemoval> {
    this.tick();
    const cleaned = stripKnownPrefix(rawName);
    return cleaned === rawName.trim()
      ? { cleaned_name: cleaned, reason: "No aggregator found." }
      : { cleaned_name: cleaned, reason: "Removed payment aggregator prefix." };
  }

  async extract(results: SerpOrganicResult[], originalName: string, query: string): Promise<Extraction> {
    this.tick();
    const marker = this.opts.failMarker ?? "FORCE_FAIL";
    if (originalName.includes(marker)) {
      throw new QuotaExceededError("Forced non-retriable failure for this merchant.");
    }
    return {
      cleaned_name: titleCase(stripKnownPrefix(originalName)),
      website_candidates: results.map((r) => r.link).filter((l) => l.includes("example.com")).slice(0, 1),
      social_candidates: [`https://facebook.com/${slug(query)}`],
      business_status: "Operational",
      summary: `Mock analysis of ${results.length} result(s).`
    };
  }

  async verifyWebsite(pageText: string, merchantName: string): Promise<WebsiteVerification> {
    this.tick();
    return { is_valid: pageText.length > 0, reasoning: `Mock page for ${merchantName} looks operational.` };
  }
}

// Deterministic in-process ports for dry runs; no network, no keys.
export function createMockCapabilities(opts: MockOptions = {}): Capabilities {
  let searches = 0;

  return {
    search: {
      hasCredentials: () => true,
      search: async (query) => {
        const limit = opts.searchDailyLimit ?? Infinity;
        if (searches >= limit) throw new QuotaExceededError(`Mock search daily quota of ${limit} queries exceeded.`);
        searches++;
        return [
          {
            title: `Official Site for ${query}`,
            link: `https://www.example.com/${slug(query)}`,
            snippet: `The official website for all your ${query} needs. Contact us today!`
          }
        ];
      }
    },
    llm: new MockLanguageModel(opts),
    fetcher: {
      hasCredentials: () => true,
      fetch: async (url) => `Welcome to ${url}. Opening hours, menu and contact details.`
    }
  };
}

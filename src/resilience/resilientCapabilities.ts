import type { Capabilities } from "../domain/capabilities.js";
import { withRetry, type RetryDeps, type RetryPolicy } from "./retry.js";

// Every external call goes through withRetry; the wrapped ports keep their interfaces.
export function resilientCapabilities(caps: Capabilities, policy: RetryPolicy, deps: RetryDeps): Capabilities {
  const retry = <T>(label: string, fn: () => Promise<T>) => withRetry(label, fn, policy, deps);
  const { search, llm, fetcher, places } = caps;

  return {
    search: {
      search: (query) => retry(`search "${query}"`, () => search.search(query)),
      hasCredentials: () => search.hasCredentials()
    },
    llm: {
      removeAggregator: (rawName) => retry("remove_aggregator", () => llm.removeAggregator(rawName)),
      extract: (results, originalName, query) => retry("extract", () => llm.extract(results, originalName, query)),
      verifyWebsite: (pageText, merchantName) => retry("verify_website", () => llm.verifyWebsite(pageText, merchantName)),
      hasCredentials: () => llm.hasCredentials()
    },
    fetcher: {
      fetch: (url) => retry(`fetch ${url}`, () => fetcher.fetch(url)),
      hasCredentials: () => fetcher.hasCredentials()
    },
    places: places && {
      findPlace: (query) => retry(`places "${query}"`, () => places.findPlace(query)),
      hasCredentials: () => places.hasCredentials()
    }
  };
}

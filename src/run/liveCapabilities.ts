import type { Capabilities } from "../domain/capabilities.js";
import { env } from "../config/env.js";
import { SerpApiProvider } from "../serp/SerpApiProvider.js";
import { OpenAiLanguageModel } from "../llm/OpenAiLanguageModel.js";
import { HttpWebsiteFetcher } from "../crawl/fetch.js";
import { GooglePlacesProvider } from "../places/GooglePlacesProvider.js";
import type { RetryPolicy } from "../resilience/retry.js";

export function liveCapabilities(modelName: string): Capabilities {
  return {
    search: new SerpApiProvider({ apiKey: env.SERPAPI_API_KEY, minDelayMs: env.SERPAPI_MIN_DELAY_MS }),
    llm: new OpenAiLanguageModel({ apiKey: env.OPENAI_API_KEY, model: modelName }),
    fetcher: new HttpWebsiteFetcher({ timeoutMs: env.FETCH_TIMEOUT_MS, userAgent: env.USER_AGENT }),
    places: new GooglePlacesProvider(env.GOOGLE_PLACES_API_KEY)
  };
}

export function retryPolicyFromEnv(): RetryPolicy {
  return {
    maxRetries: env.RETRY_MAX,
    initialDelayMs: env.RETRY_INITIAL_DELAY_MS,
    backoffFactor: env.RETRY_BACKOFF_FACTOR,
    jitterMs: env.RETRY_JITTER_MS
  };
}

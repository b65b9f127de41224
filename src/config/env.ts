import dotenv from "dotenv";
dotenv.config();

function num(name: string, fallback: string): number {
  const v = parseFloat(process.env[name] || fallback);
  if (Number.isNaN(v)) throw new Error(`Env var ${name} is not a number: ${process.env[name]}`);
  return v;
}

export const env = {
  // Keys are optional here; a job without them fails pre-flight instead of crashing on import.
  SERPAPI_API_KEY: process.env.SERPAPI_API_KEY || "",
  OPENAI_API_KEY: process.env.OPENAI_API_KEY || "",
  // Optional: required only for Enhanced mode.
  GOOGLE_PLACES_API_KEY: process.env.GOOGLE_PLACES_API_KEY || "",

  OPENAI_MODEL: process.env.OPENAI_MODEL || "gpt-4o-mini",
  // Helps avoid SerpApi 429 throttling on low-tier plans.
  SERPAPI_MIN_DELAY_MS: num("SERPAPI_MIN_DELAY_MS", "0"),
  FETCH_TIMEOUT_MS: num("FETCH_TIMEOUT_MS", "15000"),
  USER_AGENT: process.env.USER_AGENT || "MerchantResolverBot/1.0 (+contact@example.com)",

  RETRY_MAX: num("RETRY_MAX", "3"),
  RETRY_INITIAL_DELAY_MS: num("RETRY_INITIAL_DELAY_MS", "2000"),
  RETRY_BACKOFF_FACTOR: num("RETRY_BACKOFF_FACTOR", "2"),
  RETRY_JITTER_MS: num("RETRY_JITTER_MS", "1000"),

  CHECKPOINT_EVERY: num("CHECKPOINT_EVERY", "50"),
  LOG_FILE: process.env.LOG_FILE || ""
};

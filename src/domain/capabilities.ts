import type { SerpProvider } from "../serp/SerpProvider.js";
import type { LanguageModel } from "../llm/LanguageModel.js";
import type { WebsiteFetcher } from "../crawl/WebsiteFetcher.js";
import type { PlacesProvider } from "../places/PlacesProvider.js";
import type { ProcessingMode } from "./types.js";

export type Capabilities = {
  search: SerpProvider;
  llm: LanguageModel;
  fetcher: WebsiteFetcher;
  // Only consulted in Enhanced mode.
  places?: PlacesProvider;
};

export function missingCredentials(caps: Capabilities, mode: ProcessingMode): string[] {
  const missing: string[] = [];
  if (!caps.search.hasCredentials()) missing.push("search");
  if (!caps.llm.hasCredentials()) missing.push("language model");
  if (!caps.fetcher.hasCredentials()) missing.push("website fetch");
  if (mode === "Enhanced" && caps.places && !caps.places.hasCredentials()) missing.push("places lookup");
  return missing;
}

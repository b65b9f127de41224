import { socialPlatform } from "./normalize.js";
import type { SocialPlatform } from "./types.js";

// Earliest platform in `priority` wins; among equals, first seen. Profiles on
// unlisted platforms only win when nothing listed was found.
export function pickBestSocial(candidates: readonly string[], priority: readonly SocialPlatform[]): string | undefined {
  for (const platform of priority) {
    const hit = candidates.find((c) => socialPlatform(c) === platform);
    if (hit) return hit;
  }
  return candidates[0];
}

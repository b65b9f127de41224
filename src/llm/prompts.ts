import type { SerpOrganicResult } from "../serp/SerpProvider.js";
import { PAYMENT_AGGREGATORS } from "../domain/blocklists.js";

export function aggregatorPrompt(rawName: string): string {
  return `Raw merchant string from a card transaction: "${rawName}"

Payment processors and delivery platforms often prefix the real merchant name
(known examples: ${PAYMENT_AGGREGATORS.join(", ")}; also patterns like "SQ *", "PAYPAL *", "TST*").
Remove only such prefixes and processor noise. Keep the merchant's own words, including store numbers.

Reply with JSON only:
{"cleaned_name": "<merchant name>", "reason": "<what was removed, or 'No aggregator found.'>"}`;
}

export function extractionPrompt(results: SerpOrganicResult[], originalName: string, query: string): string {
  const listing = results
    .map((r, i) => `${i + 1}. ${r.title}\n   ${r.link}\n   ${r.snippet}`)
    .join("\n");

  return `We are identifying the business behind the merchant string "${originalName}".
Search query used: "${query}"

Search results:
${listing}

Propose, from these results only:
- cleaned_name: the official business name
- website_candidates: URLs that could be the business's own website, best first (no directories, no social networks)
- social_candidates: the business's social-media profile URLs (Facebook, LinkedIn, Instagram, Twitter/X)
- business_status: "Operational", "Permanently Closed", "Historical" or "Unknown"
- summary: one or two sentences on what the results show

Do not decide whether the match is correct. Reply with JSON only using exactly these keys.`;
}

export function verificationPrompt(pageText: string, merchantName: string): string {
  return `Below is the text of a web page that may be the official website of "${merchantName}".

Decide whether it is a genuinely operational business website for that merchant.
It is NOT valid if it is parked, for sale, under construction, an error page, an unfilled template,
or clearly belongs to a different business.

Page text:
"""
${pageText.slice(0, 6000)}
"""

Reply with JSON only:
{"is_valid": true|false, "reasoning": "<short explanation>"}`;
}

import type { SocialPlatform } from "./types.js";

// Hosts that are almost never a merchant's own website: search engines, maps,
// review sites, business directories and marketplaces.
export const DIRECTORY_HOSTS = new Set([
  // Search / maps
  "google.com",
  "bing.com",
  "maps.apple.com",

  // Reviews & listings
  "yelp.com",
  "tripadvisor.com",
  "yellowpages.com",
  "foursquare.com",
  "bbb.org",
  "mapquest.com",
  "zomato.com",
  "swiggy.com",
  "justdial.com",
  "indiamart.com",
  "doordash.com",
  "ubereats.com",
  "grubhub.com",

  // Global aggregators
  "opencorporates.com",
  "crunchbase.com",
  "dnb.com",
  "wikipedia.org",
  "youtube.com"
]);

export const SOCIAL_HOSTS: ReadonlyMap<string, SocialPlatform> = new Map<string, SocialPlatform>([
  ["facebook.com", "facebook"],
  ["fb.com", "facebook"],
  ["linkedin.com", "linkedin"],
  ["instagram.com", "instagram"],
  ["twitter.com", "twitter"],
  ["x.com", "twitter"]
]);

// Processor and platform names that show up in front of the real merchant name.
export const PAYMENT_AGGREGATORS = [
  "PAYPAL",
  "OPENPAY",
  "PAYTM",
  "RAZORPAY",
  "PHONEPE",
  "GOOGLE PAY",
  "G PAY",
  "SQUARE",
  "STRIPE",
  "UBER EATS",
  "SWIGGY",
  "ZOMATO"
];

function matchesHost(host: string, listed: string): boolean {
  return host === listed || host.endsWith("." + listed);
}

export function isDirectoryHost(host: string): boolean {
  const h = (host || "").toLowerCase().replace(/\.$/, "");
  if (!h) return false;

  for (const blocked of DIRECTORY_HOSTS) {
    if (matchesHost(h, blocked)) return true;
  }
  return false;
}

export function socialPlatformOfHost(host: string): SocialPlatform | undefined {
  const h = (host || "").toLowerCase().replace(/\.$/, "");
  if (!h) return undefined;

  for (const [listed, platform] of SOCIAL_HOSTS) {
    if (matchesHost(h, listed)) return platform;
  }
  return undefined;
}

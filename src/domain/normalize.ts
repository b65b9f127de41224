import { socialPlatformOfHost } from "./blocklists.js";
import type { SocialPlatform } from "./types.js";

export function hostFromUrl(u: string): string {
  try {
    // hostname excludes port; keep it this way so blocklist matching works.
    return new URL(withScheme(u)).hostname.toLowerCase().replace(/\.$/, "");
  } catch {
    return "";
  }
}

// Model output often drops the scheme ("example.com/menu").
export function withScheme(u: string): string {
  const t = (u || "").trim();
  if (!t) return t;
  return /^https?:\/\//i.test(t) ? t : `https://${t}`;
}

export function registrableHost(host: string): string {
  const h = (host || "").toLowerCase().replace(/\.$/, "").replace(/^www\./, "");
  if (!h) return "";
  if (h === "localhost") return h;
  if (h.includes(":")) return h; // IPv6
  if (/^\d{1,3}(\.\d{1,3}){3}$/.test(h)) return h; // IPv4

  const parts = h.split(".").filter(Boolean);
  if (parts.length <= 2) return h;

  // Common multi-part public suffixes (not exhaustive)
  const suffix2 = parts.slice(-2).join(".");
  const suffix3 = parts.slice(-3).join(".");

  const multipart2 = new Set([
    "co.in", "org.in", "net.in", "gov.in", "ac.in", "edu.in",
    "co.uk", "org.uk", "ac.uk", "gov.uk",
    "com.au", "net.au", "org.au", "edu.au", "gov.au"
  ]);

  const multipart3 = new Set([
    "co.jp", "ne.jp", "or.jp"
  ]);

  if (multipart3.has(suffix3) && parts.length >= 4) return parts.slice(-4).join(".");
  if (multipart2.has(suffix2) && parts.length >= 3) return parts.slice(-3).join(".");

  // Default: eTLD+1 approximation
  return parts.slice(-2).join(".");
}

export function socialPlatform(url: string): SocialPlatform | undefined {
  return socialPlatformOfHost(hostFromUrl(url));
}

export function looksParked(text: string): boolean {
  const t = (text || "").toLowerCase();
  return (
    t.includes("domain for sale") ||
    t.includes("buy this domain") ||
    t.includes("this domain is for sale") ||
    t.includes("domain is parked") ||
    (t.includes("godaddy") && t.includes("domain"))
  );
}

// Website: first label of the host ("www.joes-pizza.co.uk" -> "joes-pizza.png").
// Social-only: the cleaned name without whitespace.
export function logoFilename(cleanedName: string, website: string, socials: readonly string[]): string {
  if (website) {
    const label = hostFromUrl(website).replace(/^www\./, "").split(".")[0] || "";
    return label ? `${label.toLowerCase()}.png` : "";
  }
  if (socials.length) {
    const compact = cleanedName.replace(/\s+/g, "");
    return compact ? `${compact}.png` : "";
  }
  return "";
}

import { describe, expect, it } from "vitest";
import { hostFromUrl, logoFilename, looksParked, registrableHost, withScheme } from "../src/domain/normalize.js";
import { isDirectoryHost, socialPlatformOfHost } from "../src/domain/blocklists.js";
import { pickBestSocial } from "../src/domain/socials.js";

describe("url helpers", () => {
  it("tolerates missing schemes", () => {
    expect(withScheme("example.com/menu")).toBe("https://example.com/menu");
    expect(withScheme("http://example.com")).toBe("http://example.com");
    expect(hostFromUrl("WWW.Example.com/menu")).toBe("www.example.com");
    expect(hostFromUrl("not a url")).toBe("");
  });

  it("reduces hosts to their registrable part", () => {
    expect(registrableHost("shop.www.joes-pizza.co.uk")).toBe("joes-pizza.co.uk");
    expect(registrableHost("www.example.com")).toBe("example.com");
    expect(registrableHost("blog.example.com")).toBe("example.com");
  });

  it("classifies social and directory hosts, including subdomains", () => {
    expect(socialPlatformOfHost("m.facebook.com")).toBe("facebook");
    expect(socialPlatformOfHost("x.com")).toBe("twitter");
    expect(socialPlatformOfHost("example.com")).toBeUndefined();
    expect(isDirectoryHost("www.yelp.com")).toBe(true);
    expect(isDirectoryHost("yelpers.com")).toBe(false);
  });

  it("spots parked pages", () => {
    expect(looksParked("This domain is for sale! Make an offer")).toBe(true);
    expect(looksParked("Fresh bread daily")).toBe(false);
  });
});

describe("logoFilename", () => {
  it("uses the first domain label when a website is known", () => {
    expect(logoFilename("Coffee Shop", "https://www.CoffeeShop5.com/menu", [])).toBe("coffeeshop5.png");
    expect(logoFilename("Joe", "joes-pizza.co.uk", [])).toBe("joes-pizza.png");
  });

  it("uses the cleaned name without whitespace for social-only records", () => {
    expect(logoFilename("Acme  Bakery Co", "", ["https://facebook.com/acme"])).toBe("AcmeBakeryCo.png");
  });

  it("is empty when nothing was found", () => {
    expect(logoFilename("", "", [])).toBe("");
  });
});

describe("pickBestSocial", () => {
  const candidates = [
    "https://twitter.com/acme",
    "https://instagram.com/acme",
    "https://www.linkedin.com/company/acme",
    "https://www.facebook.com/acme"
  ];

  it("follows the platform priority", () => {
    expect(pickBestSocial(candidates, ["facebook", "linkedin", "instagram", "twitter"])).toBe("https://www.facebook.com/acme");
    expect(pickBestSocial(candidates.slice(0, 3), ["facebook", "linkedin", "instagram", "twitter"])).toBe(
      "https://www.linkedin.com/company/acme"
    );
    expect(pickBestSocial(candidates, ["instagram", "facebook"])).toBe("https://instagram.com/acme");
  });

  it("falls back to the first candidate seen", () => {
    expect(pickBestSocial(["https://tiktok.com/@acme", "https://pinterest.com/acme"], ["facebook"])).toBe("https://tiktok.com/@acme");
    expect(pickBestSocial([], ["facebook"])).toBeUndefined();
  });
});

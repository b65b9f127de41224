import type { Capabilities } from "./capabilities.js";
import { buildQueries } from "./queries.js";
import { pickBestSocial } from "./socials.js";
import { hostFromUrl, logoFilename, looksParked, registrableHost, withScheme } from "./normalize.js";
import { isDirectoryHost, socialPlatformOfHost } from "./blocklists.js";
import {
  REMARK_NOT_FOUND,
  REMARK_WEBSITE_UNAVAILABLE,
  type RawRecord,
  type ResolvedRecord,
  type SettingsSnapshot
} from "./types.js";
import { isClosedStatus } from "../llm/LanguageModel.js";
import type { SerpOrganicResult } from "../serp/SerpProvider.js";
import { modelCost, type UnitCosts } from "../config/costs.js";
import {
  NonRetriableCapabilityError,
  RetriableCapabilityError,
  RowProcessingError,
  errorMessage
} from "../resilience/errors.js";
import type { Logger } from "../log/jobLogger.js";

export type ResolverSettings = Pick<SettingsSnapshot, "mode" | "model_name" | "budget_per_row" | "social_priority">;

export type ResolverDeps = {
  // Expected to be wrapped by resilientCapabilities already.
  caps: Capabilities;
  costs: UnitCosts;
  logger: Logger;
};

// Cost and narrative collected while one record is being resolved.
type Trail = {
  cost: number;
  notes: string[];
};

type Verdict = { valid: boolean; reason: string };

const MAX_EVIDENCE_LINKS = 5;

export class IdentityResolver {
  private readonly llmCost: number;

  constructor(private readonly settings: ResolverSettings, private readonly deps: ResolverDeps) {
    this.llmCost = modelCost(deps.costs, settings.model_name);
  }

  async resolve(raw: RawRecord): Promise<ResolvedRecord> {
    const trail: Trail = { cost: 0, notes: [] };
    try {
      return await this.run(raw, trail);
    } catch (err) {
      throw new RowProcessingError(errorMessage(err), { cost: trail.cost, evidence: trail.notes.join("\n"), cause: err });
    }
  }

  private async run(raw: RawRecord, trail: Trail): Promise<ResolvedRecord> {
    const { llm, search, places } = this.deps.caps;
    const { notes } = trail;
    const rawName = raw.merchant_name_raw.trim();
    if (!rawName) {
      return this.reject(trail, "Rejected: merchant name is blank; no queries issued.");
    }

    // Calls are charged before they are made so failed attempts still count.
    trail.cost += this.llmCost;
    const removal = await llm.removeAggregator(rawName);
    const cleanedName = removal.cleaned_name.trim() || rawName;
    notes.push(`Pre-clean: "${rawName}" -> "${cleanedName}" (${removal.reason || "no reason given"})`);

    const queries = buildQueries({ name: cleanedName, street: raw.address, city: raw.city, country: raw.country });
    const socials: string[] = [];
    const checkedUrls = new Set<string>();
    let proposedName = cleanedName;
    let closure: string | undefined;
    let accepted: { website: string; results: SerpOrganicResult[] } | undefined;

    for (const [i, query] of queries.entries()) {
      const tag = `Query ${i + 1}/${queries.length} "${query}"`;

      if (trail.cost >= this.settings.budget_per_row) {
        notes.push(`Budget of ${this.settings.budget_per_row} per row reached; ${queries.length - i} queries not issued.`);
        break;
      }

      const siteCandidates: string[] = [];
      if (this.settings.mode === "Enhanced" && places) {
        trail.cost += this.deps.costs.placesLookup;
        const place = await places.findPlace(query);
        if (place?.website) {
          siteCandidates.push(place.website);
          notes.push(`${tag}: places lookup matched "${place.name}" (${place.website})`);
        } else {
          notes.push(`${tag}: places lookup had no website`);
        }
      }

      trail.cost += this.deps.costs.search;
      const results = await search.search(query);
      if (!results.length) {
        notes.push(`${tag}: no search results`);
        if (!siteCandidates.length) continue;
      }

      if (results.length) {
        trail.cost += this.llmCost;
        const extraction = await llm.extract(results, rawName, query);
        notes.push(`${tag}: ${results.length} results. ${extraction.summary || "No summary."}`);
        if (extraction.cleaned_name.trim()) proposedName = extraction.cleaned_name.trim();

        if (isClosedStatus(extraction.business_status)) {
          closure = `${tag} reported the business as "${extraction.business_status}"`;
          notes.push(`${closure}; no further queries issued.`);
          break;
        }

        for (const s of extraction.social_candidates) {
          if (hostFromUrl(s)) addUnique(socials, withScheme(s));
        }
        siteCandidates.push(...extraction.website_candidates);
      }

      for (const url of siteCandidates) {
        const host = registrableHost(hostFromUrl(url));
        if (!host) {
          notes.push(`  ${url}: not a usable URL`);
          continue;
        }
        if (socialPlatformOfHost(host)) {
          addUnique(socials, withScheme(url));
          notes.push(`  ${url}: social profile, kept as a social candidate`);
          continue;
        }
        if (isDirectoryHost(host)) {
          notes.push(`  ${url}: directory or listing site, skipped`);
          continue;
        }
        const target = withScheme(url);
        if (checkedUrls.has(target)) {
          notes.push(`  ${url}: already checked`);
          continue;
        }
        checkedUrls.add(target);

        const verdict = await this.checkWebsite(url, proposedName, trail);
        notes.push(`  ${url}: ${verdict.reason}`);
        if (verdict.valid) {
          accepted = { website: target, results };
          break;
        }
      }
      if (accepted) break;
    }

    if (closure) {
      return this.reject(trail, `Rejected: ${closure}.`);
    }

    if (accepted) {
      notes.push(`Accepted: verified website ${accepted.website}.`);
      const links = [accepted.website];
      for (const r of accepted.results) addUnique(links, r.link);
      return this.finish(trail, {
        cleaned_name: proposedName,
        website: accepted.website,
        socials: [],
        remarks: "",
        evidence_links: links.slice(0, MAX_EVIDENCE_LINKS)
      });
    }

    const best = pickBestSocial(socials, this.settings.social_priority);
    if (best) {
      notes.push(`Accepted: no verified website; using social profile ${best} (${socials.length} candidate(s) seen).`);
      return this.finish(trail, {
        cleaned_name: proposedName,
        website: "",
        socials: [best],
        remarks: REMARK_WEBSITE_UNAVAILABLE,
        evidence_links: socials.slice(0, MAX_EVIDENCE_LINKS)
      });
    }

    return this.reject(trail, `Rejected: no verified website or social profile after ${queries.length} queries.`);
  }

  private async checkWebsite(url: string, merchantName: string, trail: Trail): Promise<Verdict> {
    let text: string;
    try {
      text = await this.deps.caps.fetcher.fetch(url);
    } catch (err) {
      // An unreachable candidate is a verdict on the candidate, not a row failure.
      if (err instanceof RetriableCapabilityError || err instanceof NonRetriableCapabilityError) {
        return { valid: false, reason: `unreachable (${err.message})` };
      }
      throw err;
    }

    if (!text.trim()) return { valid: false, reason: "empty page" };
    if (looksParked(text)) return { valid: false, reason: "parked or for-sale domain" };

    trail.cost += this.llmCost;
    const v = await this.deps.caps.llm.verifyWebsite(text, merchantName);
    return { valid: v.is_valid, reason: `${v.is_valid ? "verified" : "not valid"}: ${v.reasoning || "no reasoning given"}` };
  }

  private reject(trail: Trail, verdict: string): ResolvedRecord {
    trail.notes.push(verdict);
    return this.finish(trail, { cleaned_name: "", website: "", socials: [], remarks: REMARK_NOT_FOUND, evidence_links: [] });
  }

  private finish(
    trail: Trail,
    fields: Pick<ResolvedRecord, "cleaned_name" | "website" | "socials" | "remarks" | "evidence_links">
  ): ResolvedRecord {
    this.deps.logger.info(`Resolved "${fields.cleaned_name || "-"}" ${fields.remarks ? `[${fields.remarks}]` : "[website]"} cost=${trail.cost.toFixed(2)}`);
    return Object.freeze({
      ...fields,
      socials: Object.freeze([...fields.socials]),
      evidence_links: Object.freeze([...fields.evidence_links]),
      evidence: trail.notes.join("\n"),
      accumulated_cost: trail.cost,
      logo_filename: logoFilename(fields.cleaned_name, fields.website, fields.socials)
    });
  }
}

function addUnique(list: string[], value: string) {
  if (value && !list.includes(value)) list.push(value);
}

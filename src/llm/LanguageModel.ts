import { z } from "zod";
import { MalformedResponseError } from "../resilience/errors.js";
import type { SerpOrganicResult } from "../serp/SerpProvider.js";

export const AggregatorRemovalSchema = z.object({
  cleaned_name: z.string().default(""),
  reason: z.string().default("")
});

export const ExtractionSchema = z.object({
  cleaned_name: z.string().default(""),
  website_candidates: z.array(z.string()).default([]),
  social_candidates: z.array(z.string()).default([]),
  business_status: z.string().default("Unknown"),
  summary: z.string().default("")
});

export const WebsiteVerificationSchema = z.object({
  is_valid: z.boolean(),
  reasoning: z.string().default("")
});

export type AggregatorRemoval = z.infer<typeof AggregatorRemovalSchema>;
export type Extraction = z.infer<typeof ExtractionSchema>;
export type WebsiteVerification = z.infer<typeof WebsiteVerificationSchema>;

// The model proposes; accept/reject decisions stay in the resolver.
export interface LanguageModel {
  removeAggregator(rawName: string): Promise<AggregatorRemoval>;
  extract(results: SerpOrganicResult[], originalName: string, query: string): Promise<Extraction>;
  verifyWebsite(pageText: string, merchantName: string): Promise<WebsiteVerification>;
  hasCredentials(): boolean;
}

// The status has to lead with a closure word; "Open (not permanently closed)" is open.
const CLOSED_STATUS = /^(?:permanently[\s_]+closed|closed|historical|defunct|out of business)(?![a-z])/;

export function isClosedStatus(status: string): boolean {
  const s = status.trim().toLowerCase();
  if (s.includes("temporar")) return false;
  return CLOSED_STATUS.test(s);
}

export function parseModelJson<S extends z.ZodTypeAny>(callName: string, text: string, schema: S): z.output<S> {
  const cleaned = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/```$/, "")
    .trim();

  let raw: unknown;
  try {
    raw = JSON.parse(cleaned);
  } catch (err) {
    throw new MalformedResponseError(`${callName}: response is not JSON: ${cleaned.slice(0, 120)}`, { cause: err });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new MalformedResponseError(`${callName}: unexpected response shape: ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return parsed.data;
}

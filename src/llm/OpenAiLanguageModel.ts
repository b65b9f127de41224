import OpenAI from "openai";
import {
  AggregatorRemovalSchema,
  ExtractionSchema,
  WebsiteVerificationSchema,
  parseModelJson,
  type AggregatorRemoval,
  type Extraction,
  type LanguageModel,
  type WebsiteVerification
} from "./LanguageModel.js";
import { aggregatorPrompt, extractionPrompt, verificationPrompt } from "./prompts.js";
import type { SerpOrganicResult } from "../serp/SerpProvider.js";
import {
  NonRetriableCapabilityError,
  QuotaExceededError,
  RateLimitedError,
  ServiceUnavailableError
} from "../resilience/errors.js";

export type OpenAiOptions = {
  apiKey: string;
  model: string;
};

export class OpenAiLanguageModel implements LanguageModel {
  private readonly client: OpenAI;

  constructor(private readonly opts: OpenAiOptions) {
    // Retries belong to the resilience layer, not the SDK.
    this.client = new OpenAI({ apiKey: opts.apiKey || "missing", maxRetries: 0 });
  }

  hasCredentials(): boolean {
    return Boolean(this.opts.apiKey);
  }

  private async complete(callName: string, prompt: string): Promise<string> {
    try {
      const res = await this.client.chat.completions.create({
        model: this.opts.model,
        messages: [{ role: "user", content: prompt }],
        response_format: { type: "json_object" },
        temperature: 0
      });
      return res.choices[0]?.message?.content ?? "";
    } catch (err) {
      throw mapOpenAiError(callName, err);
    }
  }

  async removeAggregator(rawName: string): Promise<AggregatorRemoval> {
    const text = await this.complete("remove_aggregator", aggregatorPrompt(rawName));
    return parseModelJson("remove_aggregator", text, AggregatorRemovalSchema);
  }

  async extract(results: SerpOrganicResult[], originalName: string, query: string): Promise<Extraction> {
    const text = await this.complete("extract", extractionPrompt(results, originalName, query));
    return parseModelJson("extract", text, ExtractionSchema);
  }

  async verifyWebsite(pageText: string, merchantName: string): Promise<WebsiteVerification> {
    const text = await this.complete("verify_website", verificationPrompt(pageText, merchantName));
    return parseModelJson("verify_website", text, WebsiteVerificationSchema);
  }
}

function mapOpenAiError(callName: string, err: unknown): Error {
  if (err instanceof OpenAI.APIConnectionError) {
    return new ServiceUnavailableError(`${callName}: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.RateLimitError) {
    // "insufficient_quota" arrives as a 429 but will not clear by waiting.
    return err.code === "insufficient_quota"
      ? new QuotaExceededError(`${callName}: ${err.message}`, { cause: err })
      : new RateLimitedError(`${callName}: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.InternalServerError) {
    return new ServiceUnavailableError(`${callName}: ${err.message}`, { cause: err });
  }
  if (err instanceof OpenAI.APIError) {
    return new NonRetriableCapabilityError(`${callName}: ${err.message}`, { cause: err });
  }
  return err instanceof Error ? err : new Error(String(err));
}

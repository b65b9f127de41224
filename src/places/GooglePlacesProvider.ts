import type { PlaceMatch, PlacesProvider } from "./PlacesProvider.js";
import { classifyHttpFailure, QuotaExceededError, ServiceUnavailableError } from "../resilience/errors.js";

type TextSearchResponse = {
  places?: Array<{
    displayName?: { text?: string };
    websiteUri?: string;
    formattedAddress?: string;
  }>;
};

export class GooglePlacesProvider implements PlacesProvider {
  constructor(private readonly apiKey: string) {}

  hasCredentials(): boolean {
    return Boolean(this.apiKey);
  }

  async findPlace(query: string): Promise<PlaceMatch | null> {
    let res: Response;
    try {
      res = await fetch("https://places.googleapis.com/v1/places:searchText", {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          "X-Goog-Api-Key": this.apiKey,
          "X-Goog-FieldMask": "places.displayName,places.websiteUri,places.formattedAddress"
        },
        body: JSON.stringify({ textQuery: query, pageSize: 1 })
      });
    } catch (err) {
      throw new ServiceUnavailableError(`Places request failed: ${String(err)}`, { cause: err });
    }

    if (!res.ok) {
      const body = await res.text();
      if (res.status === 403 && /quota/i.test(body)) throw new QuotaExceededError(`Places 403: ${body.slice(0, 300)}`);
      throw classifyHttpFailure("Places", res.status, body);
    }

    let json: TextSearchResponse;
    try {
      json = (await res.json()) as TextSearchResponse;
    } catch (err) {
      throw new ServiceUnavailableError(`Places returned a body that is not JSON: ${String(err)}`, { cause: err });
    }
    const top = json.places?.[0];
    if (!top) return null;
    return {
      name: top.displayName?.text || "",
      website: top.websiteUri || "",
      address: top.formattedAddress || ""
    };
  }
}

import { z } from "zod";
import { GeocoderConfig } from "../config";
import { Coordinates, GeocodeOutcome, GeocodingProvider } from "../types";

/**
 * Shape of a Nominatim `format=json` search result. Lat/lon arrive as
 * strings.
 */
const nominatimResultSchema = z.array(
  z.object({
    lat: z.string(),
    lon: z.string(),
    display_name: z.string().optional(),
  })
);

export type FetchLike = typeof fetch;

function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === "AbortError" || err.name === "TimeoutError");
}

/** Rejects with an AbortError once the signal fires; never resolves. */
function rejectOnAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener(
      "abort",
      () => reject(Object.assign(new Error("Request aborted"), { name: "AbortError" })),
      { once: true }
    );
  });
}

/**
 * Address search against an OpenStreetMap Nominatim endpoint.
 *
 * Known failures (time-out, HTTP errors, unreachable host, unexpected
 * payload) come back as PROVIDER_ERROR outcomes. Anything else is thrown.
 */
export class NominatimGeocoder implements GeocodingProvider {
  readonly name = "nominatim";
  readonly available = true;

  constructor(
    private readonly config: Pick<GeocoderConfig, "baseUrl" | "userAgent" | "debug">,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  buildUrl(query: string): string {
    const url = new URL(this.config.baseUrl);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("limit", "1");
    return url.toString();
  }

  async lookup(query: string, timeoutMs: number): Promise<GeocodeOutcome> {
    const url = this.buildUrl(query);
    if (this.config.debug) {
      console.log(`GEO_CHAIN: nominatim lookup, queryLength=${query.length}`);
    }

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    // The timer stays armed until the body has been read
    let body: unknown;
    try {
      const response = await this.fetchImpl(url, {
        method: "GET",
        headers: {
          Accept: "application/json",
          "User-Agent": this.config.userAgent,
        },
        signal: controller.signal,
      });

      if (!response.ok) {
        return {
          kind: "PROVIDER_ERROR",
          reason: "SERVICE",
          detail: `HTTP ${response.status} ${response.statusText}`.trim(),
        };
      }

      body = await Promise.race([response.json(), rejectOnAbort(controller.signal)]);
    } catch (err) {
      if (controller.signal.aborted || isAbortError(err)) {
        return { kind: "PROVIDER_ERROR", reason: "TIMEOUT", detail: `timed out after ${timeoutMs}ms` };
      }
      if (err instanceof SyntaxError) {
        return { kind: "PROVIDER_ERROR", reason: "SERVICE", detail: "response is not valid JSON" };
      }
      // fetch rejects with a TypeError when the host cannot be reached
      if (err instanceof TypeError) {
        return { kind: "PROVIDER_ERROR", reason: "SERVICE", detail: err.message };
      }
      throw err;
    } finally {
      clearTimeout(timeoutId);
    }

    const parsed = nominatimResultSchema.safeParse(body);
    if (!parsed.success) {
      return { kind: "PROVIDER_ERROR", reason: "SERVICE", detail: "unexpected response format" };
    }

    const best = parsed.data[0];
    if (!best) {
      if (this.config.debug) {
        console.log(`GEO_CHAIN: nominatim returned no results, queryLength=${query.length}`);
      }
      return { kind: "NOT_FOUND" };
    }

    const coordinates: Coordinates = { lat: parseFloat(best.lat), lon: parseFloat(best.lon) };
    if (!Number.isFinite(coordinates.lat) || !Number.isFinite(coordinates.lon)) {
      return { kind: "PROVIDER_ERROR", reason: "SERVICE", detail: "result has no usable coordinates" };
    }

    return { kind: "SUCCESS", coordinates };
  }
}

/**
 * Stand-in used when geocoding is switched off. Resolvers refuse to run
 * against it.
 */
export function unavailableGeocoder(reason: string): GeocodingProvider {
  return {
    name: "unavailable",
    available: false,
    lookup: async () => ({ kind: "PROVIDER_ERROR", reason: "SERVICE", detail: reason }),
  };
}

export function createGeocoder(config: GeocoderConfig, fetchImpl?: FetchLike): GeocodingProvider {
  if (!config.enabled) {
    return unavailableGeocoder("disabled by GEOCODER_ENABLED");
  }
  return new NominatimGeocoder(config, fetchImpl);
}

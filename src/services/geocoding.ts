import { Coordinates, GeocodeOutcome, GeocodeProgress, GeocodingProvider } from "../types";
import { GEOCODE_DELAY_MS, GEOCODE_TIMEOUT_MS } from "../constants";
import { ResolverUnavailableError } from "../errors";
import { addressPreview, cleanAddress } from "./normalization";

/**
 * Per-run memo of geocoding results. `null` records a lookup that was
 * attempted and failed, so it is not retried within the run.
 */
export class GeocodeCache {
  private readonly entries = new Map<string, Coordinates | null>();

  has(address: string): boolean {
    return this.entries.has(address);
  }

  get(address: string): Coordinates | null | undefined {
    return this.entries.get(address);
  }

  set(address: string, coords: Coordinates | null): void {
    this.entries.set(address, coords);
  }

  get size(): number {
    return this.entries.size;
  }
}

export type Sleep = (ms: number) => Promise<void>;

const defaultSleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface AddressResolverOptions {
  /** Wait before each outbound lookup. */
  delayMs?: number;
  /** Per-call timeout handed to the provider. */
  timeoutMs?: number;
  sleep?: Sleep;
  onProgress?: (progress: GeocodeProgress) => void;
}

/**
 * Distinct, trimmed, non-empty addresses in first-seen order.
 */
export function distinctAddresses(addresses: readonly string[]): string[] {
  const unique = new Set<string>();
  for (const raw of addresses) {
    const address = cleanAddress(raw);
    if (address) {
      unique.add(address);
    }
  }
  return Array.from(unique);
}

/**
 * Geocodes a batch of addresses one at a time, honouring a fixed delay
 * before every network call. Lookups that fail are logged and recorded as
 * `null`; they never abort the batch.
 */
export class AddressResolver {
  private readonly delayMs: number;
  private readonly timeoutMs: number;
  private readonly sleep: Sleep;
  private readonly onProgress?: (progress: GeocodeProgress) => void;

  constructor(
    private readonly provider: GeocodingProvider,
    private readonly cache: GeocodeCache = new GeocodeCache(),
    options: AddressResolverOptions = {}
  ) {
    this.delayMs = options.delayMs ?? GEOCODE_DELAY_MS;
    this.timeoutMs = options.timeoutMs ?? GEOCODE_TIMEOUT_MS;
    this.sleep = options.sleep ?? defaultSleep;
    this.onProgress = options.onProgress;
  }

  /**
   * @returns every distinct input address mapped to its coordinates, or
   *   null when it could not be resolved
   * @throws ResolverUnavailableError if the provider is not available
   */
  async resolve(addresses: readonly string[]): Promise<Map<string, Coordinates | null>> {
    if (!this.provider.available) {
      throw new ResolverUnavailableError(`provider '${this.provider.name}' is not configured`);
    }

    const unique = distinctAddresses(addresses);
    const results = new Map<string, Coordinates | null>();
    const total = unique.length;

    for (const [offset, address] of unique.entries()) {
      results.set(address, await this.resolveOne(address));

      const index = offset + 1;
      this.onProgress?.({
        index,
        total,
        percent: (index / total) * 100,
        preview: addressPreview(address),
      });
    }

    return results;
  }

  private async resolveOne(address: string): Promise<Coordinates | null> {
    const cached = this.cache.get(address);
    if (cached !== undefined) {
      return cached;
    }

    await this.sleep(this.delayMs);

    let outcome: GeocodeOutcome;
    try {
      outcome = await this.provider.lookup(address, this.timeoutMs);
    } catch (err) {
      console.warn(
        `Unexpected error geocoding '${address}': ${err instanceof Error ? err.message : String(err)}`
      );
      this.cache.set(address, null);
      return null;
    }

    switch (outcome.kind) {
      case "SUCCESS":
        this.cache.set(address, outcome.coordinates);
        return outcome.coordinates;
      case "NOT_FOUND":
        this.cache.set(address, null);
        return null;
      case "PROVIDER_ERROR":
        console.warn(
          `Geocoding error for '${address}' (${outcome.reason.toLowerCase()}): ${outcome.detail}`
        );
        this.cache.set(address, null);
        return null;
    }
  }
}

export interface Coordinates {
  lat: number;
  lon: number;
}

/** One parsed input record: column name → raw cell text, in header order. */
export type TabularRow = ReadonlyMap<string, string>;

export interface TabularData {
  headers: string[];
  rows: TabularRow[];
}

export interface MarkerRecord {
  name: string;
  coordinates: Coordinates;
  description: string;
  attributes: ReadonlyMap<string, string>;
}

export type ProviderErrorReason = "TIMEOUT" | "SERVICE";

/**
 * What a single geocoding lookup produced. Providers return these instead of
 * throwing for the failures they know about.
 */
export type GeocodeOutcome =
  | { kind: "SUCCESS"; coordinates: Coordinates }
  | { kind: "NOT_FOUND" }
  | { kind: "PROVIDER_ERROR"; reason: ProviderErrorReason; detail: string };

export interface GeocodingProvider {
  readonly name: string;
  /** Decided once when the provider is built, never rechecked later. */
  readonly available: boolean;
  lookup(query: string, timeoutMs: number): Promise<GeocodeOutcome>;
}

export interface GeocodeProgress {
  index: number;
  total: number;
  percent: number;
  preview: string;
}

export interface ConversionOptions {
  inputPath: string;
  outputPath?: string;
  addressColumn: string;
  nameColumn?: string;
  skipGeocoding: boolean;
  latColumn?: string;
  lonColumn?: string;
  documentName?: string;
}

export interface ConversionResult {
  document: string;
  outputPath?: string;
  totalRows: number;
  convertedRows: number;
}

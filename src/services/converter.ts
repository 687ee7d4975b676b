import { access, writeFile } from "fs/promises";
import { basename, extname } from "path";
import {
  ConversionOptions,
  ConversionResult,
  GeocodeProgress,
  GeocodingProvider,
  TabularData,
} from "../types";
import { InputNotFoundError, ResolverUnavailableError, UsageError } from "../errors";
import { readTabularFile } from "./tabular";
import { findAddressColumn } from "./normalization";
import { assertCoordinateColumns } from "./coordinates";
import { AddressResolver, AddressResolverOptions, GeocodeCache } from "./geocoding";
import { buildAddressMarkers, buildCoordinateMarkers, MarkerBuildResult } from "./markers";
import { buildKmlDocument } from "./kml";

export interface ConversionDependencies {
  geocoder: GeocodingProvider;
  resolverOptions?: AddressResolverOptions;
}

export type DataConversionOptions = Omit<ConversionOptions, "inputPath" | "outputPath">;

export function logProgress({ index, total, percent, preview }: GeocodeProgress): void {
  console.log(`Geocoding ${index}/${total} (${percent.toFixed(1)}%): ${preview}`);
}

function fileStem(filePath: string): string {
  return basename(filePath, extname(filePath));
}

/** `<input stem>.kml`, relative to the working directory. */
export function defaultOutputPath(inputPath: string): string {
  return `${fileStem(inputPath)}.kml`;
}

/**
 * @throws UsageError when the coordinate path is chosen without both columns
 */
export function validateConversionOptions(options: DataConversionOptions): void {
  if (options.skipGeocoding && (!options.latColumn || !options.lonColumn)) {
    throw new UsageError("--lat-column and --lon-column are required when --skip-geocoding is used");
  }
}

async function geocodeRows(
  data: TabularData,
  options: DataConversionOptions,
  deps: ConversionDependencies
): Promise<MarkerBuildResult> {
  const addressColumn = findAddressColumn(data.headers, options.addressColumn);
  const addresses = data.rows.map((row) => row.get(addressColumn) ?? "");

  const resolver = new AddressResolver(deps.geocoder, new GeocodeCache(), {
    onProgress: logProgress,
    ...deps.resolverOptions,
  });

  console.log("Geocoding addresses...");
  const resolved = await resolver.resolve(addresses);

  return buildAddressMarkers(data, resolved, {
    addressColumn,
    nameColumn: options.nameColumn,
  });
}

/**
 * Runs the conversion on already-parsed rows and returns the KML text with
 * row counters. Nothing is written to disk.
 */
export async function convertTabularData(
  data: TabularData,
  options: DataConversionOptions,
  deps: ConversionDependencies
): Promise<ConversionResult> {
  validateConversionOptions(options);

  let built: MarkerBuildResult;
  if (options.skipGeocoding && options.latColumn && options.lonColumn) {
    console.log("Using latitude and longitude columns from input");
    assertCoordinateColumns(data.headers, options.latColumn, options.lonColumn);
    built = buildCoordinateMarkers(data, {
      latColumn: options.latColumn,
      lonColumn: options.lonColumn,
      addressColumn: options.addressColumn,
      nameColumn: options.nameColumn,
    });
  } else {
    if (!deps.geocoder.available) {
      throw new ResolverUnavailableError(
        "enable GEOCODER_ENABLED or use --skip-geocoding with --lat-column and --lon-column"
      );
    }
    built = await geocodeRows(data, options, deps);
  }

  const totalRows = data.rows.length;
  const convertedRows = built.markers.length;
  console.log(`Successfully converted ${convertedRows}/${totalRows} rows`);

  console.log(`Generating KML with ${convertedRows} placemarks...`);
  const document = buildKmlDocument(built.markers, options.documentName);

  return { document, totalRows, convertedRows };
}

/**
 * Complete pipeline: read the input file, resolve positions, write KML.
 *
 * @throws InputNotFoundError, ParseError, EmptyInputError,
 *   ColumnNotFoundError, ResolverUnavailableError, UsageError
 */
export async function convertFile(
  options: ConversionOptions,
  deps: ConversionDependencies
): Promise<ConversionResult> {
  validateConversionOptions(options);

  try {
    await access(options.inputPath);
  } catch {
    throw new InputNotFoundError(options.inputPath);
  }

  const outputPath = options.outputPath ?? defaultOutputPath(options.inputPath);

  console.log(`Parsing input file: ${options.inputPath}`);
  const data = await readTabularFile(options.inputPath);
  console.log(`Found ${data.rows.length} rows in input`);

  const result = await convertTabularData(
    data,
    { ...options, documentName: options.documentName ?? fileStem(options.inputPath) },
    deps
  );

  console.log(`Saving KML file: ${outputPath}`);
  await writeFile(outputPath, result.document, "utf8");

  return { ...result, outputPath };
}

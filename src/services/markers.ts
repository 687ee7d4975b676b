/**
 * Marker Builder
 *
 * Turns parsed rows plus their resolved coordinates into MarkerRecords.
 * Two entry points mirror the two ways a row gets its position:
 * - buildAddressMarkers: coordinates come from the geocoded address column
 * - buildCoordinateMarkers: coordinates are read from lat/lon columns
 */

import { Coordinates, MarkerRecord, TabularData, TabularRow } from "../types";
import { cleanAddress, findNameColumn, findOptionalAddressColumn } from "./normalization";
import { projectCoordinates } from "./coordinates";

export interface MarkerBuildResult {
  markers: MarkerRecord[];
  /** 1-based indexes of rows left out of the marker set. */
  skippedRows: number[];
}

export interface AddressMarkerOptions {
  addressColumn: string;
  nameColumn?: string;
}

export interface CoordinateMarkerOptions {
  latColumn: string;
  lonColumn: string;
  addressColumn: string;
  nameColumn?: string;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Every non-empty cell except the excluded columns, in header order.
 */
export function collectAttributes(
  row: TabularRow,
  excluded: ReadonlySet<string>
): Map<string, string> {
  const attributes = new Map<string, string>();
  for (const [column, value] of row) {
    if (!excluded.has(column) && value) {
      attributes.set(column, value);
    }
  }
  return attributes;
}

function excludedColumns(...columns: Array<string | undefined>): Set<string> {
  return new Set(columns.filter((c): c is string => c !== undefined));
}

function cell(row: TabularRow, column: string | undefined): string {
  return column === undefined ? "" : row.get(column) ?? "";
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Builds markers for rows whose address was geocoded. Rows with a blank or
 * unresolved address are skipped with a warning.
 *
 * @param addressColumn - already-resolved header name of the address column
 */
export function buildAddressMarkers(
  data: TabularData,
  resolved: ReadonlyMap<string, Coordinates | null>,
  options: AddressMarkerOptions
): MarkerBuildResult {
  const { addressColumn } = options;
  const nameColumn = findNameColumn(data.headers, options.nameColumn);
  const excluded = excludedColumns(addressColumn, nameColumn, options.nameColumn);

  const markers: MarkerRecord[] = [];
  const skippedRows: number[] = [];

  data.rows.forEach((row, offset) => {
    const address = cell(row, addressColumn);
    const key = cleanAddress(address);
    if (!key) {
      console.warn(`Skipping row ${offset + 1}: empty address`);
      skippedRows.push(offset + 1);
      return;
    }

    const coordinates = resolved.get(key);
    if (!coordinates) {
      console.warn(`Warning: could not geocode address: ${address}`);
      skippedRows.push(offset + 1);
      return;
    }

    markers.push({
      name: cell(row, nameColumn) || address,
      coordinates,
      description: address,
      attributes: collectAttributes(row, excluded),
    });
  });

  return { markers, skippedRows };
}

/**
 * Builds markers straight from latitude/longitude columns. The caller must
 * have checked that both columns exist (assertCoordinateColumns).
 */
export function buildCoordinateMarkers(
  data: TabularData,
  options: CoordinateMarkerOptions
): MarkerBuildResult {
  const { latColumn, lonColumn } = options;
  const nameColumn = findNameColumn(data.headers, options.nameColumn);
  const addressColumn = findOptionalAddressColumn(data.headers, options.addressColumn);
  const excluded = excludedColumns(
    latColumn,
    lonColumn,
    addressColumn,
    nameColumn,
    options.nameColumn
  );

  const markers: MarkerRecord[] = [];
  const skippedRows: number[] = [];

  data.rows.forEach((row, offset) => {
    const index = offset + 1;
    const coordinates = projectCoordinates(row, latColumn, lonColumn);

    if (!coordinates) {
      console.warn(`Skipping row ${index}: invalid coordinates`);
      skippedRows.push(index);
      return;
    }

    const address = cell(row, addressColumn);

    markers.push({
      name: cell(row, nameColumn) || address || `Point ${index}`,
      coordinates,
      description: address,
      attributes: collectAttributes(row, excluded),
    });
  });

  return { markers, skippedRows };
}

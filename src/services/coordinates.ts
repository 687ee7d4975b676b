import { Coordinates, TabularRow } from "../types";
import { ColumnNotFoundError } from "../errors";

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Both coordinate columns must be in the header before any row is read.
 *
 * @throws ColumnNotFoundError naming the missing column
 */
export function assertCoordinateColumns(
  headers: readonly string[],
  latColumn: string,
  lonColumn: string
): void {
  if (!headers.includes(latColumn)) {
    throw new ColumnNotFoundError(latColumn, headers, "Latitude column");
  }
  if (!headers.includes(lonColumn)) {
    throw new ColumnNotFoundError(lonColumn, headers, "Longitude column");
  }
}

/**
 * Parses a decimal number as written in a cell. Blank, non-numeric and
 * non-finite values give null. No range check is applied.
 */
export function parseCoordinateValue(value: string | undefined): number | null {
  const trimmed = (value ?? "").trim();
  if (!DECIMAL_PATTERN.test(trimmed)) {
    return null;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Reads a row's coordinate pair. A null result means the row should be
 * skipped, not that the run failed.
 */
export function projectCoordinates(
  row: TabularRow,
  latColumn: string,
  lonColumn: string
): Coordinates | null {
  const lat = parseCoordinateValue(row.get(latColumn));
  const lon = parseCoordinateValue(row.get(lonColumn));
  if (lat === null || lon === null) {
    return null;
  }
  return { lat, lon };
}

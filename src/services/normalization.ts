import { ADDRESS_PREVIEW_LENGTH } from "../constants";
import { ColumnNotFoundError } from "../errors";

// ---------------------------------------------
// Helpers
// ---------------------------------------------

/**
 * Finds the original header using a predicate over its canonical form
 * (trim + lowercase).
 */
function findKeyByPattern(
  headers: readonly string[],
  matcher: (canonical: string) => boolean
): string | undefined {
  for (const key of headers) {
    const canonical = key.trim().toLowerCase();
    if (matcher(canonical)) {
      return key;
    }
  }
  return undefined;
}

// ---------------------------------------------
// Column lookup
// ---------------------------------------------

/**
 * Resolves the address column: the configured name verbatim, otherwise the
 * first header containing "address" in any case. Returns undefined when
 * neither exists.
 */
export function findOptionalAddressColumn(
  headers: readonly string[],
  columnName: string
): string | undefined {
  if (headers.includes(columnName)) {
    return columnName;
  }
  return findKeyByPattern(headers, (k) => k.includes("address"));
}

/**
 * Same as findOptionalAddressColumn, but a missing column is fatal.
 *
 * @throws ColumnNotFoundError listing the available headers
 */
export function findAddressColumn(headers: readonly string[], columnName: string): string {
  const column = findOptionalAddressColumn(headers, columnName);
  if (column === undefined) {
    throw new ColumnNotFoundError(columnName, headers);
  }
  return column;
}

/**
 * Picks the column used for marker names. A configured column only counts
 * when it is in the header; without one, a header called "name" (any case)
 * is used.
 */
export function findNameColumn(
  headers: readonly string[],
  configured: string | undefined
): string | undefined {
  if (configured !== undefined) {
    return headers.includes(configured) ? configured : undefined;
  }
  return findKeyByPattern(headers, (k) => k === "name");
}

// ---------------------------------------------
// Address values
// ---------------------------------------------

/**
 * Cache/deduplication key for an address cell. Only surrounding whitespace
 * is removed; case is kept.
 */
export function cleanAddress(value: string | undefined): string {
  return (value ?? "").trim();
}

export function addressPreview(address: string, maxLength = ADDRESS_PREVIEW_LENGTH): string {
  return address.length > maxLength ? `${address.slice(0, maxLength)}...` : address;
}

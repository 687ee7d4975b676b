export const NOMINATIM_DEFAULT_URL = "https://nominatim.openstreetmap.org/search";

export const NOMINATIM_DEFAULT_USER_AGENT = "csv-to-kml-converter/1.0";

/** Pause before every outbound geocoding call (Nominatim allows 1 req/s). */
export const GEOCODE_DELAY_MS = 1000;

export const GEOCODE_TIMEOUT_MS = 10_000;

/** Progress lines show at most this many characters of the address. */
export const ADDRESS_PREVIEW_LENGTH = 50;

export const DEFAULT_ADDRESS_COLUMN = "Address";

export const DEFAULT_DOCUMENT_NAME = "CSV Data Points";

export const KML_NAMESPACE = "http://www.opengis.net/kml/2.2";

export const KML_DEFAULT_STYLE = {
  id: "defaultStyle",
  color: "ff0000ff",
  scale: "1.0",
  iconHref: "http://maps.google.com/mapfiles/kml/pushpin/red-pushpin.png",
} as const;

export const WORKBOOK_EXTENSIONS = [".xlsx", ".xls", ".ods"];

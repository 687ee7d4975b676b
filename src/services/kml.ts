import { XMLBuilder } from "fast-xml-parser";
import { Coordinates, MarkerRecord } from "../types";
import { DEFAULT_DOCUMENT_NAME, KML_DEFAULT_STYLE, KML_NAMESPACE } from "../constants";

const XML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&apos;",
};

function escapeXml(value: string): string {
  return value.replace(/[&<>"']/g, (ch) => XML_ENTITIES[ch] ?? ch);
}

// Values are escaped here rather than by the builder so that descriptions,
// which arrive already rendered, can be written inline.
const builder = new XMLBuilder({
  attributeNamePrefix: "@_",
  ignoreAttributes: false,
  format: true,
  indentBy: "  ",
  processEntities: false,
  tagValueProcessor: (name: string, value: unknown) =>
    name === "description" ? value : escapeXml(String(value)),
  attributeValueProcessor: (_name: string, value: unknown) => escapeXml(String(value)),
});

type XmlNode = string | XmlNode[] | { [key: string]: XmlNode | undefined };

export function formatCoordinates({ lon, lat }: Coordinates): string {
  return `${lon},${lat},0`;
}

/** HTML table of the marker attributes, in attribute order. */
export function buildAttributeTable(attributes: ReadonlyMap<string, string>): string {
  const rows = Array.from(attributes, ([key, value]) => `<tr><td><b>${key}</b></td><td>${value}</td></tr>`);
  return `<table border='1'>${rows.join("")}</table>`;
}

/**
 * Wraps text in a CDATA section. A literal "]]>" is split across two
 * sections so it cannot end the first one early.
 */
export function wrapCdata(text: string): string {
  return `<![CDATA[${text.replace(/]]>/g, "]]]]><![CDATA[>")}]]>`;
}

/**
 * Rendered description markup: escaped text alone, or text and the
 * attribute table joined by a newline inside one CDATA section.
 */
function buildDescription(marker: MarkerRecord): string | undefined {
  const hasAttributes = marker.attributes.size > 0;
  if (!marker.description && !hasAttributes) {
    return undefined;
  }
  if (!hasAttributes) {
    return escapeXml(marker.description);
  }

  const table = buildAttributeTable(marker.attributes);
  return wrapCdata(marker.description ? `${marker.description}\n${table}` : table);
}

function buildExtendedData(attributes: ReadonlyMap<string, string>): XmlNode | undefined {
  if (attributes.size === 0) {
    return undefined;
  }
  return {
    Data: Array.from(attributes, ([key, value]) => ({ "@_name": key, value })),
  };
}

function buildPlacemark(marker: MarkerRecord): XmlNode {
  return {
    name: marker.name,
    description: buildDescription(marker),
    styleUrl: `#${KML_DEFAULT_STYLE.id}`,
    ExtendedData: buildExtendedData(marker.attributes),
    Point: {
      coordinates: formatCoordinates(marker.coordinates),
    },
  };
}

/**
 * Renders markers as a KML document (two-space indentation, UTF-8
 * declaration). Every placemark points at the single default style.
 */
export function buildKmlDocument(
  markers: readonly MarkerRecord[],
  documentName: string = DEFAULT_DOCUMENT_NAME
): string {
  const xmlStructure: XmlNode = {
    kml: {
      "@_xmlns": KML_NAMESPACE,
      Document: {
        name: documentName,
        Style: {
          "@_id": KML_DEFAULT_STYLE.id,
          IconStyle: {
            color: KML_DEFAULT_STYLE.color,
            scale: KML_DEFAULT_STYLE.scale,
            Icon: {
              href: KML_DEFAULT_STYLE.iconHref,
            },
          },
        },
        Placemark: markers.map(buildPlacemark),
      },
    },
  };

  return '<?xml version="1.0" encoding="UTF-8"?>\n' + builder.build(xmlStructure);
}

/**
 * XML support for v1 responses
 *
 * v1 endpoints answer in XML unless JSON is requested. The JSON flavor is a
 * mechanical conversion of the XML (attributes become keys, element text
 * becomes `$`), so XML bodies are converted to that same shape and share
 * one normalization path.
 */

import { XMLParser } from "fast-xml-parser";

const PARSER_OPTIONS = {
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  ignoreDeclaration: true,
  parseAttributeValue: false,
  parseTagValue: false,
  trimValues: true,
};

export function createXmlParser(): XMLParser {
  return new XMLParser(PARSER_OPTIONS);
}

/**
 * Parses XML text into the v1 JSON shape.
 *
 * @example
 * ```typescript
 * xmlToV1Json('<response status="success"><value type="int">544</value></response>');
 * // { response: { status: "success", value: { type: "int", $: "544" } } }
 * ```
 */
export function xmlToV1Json(xml: string): unknown {
  return reshape(createXmlParser().parse(xml));
}

function reshape(node: unknown): unknown {
  if (Array.isArray(node)) {
    return node.map(reshape);
  }
  if (node === null || typeof node !== "object") {
    return node;
  }

  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(node)) {
    if (key === "#text") {
      out["$"] = value;
    } else if (key.startsWith("@_")) {
      out[key.slice(2)] = value;
    } else {
      out[key] = reshape(value);
    }
  }
  return out;
}

export function looksLikeXml(text: string): boolean {
  return text.trimStart().startsWith("<");
}

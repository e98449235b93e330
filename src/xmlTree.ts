import { XMLParser } from "fast-xml-parser";
import { ConversionError } from "./errors";

export interface XmlElement {
  name: string;
  attributes: Record<string, string>;
  children: XmlElement[];
  text: string;
}

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttributes(node: Record<string, unknown>): Record<string, string> {
  const raw = node[ATTRIBUTES_KEY];
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [key, value] of Object.entries(raw)) {
    attributes[key] = String(value);
  }
  return attributes;
}

// preserveOrder output: every node is `{ <tag>: [children], ":@": {attrs} }` or `{ "#text": value }`.
function toElements(nodes: unknown): { elements: XmlElement[]; text: string } {
  const elements: XmlElement[] = [];
  let text = "";
  if (!Array.isArray(nodes)) {
    return { elements, text };
  }
  for (const node of nodes) {
    if (!isRecord(node)) {
      continue;
    }
    for (const [key, value] of Object.entries(node)) {
      if (key === ATTRIBUTES_KEY) {
        continue;
      }
      if (key === TEXT_KEY) {
        text += String(value);
        continue;
      }
      const inner = toElements(value);
      elements.push({
        name: key,
        attributes: readAttributes(node),
        children: inner.elements,
        text: inner.text,
      });
    }
  }
  return { elements, text };
}

/**
 * Parses XML into an element tree that keeps sibling order across different
 * tag names. Namespace prefixes are dropped from tag and attribute names.
 */
export function parseXmlTree(xmlText: string): XmlElement {
  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: "",
    removeNSPrefix: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: true,
  });
  let parsed: unknown;
  try {
    parsed = parser.parse(xmlText, true);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConversionError("MalformedDocument", `cannot parse XML document: ${detail}`);
  }
  const root = toElements(parsed).elements[0];
  if (!root) {
    throw new ConversionError("MalformedDocument", "XML document has no root element");
  }
  return root;
}

export function childElements(parent: XmlElement, name: string): XmlElement[] {
  return parent.children.filter((child) => child.name === name);
}

export function firstChild(parent: XmlElement, name: string): XmlElement | undefined {
  return parent.children.find((child) => child.name === name);
}

export function requireChild(parent: XmlElement, name: string): XmlElement {
  const child = firstChild(parent, name);
  if (!child) {
    throw new ConversionError("MissingElement", `${name} element missing in ${describeElement(parent)}`);
  }
  return child;
}

export function requireAttribute(element: XmlElement, name: string): string {
  const value = element.attributes[name];
  if (value === undefined) {
    throw new ConversionError("MissingAttribute", `${describeElement(element)} has no ${name} attribute`);
  }
  return value;
}

export function describeElement(element: XmlElement): string {
  const label = element.attributes.cname ?? element.attributes.name;
  return label ? `${element.name} "${label}"` : element.name;
}

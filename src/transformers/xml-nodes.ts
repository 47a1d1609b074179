import { XMLBuilder, XMLParser, XMLValidator } from "fast-xml-parser";
import { z } from "zod";
import { MalformedInputError } from "../errors.js";

const ATTRIBUTES = ":@";
const TEXT = "#text";
const PREFIX = "@_";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: PREFIX,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
});

const builder = new XMLBuilder({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: PREFIX,
  suppressEmptyNode: true,
  suppressBooleanAttributes: false,
});

const orderedNodes = z.array(z.record(z.unknown()));
const attributeMap = z.record(z.string());

export type XmlNode =
  | { kind: "text"; value: string }
  | { kind: "element"; tag: string; attributes: Record<string, string>; children: XmlNode[] };

export type XmlElement = Extract<XmlNode, { kind: "element" }>;

/** fast-xml-parser's ordered representation, as fed to `XMLBuilder`. */
export type OrderedNode = Record<string, unknown>;

/** Turns fast-xml-parser's ordered output into typed nodes. */
function toNodes(raw: unknown): XmlNode[] {
  const parsed = orderedNodes.safeParse(raw);
  if (!parsed.success) throw new MalformedInputError("Unexpected XML structure");

  return parsed.data.map((node): XmlNode => {
    const value = node[TEXT];
    if (value !== undefined) return { kind: "text", value: String(value) };

    const tag = Object.keys(node).find((key) => key !== ATTRIBUTES);
    if (!tag) throw new MalformedInputError("Unexpected XML structure");
    const attrs = attributeMap.safeParse(node[ATTRIBUTES] ?? {});
    if (!attrs.success) throw new MalformedInputError(`Invalid attributes on <${tag}>`);

    const attributes: Record<string, string> = {};
    for (const [name, attr] of Object.entries(attrs.data)) {
      attributes[name.startsWith(PREFIX) ? name.slice(PREFIX.length) : name] = attr;
    }
    return { kind: "element", tag, attributes, children: toNodes(node[tag]) };
  });
}

/** Validates and parses an XML string, keeping document order. */
export function parseXml(source: string): XmlNode[] {
  const valid = XMLValidator.validate(source);
  if (valid !== true) {
    throw new MalformedInputError(`Invalid XML at line ${valid.err.line}: ${valid.err.msg}`);
  }
  return toNodes(parser.parse(source));
}

export function isElement(node: XmlNode): node is XmlElement {
  return node.kind === "element";
}

export function elementChildren(node: XmlElement): XmlElement[] {
  return node.children.filter(isElement);
}

/** Direct text children only. */
export function ownText(node: XmlElement): string {
  return node.children.map((child) => (child.kind === "text" ? child.value : "")).join("");
}

/** Every element named `tag` under `nodes`, in document order, without descending into matches. */
export function findAll(nodes: XmlNode[], tag: string): XmlElement[] {
  const found: XmlElement[] = [];
  for (const node of nodes) {
    if (!isElement(node)) continue;
    if (node.tag === tag) found.push(node);
    else found.push(...findAll(node.children, tag));
  }
  return found;
}

export function ordered(
  tag: string,
  children: OrderedNode[] = [],
  attributes: Record<string, string | number | boolean> = {},
): OrderedNode {
  const node: OrderedNode = { [tag]: children };
  const entries = Object.entries(attributes);
  if (entries.length > 0) {
    node[ATTRIBUTES] = Object.fromEntries(entries.map(([k, v]) => [PREFIX + k, String(v)]));
  }
  return node;
}

export function textNodes(value: string): OrderedNode[] {
  return value ? [{ [TEXT]: value }] : [];
}

export function buildXml(nodes: OrderedNode[]): string {
  const body: unknown = builder.build(nodes);
  return `<?xml version="1.0" encoding="UTF-8"?>\n${String(body)}\n`;
}

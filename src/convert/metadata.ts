/**
 * Document metadata from LaTeXML XML output.
 *
 * After latexml runs, its XML carries the title and author names as LaTeX
 * actually typeset them. These are handed to the EPUB packager.
 *
 * Uses fast-xml-parser with `preserveOrder: true` so mixed content (text,
 * inline math, formatting) keeps its order.
 */

import { readFile } from "node:fs/promises";
import { XMLParser } from "fast-xml-parser";

export interface DocumentMetadata {
  title?: string;
  authors: string[];
}

/**
 * A node in the preserveOrder output.
 * Either a text node `{ "#text": string | number }` or an element node
 * `{ tagName: OrderedNode[], ":@"?: { "@_attr": value } }`.
 */
type OrderedNode = Record<string, unknown>;

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: "@_",
  textNodeName: "#text",
  trimValues: false,
  parseTagValue: false,
  preserveOrder: true,
  processEntities: true,
  htmlEntities: true,
  removeNSPrefix: true,
  ignorePiTags: true,
});

/** Elements inside a title whose content is not part of the title text. */
const SKIPPED_ELEMENTS = new Set(["note", "break", "tag", "tags"]);

function isOrderedNode(value: unknown): value is OrderedNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toNodes(value: unknown): OrderedNode[] {
  return Array.isArray(value) ? value.filter(isOrderedNode) : [];
}

/** Get the tag name of an ordered node (the first key that isn't ":@" or "#text"). */
function getTagName(node: OrderedNode): string | undefined {
  for (const key of Object.keys(node)) {
    if (key !== ":@" && key !== "#text") return key;
  }
  return undefined;
}

/** Get the children array of an element node. */
function getChildren(node: OrderedNode): OrderedNode[] {
  const tag = getTagName(node);
  return tag ? toNodes(node[tag]) : [];
}

/** Get an attribute of an element node. */
function getAttr(node: OrderedNode, attrName: string): string | undefined {
  const attrs = node[":@"];
  if (!isOrderedNode(attrs)) return undefined;
  const val = attrs[`@_${attrName}`];
  return val != null ? String(val) : undefined;
}

/** Find all child elements with the given tag name. */
function findChildren(children: OrderedNode[], tagName: string): OrderedNode[] {
  return children.filter((child) => getTagName(child) === tagName);
}

/** Concatenate the text of a subtree; inline math is rendered as $tex$. */
function collectText(nodes: OrderedNode[]): string {
  let text = "";
  for (const node of nodes) {
    if ("#text" in node) {
      text += String(node["#text"]);
      continue;
    }
    const tag = getTagName(node);
    if (!tag || SKIPPED_ELEMENTS.has(tag)) continue;
    if (tag === "Math") {
      const tex = getAttr(node, "tex");
      text += tex !== undefined ? `$${tex}$` : collectText(getChildren(node));
      continue;
    }
    text += collectText(getChildren(node));
  }
  return text;
}

function normalizeWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

/** Parse title and author names from a LaTeXML XML document. */
export function parseLatexmlMetadata(xml: string): DocumentMetadata {
  const parsed: unknown = parser.parse(xml);
  const root = toNodes(parsed).find((node) => getTagName(node) === "document");
  if (!root) return { authors: [] };
  const children = getChildren(root);

  const metadata: DocumentMetadata = { authors: [] };

  const titleNode = findChildren(children, "title")[0];
  if (titleNode) {
    const title = normalizeWhitespace(collectText(getChildren(titleNode)));
    if (title) metadata.title = title;
  }

  for (const creator of findChildren(children, "creator")) {
    if (getAttr(creator, "role") !== "author") continue;
    for (const person of findChildren(getChildren(creator), "personname")) {
      const name = normalizeWhitespace(collectText(getChildren(person)));
      if (name) metadata.authors.push(name);
    }
  }

  return metadata;
}

/** Read metadata from a LaTeXML XML file. */
export async function readDocumentMetadata(xmlPath: string): Promise<DocumentMetadata> {
  const xml = await readFile(xmlPath, "utf-8");
  return parseLatexmlMetadata(xml);
}

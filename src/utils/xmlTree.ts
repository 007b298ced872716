/**
 * XML Tree Utilities
 * Parses XML into a generic tree of named nodes and evaluates simple
 * XPath-style path expressions against it.
 *
 * Supported path syntax (predicates are listed in xmlPath.ts):
 *   tag        child elements named `tag` (namespace prefixes kept, e.g. itunes:title)
 *   *          any child element
 *   .          the current node
 *   //         the current node and all of its descendants
 *   /a/b       absolute path, `a` must be the document root
 *   tag[...]   child elements named `tag` that pass a predicate
 */

import { XMLParser, XMLValidator } from "fast-xml-parser";
import { ParseError } from "./errors.js";
import { compilePath } from "./xmlPath.js";

export interface XmlNode {
  tag: string;
  attributes: Record<string, string>;
  /** Concatenated direct text content (CDATA included), trimmed */
  text: string;
  children: XmlNode[];
}

const ATTRIBUTES_KEY = ":@";
const TEXT_KEY = "#text";

const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: "",
  parseTagValue: false,
  parseAttributeValue: false,
  ignoreDeclaration: true,
  ignorePiTags: true,
  trimValues: true,
  // Also decodes numeric character references (&#8217; &#x2014;)
  htmlEntities: true,
});

const DEFAULT_ENCODING = "utf-8";
const DECLARATION_PATTERN = /^\s*<\?xml\s[^>]*?\bencoding\s*=\s*["']([A-Za-z0-9._-]+)["']/;

/**
 * Decodes a raw XML document using the encoding named in its `<?xml ... ?>`
 * declaration, or UTF-8 when it names none or one the runtime can't decode.
 */
export function decodeXml(bytes: Uint8Array): string {
  // Declarations are ASCII
  const head = new TextDecoder("latin1").decode(bytes.subarray(0, 256));
  const declared = DECLARATION_PATTERN.exec(head)?.[1];

  if (declared) {
    try {
      return new TextDecoder(declared).decode(bytes);
    } catch (error) {
      console.warn(`[feed] Unsupported encoding '${declared}', reading as UTF-8:`, error);
    }
  }
  return new TextDecoder(DEFAULT_ENCODING).decode(bytes);
}

/**
 * Parses an XML document and returns its root element.
 * Throws ParseError when the document is not well-formed.
 */
export function parseXml(xml: string): XmlNode {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new ParseError(`${msg} (line ${line}, column ${col})`);
  }

  let ordered: unknown;
  try {
    ordered = parser.parse(xml);
  } catch (error) {
    throw new ParseError(error instanceof Error ? error.message : String(error), error);
  }

  const [root] = toNodes(ordered).children;
  if (!root) {
    throw new ParseError("document has no root element");
  }
  return root;
}

/**
 * Returns every node matching `path`, in document order.
 * Throws ConfigError when `path` is not a supported expression.
 */
export function findAll(node: XmlNode, path: string): XmlNode[] {
  const { absolute, steps } = compilePath(path);
  let current: XmlNode[] = [absolute ? documentOf(node) : node];

  for (const step of steps) {
    if (step.kind === "self") continue;
    if (step.kind === "descendants") {
      current = descendantsOrSelf(current);
      continue;
    }
    current = current.flatMap((parent) =>
      step.filters.reduce(
        (candidates, filter) => filter(candidates),
        parent.children.filter((child) => step.tag === "*" || child.tag === step.tag)
      )
    );
  }

  return current;
}

/**
 * First node matching `path`, or undefined.
 */
export function findFirst(node: XmlNode, path: string): XmlNode | undefined {
  return findAll(node, path)[0];
}

function documentOf(root: XmlNode): XmlNode {
  return { tag: "", attributes: {}, text: "", children: [root] };
}

function descendantsOrSelf(nodes: XmlNode[]): XmlNode[] {
  const seen = new Set<XmlNode>();
  const visit = (node: XmlNode) => {
    if (seen.has(node)) return;
    seen.add(node);
    node.children.forEach(visit);
  };
  nodes.forEach(visit);
  return [...seen];
}

/**
 * Folds fast-xml-parser's ordered output (`[{ tag: [...], ":@": {...} }, { "#text": "..." }]`)
 * into a container node.
 */
function toNodes(entries: unknown): XmlNode {
  const container: XmlNode = { tag: "", attributes: {}, text: "", children: [] };
  if (!Array.isArray(entries)) {
    return container;
  }

  const textParts: string[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;

    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY) continue;
      if (key === TEXT_KEY) {
        textParts.push(String(value));
        continue;
      }

      const inner = toNodes(value);
      container.children.push({
        tag: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        text: inner.text,
        children: inner.children,
      });
    }
  }

  container.text = textParts.join("").trim();
  return container;
}

function toAttributes(raw: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(raw)) {
    return attributes;
  }
  for (const [name, value] of Object.entries(raw)) {
    attributes[name] = String(value);
  }
  return attributes;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

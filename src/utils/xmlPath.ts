/**
 * XML Path Expressions
 * Compiles XPath-style path strings into steps that `findAll` walks.
 *
 * Predicates, written after a tag in brackets and applied per parent:
 *   [2]              second matching child (1-based)
 *   [last()]         last matching child; [last()-1] the one before it
 *   [tag]            has a child named `tag`
 *   [tag='text']     has a child named `tag` whose text equals `text`
 *   [.='text']       own text equals `text`
 *   [@attr]          has attribute `attr`
 *   [@attr='value']  attribute `attr` equals `value`
 */

import type { XmlNode } from "./xmlTree.js";
import { ConfigError } from "./errors.js";

export type NodeFilter = (candidates: XmlNode[]) => XmlNode[];

export type PathStep =
  | { kind: "self" }
  | { kind: "descendants" }
  | { kind: "child"; tag: string; filters: NodeFilter[] };

export interface CompiledPath {
  absolute: boolean;
  steps: PathStep[];
}

const NAME = "[A-Za-z_][\\w.:-]*";
const TAG_PATTERN = new RegExp(`^(?:\\*|${NAME})$`);
const POSITION_PATTERN = /^(\d+)$/;
const LAST_PATTERN = /^last\(\)(?:\s*-\s*(\d+))?$/;
const HAS_ATTRIBUTE_PATTERN = new RegExp(`^@(${NAME})$`);
const ATTRIBUTE_EQUALS_PATTERN = new RegExp(`^@(${NAME})\\s*=\\s*(['"])(.*)\\2$`);
const HAS_CHILD_PATTERN = new RegExp(`^(${NAME})$`);
const TEXT_EQUALS_PATTERN = new RegExp(`^(${NAME}|\\.)\\s*=\\s*(['"])(.*)\\2$`);

/**
 * Parses a path expression.
 * Throws ConfigError on syntax it does not support.
 */
export function compilePath(path: string): CompiledPath {
  let expression = path.trim();
  const absolute = expression.startsWith("/");
  if (absolute) {
    expression = expression.slice(1);
  }

  const segments = splitSegments(expression, path);
  const steps: PathStep[] = [];
  segments.forEach((segment, index) => {
    if (segment === "") {
      // A trailing slash selects nothing extra
      if (index < segments.length - 1) {
        steps.push({ kind: "descendants" });
      }
      return;
    }
    if (segment === ".") {
      steps.push({ kind: "self" });
      return;
    }
    steps.push(compileStep(segment, path));
  });

  return { absolute, steps };
}

function splitSegments(expression: string, path: string): string[] {
  const segments: string[] = [];
  let current = "";
  let quote: string | null = null;
  let depth = 0;

  for (const char of expression) {
    if (quote) {
      if (char === quote) quote = null;
    } else if (char === "'" || char === '"') {
      quote = char;
    } else if (char === "[") {
      depth++;
    } else if (char === "]") {
      depth--;
      if (depth < 0) throw invalidPath(path, "unbalanced brackets");
    } else if (char === "/" && depth === 0) {
      segments.push(current);
      current = "";
      continue;
    }
    current += char;
  }

  if (quote) throw invalidPath(path, "unterminated quote");
  if (depth !== 0) throw invalidPath(path, "unbalanced brackets");
  segments.push(current);
  return segments;
}

function compileStep(segment: string, path: string): PathStep {
  const bracket = segment.indexOf("[");
  const tag = bracket === -1 ? segment : segment.slice(0, bracket);

  if (tag === "..") {
    throw invalidPath(path, "parent steps are not supported");
  }
  if (!TAG_PATTERN.test(tag)) {
    throw invalidPath(path, `'${tag}' is not a tag name`);
  }

  const filters = bracket === -1 ? [] : readPredicates(segment.slice(bracket), path);
  return { kind: "child", tag, filters };
}

/**
 * Splits `[a][@b='c]d']` into its predicate bodies and compiles each one.
 */
function readPredicates(text: string, path: string): NodeFilter[] {
  const filters: NodeFilter[] = [];
  let rest = text;

  while (rest.length > 0) {
    if (!rest.startsWith("[")) {
      throw invalidPath(path, `unexpected '${rest}'`);
    }
    let quote: string | null = null;
    let end = -1;
    for (let i = 1; i < rest.length; i++) {
      const char = rest.charAt(i);
      if (quote) {
        if (char === quote) quote = null;
      } else if (char === "'" || char === '"') {
        quote = char;
      } else if (char === "]") {
        end = i;
        break;
      }
    }
    if (end === -1) {
      throw invalidPath(path, "unbalanced brackets");
    }
    filters.push(compilePredicate(rest.slice(1, end).trim(), path));
    rest = rest.slice(end + 1);
  }

  return filters;
}

function compilePredicate(body: string, path: string): NodeFilter {
  const position = POSITION_PATTERN.exec(body);
  if (position) {
    const index = Number(position[1]) - 1;
    if (index < 0) throw invalidPath(path, "positions start at 1");
    return (candidates) => pick(candidates, index);
  }

  const last = LAST_PATTERN.exec(body);
  if (last) {
    const offset = Number(last[1] ?? 0);
    return (candidates) => pick(candidates, candidates.length - 1 - offset);
  }

  const hasAttribute = HAS_ATTRIBUTE_PATTERN.exec(body);
  if (hasAttribute) {
    const name = hasAttribute[1];
    return (candidates) => candidates.filter((node) => name in node.attributes);
  }

  const attributeEquals = ATTRIBUTE_EQUALS_PATTERN.exec(body);
  if (attributeEquals) {
    const [, name, , value] = attributeEquals;
    return (candidates) => candidates.filter((node) => node.attributes[name] === value);
  }

  const hasChild = HAS_CHILD_PATTERN.exec(body);
  if (hasChild) {
    const name = hasChild[1];
    return (candidates) =>
      candidates.filter((node) => node.children.some((child) => child.tag === name));
  }

  const textEquals = TEXT_EQUALS_PATTERN.exec(body);
  if (textEquals) {
    const [, name, , value] = textEquals;
    if (name === ".") {
      return (candidates) => candidates.filter((node) => node.text === value);
    }
    return (candidates) =>
      candidates.filter((node) =>
        node.children.some((child) => child.tag === name && child.text === value)
      );
  }

  throw invalidPath(path, `unsupported predicate '[${body}]'`);
}

function pick(candidates: XmlNode[], index: number): XmlNode[] {
  const node = candidates[index];
  return index >= 0 && node ? [node] : [];
}

function invalidPath(path: string, reason: string): ConfigError {
  return new ConfigError(`Invalid path expression '${path}': ${reason}`);
}

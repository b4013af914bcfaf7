import * as cheerio from "cheerio";
import type { CheerioAPI } from "cheerio";
import { isCDATA, isTag, isText } from "domhandler";
import type { AnyNode, CDATA, Document, Element, Text } from "domhandler";
import { XMLValidator } from "fast-xml-parser";
import { InvariantError, ParseError } from "./errors";
import type { Side } from "./types";

export type ParsedXml = {
  side: Side;
  xml: string;
  $: CheerioAPI;
  document: Document;
  root: Element;
};

export type ClassifiedNode =
  | { kind: "element"; node: Element }
  | { kind: "text"; node: Text }
  | { kind: "cdata"; node: CDATA }
  | { kind: "other"; node: AnyNode };

/** Comments, processing instructions and directives all land in `other`. */
export function classifyNode(node: AnyNode): ClassifiedNode {
  if (isTag(node)) return { kind: "element", node };
  if (isText(node)) return { kind: "text", node };
  if (isCDATA(node)) return { kind: "cdata", node };
  return { kind: "other", node };
}

/**
 * Parses a document for reading only. Entities stay encoded and every node keeps its source range, so the
 * source string itself remains the one copy that gets rewritten.
 */
export function parseXmlDocument(xml: string, side: Side): ParsedXml {
  const verdict = XMLValidator.validate(xml);
  if (verdict !== true) {
    const { msg, line, col } = verdict.err;
    throw new ParseError(`${side} document is not well-formed XML: ${msg} (line ${line}, column ${col})`, side, line, col);
  }

  const $ = cheerio.load(xml, {
    xml: { withStartIndices: true, withEndIndices: true, decodeEntities: false }
  });
  const document = $.root()[0];
  const root = document.children.find(isTag);
  if (!root) throw new ParseError(`${side} document has no root element`, side);
  return { side, xml, $, document, root };
}

export function assertWellFormed(xml: string, what: string): void {
  const verdict = XMLValidator.validate(xml);
  if (verdict !== true) {
    throw new InvariantError(`${what} is not well-formed: ${verdict.err.msg} (line ${verdict.err.line})`);
  }
}

export function localName(name: string): string {
  const i = name.indexOf(":");
  return i === -1 ? name : name.slice(i + 1);
}

/** Half-open source range `[start, end)` of a node. */
export function nodeRange(node: AnyNode): { start: number; end: number } {
  if (node.startIndex === null || node.endIndex === null) {
    throw new InvariantError("parsed node has no source position");
  }
  return { start: node.startIndex, end: node.endIndex + 1 };
}

/** Index of the `>` closing the start tag that begins at `start`. */
export function findStartTagEnd(xml: string, start: number): number {
  let quote: string | null = null;
  for (let i = start + 1; i < xml.length; i++) {
    const c = xml[i];
    if (quote) {
      if (c === quote) quote = null;
      continue;
    }
    if (c === '"' || c === "'") quote = c;
    else if (c === ">") return i;
  }
  throw new InvariantError(`unterminated start tag at offset ${start}`);
}

export type ElementLayout = {
  selfClosing: boolean;
  attributeOffset: number;
  contentStart: number;
  contentEnd: number;
};

export function elementLayout(xml: string, el: Element): ElementLayout {
  const { start, end } = nodeRange(el);
  const tagEnd = findStartTagEnd(xml, start);
  const selfClosing = xml[tagEnd - 1] === "/";
  let attributeOffset = selfClosing ? tagEnd - 1 : tagEnd;
  while (attributeOffset > start && /\s/.test(xml[attributeOffset - 1])) attributeOffset--;
  if (selfClosing) return { selfClosing, attributeOffset, contentStart: tagEnd + 1, contentEnd: tagEnd + 1 };
  const closeStart = xml.lastIndexOf("<", end - 1);
  if (closeStart <= tagEnd) throw new InvariantError(`element <${el.name}> at offset ${start} has no end tag`);
  return { selfClosing, attributeOffset, contentStart: tagEnd + 1, contentEnd: closeStart };
}

/** Language declared in the TEI header, if any. */
export function documentLanguage(doc: ParsedXml): string | null {
  const ident = doc.$("profileDesc langUsage language").first().attr("ident");
  const v = String(ident ?? "").trim();
  return v ? v : null;
}

export type EntityDeclaration = { name: string; declaration: string };

const DOCTYPE_SUBSET = /<!DOCTYPE\s[^[>]*\[([\s\S]*)\]\s*>/;
const ENTITY_DECLARATION = /<!ENTITY\s+(%\s+)?([^\s"'>]+)/g;

/**
 * Entity declarations of the document's internal DTD subset, in order. A name declared twice keeps its first
 * declaration, which is the one an XML processor binds.
 */
export function entityDeclarations(doc: ParsedXml): EntityDeclaration[] {
  const prolog = doc.xml.slice(0, nodeRange(doc.root).start);
  const subset = DOCTYPE_SUBSET.exec(prolog)?.[1];
  if (!subset) return [];

  const out: EntityDeclaration[] = [];
  const seen = new Set<string>();
  const re = ENTITY_DECLARATION;
  re.lastIndex = 0;
  for (let m = re.exec(subset); m; m = re.exec(subset)) {
    const end = findStartTagEnd(subset, m.index);
    const name = `${m[1] ? "% " : ""}${m[2]}`;
    if (!seen.has(name)) {
      seen.add(name);
      out.push({ name, declaration: subset.slice(m.index, end + 1) });
    }
    re.lastIndex = end + 1;
  }
  return out;
}

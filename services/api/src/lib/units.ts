import { isTag, isText } from "domhandler";
import type { AnyNode, Element } from "domhandler";
import { scanXmlText } from "./text";
import type { AlignableUnit, CharAnchor, UnitOptions } from "./types";
import { classifyNode, elementLayout, localName, nodeRange, type ParsedXml } from "./xml";

export const DEFAULT_UNIT_OPTIONS: UnitOptions = {
  unitElements: ["p", "head"],
  scopeElements: ["body"],
  opaqueElements: ["note", "pb", "cb", "milestone", "fw", "figure", "gap"],
  breakElements: ["lb"],
  idAttribute: "xml:id"
};

type RawChar = CharAnchor & { ch: string };

type Range = { start: number; end: number };

function collectChars(nodes: AnyNode[], enclosing: Range | null, opts: UnitOptions, out: RawChar[]): void {
  for (const child of nodes) {
    const c = classifyNode(child);
    switch (c.kind) {
      case "text": {
        for (const sc of scanXmlText(c.node.data, nodeRange(c.node).start)) {
          out.push({ ch: sc.ch, anchorStart: enclosing?.start ?? sc.start, anchorEnd: enclosing?.end ?? sc.end });
        }
        break;
      }
      case "cdata": {
        const range = enclosing ?? nodeRange(c.node);
        const data = c.node.children.map((t) => (isText(t) ? t.data : "")).join("");
        for (let k = 0; k < data.length; k++) out.push({ ch: data[k], anchorStart: range.start, anchorEnd: range.end });
        break;
      }
      case "element": {
        const name = localName(c.node.name);
        if (opts.unitElements.includes(name) || opts.opaqueElements.includes(name)) break;
        const range = enclosing ?? nodeRange(c.node);
        if (opts.breakElements.includes(name)) {
          if (c.node.attribs["break"] !== "no") out.push({ ch: " ", anchorStart: range.start, anchorEnd: range.end });
          break;
        }
        collectChars(c.node.children, range, opts, out);
        break;
      }
      case "other":
        break;
    }
  }
}

function normalizeChars(raw: RawChar[]): { text: string; chars: CharAnchor[] } {
  const chars: CharAnchor[] = [];
  let text = "";
  let pendingSpace = false;
  for (const c of raw) {
    if (/\s/.test(c.ch)) {
      pendingSpace = true;
      continue;
    }
    if (pendingSpace && text.length > 0) {
      text += " ";
      chars.push({ anchorStart: c.anchorStart, anchorEnd: c.anchorStart });
    }
    pendingSpace = false;
    text += c.ch;
    chars.push({ anchorStart: c.anchorStart, anchorEnd: c.anchorEnd });
  }
  return { text, chars };
}

/**
 * Normalized text of an element as the aligner sees it: nested units and opaque elements contribute nothing,
 * break elements contribute a space, whitespace runs collapse to one space.
 */
export function extractElementText(el: Element, opts: UnitOptions = DEFAULT_UNIT_OPTIONS): { text: string; chars: CharAnchor[] } {
  const raw: RawChar[] = [];
  collectChars(el.children, null, opts, raw);
  return normalizeChars(raw);
}

function hasScope(el: Element, opts: UnitOptions): boolean {
  if (opts.scopeElements.includes(localName(el.name))) return true;
  return el.children.some((c) => isTag(c) && hasScope(c, opts));
}

/** Alignable units of a document in pre-order, with their tree addresses from the document node. */
export function extractUnits(doc: ParsedXml, opts: UnitOptions = DEFAULT_UNIT_OPTIONS): AlignableUnit[] {
  const units: AlignableUnit[] = [];
  const scoped = hasScope(doc.root, opts);

  const visit = (el: Element, path: number[], inScope: boolean) => {
    const name = localName(el.name);
    const active = inScope || opts.scopeElements.includes(name);
    if (active && opts.unitElements.includes(name)) {
      const layout = elementLayout(doc.xml, el);
      if (!layout.selfClosing) {
        const { text, chars } = extractElementText(el, opts);
        if (text.length > 0) {
          units.push({
            index: units.length,
            name,
            path,
            text,
            chars,
            attributeOffset: layout.attributeOffset,
            contentStart: layout.contentStart,
            contentEnd: layout.contentEnd,
            hasIdAttribute: el.attribs[opts.idAttribute] !== undefined
          });
        }
      }
    }
    el.children.forEach((child, i) => {
      if (isTag(child)) visit(child, [...path, i], active);
    });
  };

  const rootIndex = doc.document.children.indexOf(doc.root);
  visit(doc.root, [rootIndex], !scoped);
  return units;
}

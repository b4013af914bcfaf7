import * as cheerio from "cheerio";
import { isTag } from "domhandler";
import type { AnyNode } from "domhandler";
import { escapeXml } from "./text";
import type { AnnotationNames } from "./types";
import { elementLayout, findStartTagEnd, nodeRange } from "./xml";

type Cut = { start: number; end: number };

/**
 * Removes the identifier attributes and wrapper elements carrying `ids` from an annotated document. Applied
 * to annotator output this yields the input document again. Elements are located on the parsed tree, so
 * markup-like text in comments, CDATA sections or processing instructions is never mistaken for a tag.
 */
export function stripAnnotations(xml: string, ids: Iterable<string>, names: AnnotationNames): string {
  const wanted = new Set(ids);
  if (wanted.size === 0) return xml;

  const $ = cheerio.load(xml, {
    xml: { withStartIndices: true, withEndIndices: true, decodeEntities: false }
  });
  const cuts: Cut[] = [];

  const visit = (nodes: AnyNode[]) => {
    for (const node of nodes) {
      if (!isTag(node)) continue;
      const id = node.attribs[names.idAttribute];
      if (id !== undefined && wanted.has(id)) {
        const { start, end } = nodeRange(node);
        const tagEnd = findStartTagEnd(xml, start);
        const attribute = ` ${names.idAttribute}="${escapeXml(id)}"`;
        if (xml.slice(start, tagEnd + 1) === `<${names.wrapperElement}${attribute}>`) {
          const layout = elementLayout(xml, node);
          cuts.push({ start, end: layout.contentStart }, { start: layout.contentEnd, end });
        } else {
          // inserted after the element's last attribute
          const at = xml.lastIndexOf(attribute, tagEnd);
          if (at > start) cuts.push({ start: at, end: at + attribute.length });
        }
      }
      visit(node.children);
    }
  };
  visit($.root()[0].children);

  cuts.sort((a, b) => a.start - b.start);
  let out = "";
  let pos = 0;
  for (const cut of cuts) {
    out += xml.slice(pos, cut.start);
    pos = cut.end;
  }
  return out + xml.slice(pos);
}

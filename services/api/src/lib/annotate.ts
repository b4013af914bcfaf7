import { InvariantError } from "./errors";
import { coversWholeUnit } from "./sentences";
import { escapeXml } from "./text";
import type { AlignableUnit, AlignmentGroup, AnnotationNames, Side, UnitAnnotation, UnitState } from "./types";
import { nodeRange, type ParsedXml } from "./xml";

export const DEFAULT_ANNOTATION_NAMES: AnnotationNames = {
  idAttribute: "xml:id",
  wrapperElement: "seg"
};

export type AnnotatedDocument = {
  xml: string;
  /** The root element with its insertions, ready to be embedded in the corpus. */
  rootXml: string;
  identifiers: string[];
  states: UnitState[];
};

type Insertion = { offset: number; seq: number; text: string };

export function planUnitAnnotations(units: AlignableUnit[], groups: AlignmentGroup[], side: Side): Map<number, UnitAnnotation> {
  const plan = new Map<number, UnitAnnotation>();
  for (const group of groups) {
    for (const p of group[side]) {
      const unit = units[p.unit];
      if (!unit) throw new InvariantError(`${side} participant refers to unknown unit ${p.unit}`);
      const existing = plan.get(p.unit);
      if (p.span === null || coversWholeUnit(unit, p.span)) {
        if (existing) throw new InvariantError(`${side} unit ${p.unit} is annotated twice`);
        plan.set(p.unit, { kind: "whole", id: p.id });
        continue;
      }
      if (existing?.kind === "whole") throw new InvariantError(`${side} unit ${p.unit} is annotated twice`);
      const segments = existing && existing.kind === "segmented" ? existing.segments : [];
      segments.push({ span: p.span, id: p.id });
      plan.set(p.unit, { kind: "segmented", segments });
    }
  }
  for (const a of plan.values()) {
    if (a.kind === "segmented") a.segments.sort((x, y) => x.span.start - y.span.start);
  }
  return plan;
}

export function unitState(annotation: UnitAnnotation | undefined): UnitState {
  if (!annotation) return "none";
  return annotation.kind;
}

export function applyInsertions(xml: string, insertions: Insertion[]): string {
  const ordered = [...insertions].sort((a, b) => a.offset - b.offset || a.seq - b.seq);
  let out = "";
  let pos = 0;
  for (const ins of ordered) {
    out += xml.slice(pos, ins.offset) + ins.text;
    pos = ins.offset;
  }
  return out + xml.slice(pos);
}

/**
 * Rewrites a document by inserting identifier attributes and wrapper elements into its source text. Nothing
 * is removed or re-serialized, so every byte outside the insertions is the input's.
 */
export function annotateDocument(
  doc: ParsedXml,
  units: AlignableUnit[],
  plan: Map<number, UnitAnnotation>,
  names: AnnotationNames = DEFAULT_ANNOTATION_NAMES
): AnnotatedDocument {
  const insertions: Insertion[] = [];
  const push = (offset: number, text: string) => insertions.push({ offset, seq: insertions.length, text });
  const attribute = (id: string) => ` ${names.idAttribute}="${escapeXml(id)}"`;
  const open = (id: string) => `<${names.wrapperElement}${attribute(id)}>`;
  const close = `</${names.wrapperElement}>`;

  const identifiers: string[] = [];
  const states: UnitState[] = [];

  for (const unit of units) {
    const annotation = plan.get(unit.index);
    states.push(unitState(annotation));
    if (!annotation) continue;

    if (annotation.kind === "whole") {
      // an identifier the author already set is left alone; the content is wrapped instead
      if (unit.hasIdAttribute) {
        push(unit.contentStart, open(annotation.id));
        push(unit.contentEnd, close);
      } else {
        push(unit.attributeOffset, attribute(annotation.id));
      }
      identifiers.push(annotation.id);
      continue;
    }

    for (const { span, id } of annotation.segments) {
      push(span.anchorStart, open(id));
      push(span.anchorEnd, close);
      identifiers.push(id);
    }
  }

  const xml = applyInsertions(doc.xml, insertions);
  const { start, end } = nodeRange(doc.root);
  const added = insertions.reduce((n, ins) => n + ins.text.length, 0);
  return { xml, rootXml: xml.slice(start, end + added), identifiers, states };
}

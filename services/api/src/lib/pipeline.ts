import { DEFAULT_ALIGN_PARAMS, type Aligner } from "./ai/aligner";
import { alignUnits } from "./align";
import { annotateDocument, DEFAULT_ANNOTATION_NAMES, planUnitAnnotations, type AnnotatedDocument } from "./annotate";
import { InvariantError, ParseError } from "./errors";
import { buildAlignmentGroups, randomId, type MintId } from "./groups";
import { DEFAULT_CORPUS_HEADER, renderCorpusXml, type CorpusHeader } from "./render";
import { stripAnnotations } from "./strip";
import type { AlignmentGroup, AlignParams, AnnotationNames, GranularityDecision, UnitOptions } from "./types";
import { DEFAULT_UNIT_OPTIONS, extractUnits } from "./units";
import { assertWellFormed, documentLanguage, entityDeclarations, parseXmlDocument, type ParsedXml } from "./xml";

export type AlignTeiOptions = {
  units: UnitOptions;
  names: AnnotationNames;
  promotionThreshold: number;
  verifyRoundTrip: boolean;
  header: CorpusHeader;
  debug: boolean;
};

export const DEFAULT_ALIGN_OPTIONS: AlignTeiOptions = {
  units: DEFAULT_UNIT_OPTIONS,
  names: DEFAULT_ANNOTATION_NAMES,
  promotionThreshold: 0.5,
  verifyRoundTrip: true,
  header: DEFAULT_CORPUS_HEADER,
  debug: false
};

export type AlignedCorpus = {
  xml: string;
  sourceLanguage: string;
  targetLanguage: string;
  groups: AlignmentGroup[];
  decisions: GranularityDecision[];
  source: AnnotatedDocument;
  target: AnnotatedDocument;
  alignmentCount: number;
  processingTime: number;
};

export const FALLBACK_LANGUAGE = "en";

function resolveLanguage(explicit: string | null | undefined, doc: ParsedXml): string {
  const v = String(explicit ?? "").trim();
  return v || documentLanguage(doc) || FALLBACK_LANGUAGE;
}

function verifyRoundTrip(doc: ParsedXml, annotated: AnnotatedDocument, names: AnnotationNames): void {
  if (stripAnnotations(annotated.xml, annotated.identifiers, names) !== doc.xml) {
    throw new InvariantError(`${doc.side} document does not round-trip after annotation`);
  }
}

/**
 * Entity declarations for the corpus DOCTYPE: each document's internal-subset entities, once. Both documents
 * share one DTD in the corpus, so a name the two declare differently cannot be carried.
 */
export function corpusEntityDeclarations(source: ParsedXml, target: ParsedXml): string[] {
  const byName = new Map<string, string>();
  for (const d of entityDeclarations(source)) byName.set(d.name, d.declaration);
  for (const d of entityDeclarations(target)) {
    const prev = byName.get(d.name);
    if (prev === undefined) byName.set(d.name, d.declaration);
    else if (prev.replace(/\s+/g, " ") !== d.declaration.replace(/\s+/g, " ")) {
      throw new ParseError(`target document declares entity ${d.name} differently from the source document`, "target");
    }
  }
  return [...byName.values()];
}

/**
 * Aligns two TEI documents and composes the parallel corpus. All or nothing: any failure rejects and no
 * partial corpus is produced.
 */
export async function alignTeiDocuments(req: {
  sourceXml: string;
  targetXml: string;
  sourceLanguage?: string | null;
  targetLanguage?: string | null;
  params?: Partial<AlignParams>;
  aligner: Aligner;
  options?: Partial<AlignTeiOptions>;
  mintId?: MintId;
}): Promise<AlignedCorpus> {
  const started = Date.now();
  const opts: AlignTeiOptions = { ...DEFAULT_ALIGN_OPTIONS, ...req.options };
  const params: AlignParams = { ...DEFAULT_ALIGN_PARAMS, ...req.params };

  const source = parseXmlDocument(req.sourceXml, "source");
  const target = parseXmlDocument(req.targetXml, "target");
  const declarations = corpusEntityDeclarations(source, target);
  const sourceLanguage = resolveLanguage(req.sourceLanguage, source);
  const targetLanguage = resolveLanguage(req.targetLanguage, target);

  const sourceUnits = extractUnits(source, opts.units);
  const targetUnits = extractUnits(target, opts.units);
  if (opts.debug) console.log(`[align] ${sourceUnits.length} source units (${sourceLanguage}), ${targetUnits.length} target units (${targetLanguage})`);

  const { correspondences, decisions } = await alignUnits({
    source: { units: sourceUnits, language: sourceLanguage },
    target: { units: targetUnits, language: targetLanguage },
    aligner: req.aligner,
    params,
    promotionThreshold: opts.promotionThreshold,
    debug: opts.debug
  });

  const groups = buildAlignmentGroups(correspondences, req.mintId ?? randomId);
  const annotatedSource = annotateDocument(source, sourceUnits, planUnitAnnotations(sourceUnits, groups, "source"), opts.names);
  const annotatedTarget = annotateDocument(target, targetUnits, planUnitAnnotations(targetUnits, groups, "target"), opts.names);
  if (opts.verifyRoundTrip) {
    verifyRoundTrip(source, annotatedSource, opts.names);
    verifyRoundTrip(target, annotatedTarget, opts.names);
  }

  const xml = renderCorpusXml({
    sourceLanguage,
    targetLanguage,
    groups,
    sourceRoot: annotatedSource.rootXml,
    targetRoot: annotatedTarget.rootXml,
    header: opts.header,
    entityDeclarations: declarations
  });
  assertWellFormed(xml, "aligned corpus");

  return {
    xml,
    sourceLanguage,
    targetLanguage,
    groups,
    decisions,
    source: annotatedSource,
    target: annotatedTarget,
    alignmentCount: groups.length,
    processingTime: (Date.now() - started) / 1000
  };
}

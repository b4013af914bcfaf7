import type { Aligner } from "./ai/aligner";
import { AlignmentError, errorMessage } from "./errors";
import { segmentUnit } from "./sentences";
import type {
  AlignableUnit,
  AlignParams,
  Correspondence,
  FallbackReason,
  GranularityDecision,
  ParticipantRef,
  RetainedCorrespondence,
  SentenceSpan
} from "./types";

export type AdapterSide = {
  units: AlignableUnit[];
  language: string;
};

export type AdapterResult = {
  correspondences: RetainedCorrespondence[];
  decisions: GranularityDecision[];
};

type SpanRef = { unit: number; span: SentenceSpan };

/** Checks the aligner's guarantee: each side's indices, read in order, are exactly 0..count-1. */
export function assertCoverage(correspondences: Correspondence[], sourceCount: number, targetCount: number): void {
  const check = (side: "source" | "target", count: number) => {
    const seen = correspondences.flatMap((c) => c[side]);
    const ok = seen.length === count && seen.every((x, i) => x === i);
    if (!ok) throw new AlignmentError(`aligner output does not cover the ${count} ${side} items exactly once in order`);
  };
  check("source", sourceCount);
  check("target", targetCount);
}

async function callAligner(aligner: Aligner, source: string[], target: string[], params: AlignParams): Promise<Correspondence[]> {
  let out: Correspondence[];
  try {
    out = await aligner.align(source, target, params);
  } catch (e) {
    if (e instanceof AlignmentError) throw e;
    throw new AlignmentError(`aligner failed: ${errorMessage(e)}`);
  }
  assertCoverage(out, source.length, target.length);
  return out;
}

/**
 * Aligns two unit sequences and decides, per retained correspondence, whether it stays whole-unit or is
 * promoted to sentence granularity by a second aligner pass restricted to its sentences.
 */
export async function alignUnits(input: {
  source: AdapterSide;
  target: AdapterSide;
  aligner: Aligner;
  params: AlignParams;
  promotionThreshold: number;
  debug?: boolean;
}): Promise<AdapterResult> {
  const { source, target, aligner, params, promotionThreshold } = input;
  if (source.units.length === 0) throw new AlignmentError("source document has no alignable text");
  if (target.units.length === 0) throw new AlignmentError("target document has no alignable text");

  const unitCorrespondences = await callAligner(
    aligner,
    source.units.map((u) => u.text),
    target.units.map((u) => u.text),
    params
  );

  const spanCache = new Map<AlignableUnit, SentenceSpan[]>();
  const spansOf = (side: AdapterSide, indices: number[]): SpanRef[] =>
    indices.flatMap((unit) => {
      const u = side.units[unit];
      let spans = spanCache.get(u);
      if (!spans) {
        spans = segmentUnit(u, side.language);
        spanCache.set(u, spans);
      }
      return spans.map((span) => ({ unit, span }));
    });

  const whole = (indices: number[]): ParticipantRef[] => indices.map((unit) => ({ unit, span: null }));

  const correspondences: RetainedCorrespondence[] = [];
  const decisions: GranularityDecision[] = [];

  for (let ci = 0; ci < unitCorrespondences.length; ci++) {
    const c = unitCorrespondences[ci];
    if (c.source.length === 0 || c.target.length === 0) continue;
    const keepWhole = (reason: FallbackReason) => {
      decisions.push({ kind: "unit", correspondence: ci, reason });
      correspondences.push({ granularity: "unit", score: c.score, source: whole(c.source), target: whole(c.target) });
    };

    let srcSpans: SpanRef[];
    let tgtSpans: SpanRef[];
    try {
      srcSpans = spansOf(source, c.source);
      tgtSpans = spansOf(target, c.target);
    } catch (e) {
      console.warn(`[align] sentence split failed for correspondence ${ci}: ${errorMessage(e)}`);
      keepWhole("split_failed");
      continue;
    }
    if (srcSpans.length <= 1 && tgtSpans.length <= 1) {
      keepWhole("single_sentence");
      continue;
    }

    const sub = await callAligner(
      aligner,
      srcSpans.map((s) => s.span.text),
      tgtSpans.map((s) => s.span.text),
      params
    );
    const matched = sub.filter((s) => s.source.length > 0 && s.target.length > 0);
    const bestScore = matched.reduce((best, s) => Math.max(best, s.score), -Infinity);
    if (!(bestScore > promotionThreshold)) {
      if (input.debug) console.log(`[align] correspondence ${ci} stays whole-unit (best sentence score ${bestScore.toFixed(3)})`);
      keepWhole("below_threshold");
      continue;
    }

    decisions.push({ kind: "promoted", correspondence: ci, sentenceLinks: matched.length, bestScore });
    for (const s of matched) {
      correspondences.push({
        granularity: "sentence",
        score: s.score,
        source: s.source.map((k) => srcSpans[k]),
        target: s.target.map((k) => tgtSpans[k])
      });
    }
  }

  return { correspondences, decisions };
}

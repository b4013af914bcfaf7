import type { AlignableUnit, SentenceRange, SentenceSpan } from "./types";

/**
 * ICU sentence segmentation for `language`. Ranges are trimmed, so the text between two consecutive ranges
 * is whitespace only. Throws RangeError for a malformed language tag.
 */
export function splitSentences(text: string, language: string): SentenceRange[] {
  const segmenter = new Intl.Segmenter(language, { granularity: "sentence" });
  const out: SentenceRange[] = [];
  for (const seg of segmenter.segment(text)) {
    let start = seg.index;
    let end = seg.index + seg.segment.length;
    while (start < end && /\s/.test(text[start])) start++;
    while (end > start && /\s/.test(text[end - 1])) end--;
    if (end > start) out.push({ start, end });
  }
  return out;
}

/**
 * Sentence spans of a unit with their raw anchors. A boundary that falls inside a nested inline element
 * cannot carry a wrapper, so the sentences on either side of it are merged into one span.
 */
export function segmentUnit(unit: AlignableUnit, language: string): SentenceSpan[] {
  const spans: SentenceSpan[] = [];
  for (const r of splitSentences(unit.text, language)) {
    const anchorStart = unit.chars[r.start].anchorStart;
    const anchorEnd = unit.chars[r.end - 1].anchorEnd;
    const prev = spans.length > 0 ? spans[spans.length - 1] : null;
    if (prev && anchorStart < prev.anchorEnd) {
      prev.end = r.end;
      prev.text = unit.text.slice(prev.start, prev.end);
      prev.anchorEnd = Math.max(prev.anchorEnd, anchorEnd);
      continue;
    }
    spans.push({ index: spans.length, start: r.start, end: r.end, text: unit.text.slice(r.start, r.end), anchorStart, anchorEnd });
  }
  return spans;
}

export function coversWholeUnit(unit: AlignableUnit, span: SentenceSpan): boolean {
  return span.start === 0 && span.end === unit.text.length;
}

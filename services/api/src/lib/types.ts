export type Side = "source" | "target";

export type Granularity = "unit" | "sentence";

/** Raw source range of one normalized character: where a wrapper may start or end around it. */
export type CharAnchor = {
  anchorStart: number;
  anchorEnd: number;
};

export type AlignableUnit = {
  index: number;
  name: string;
  path: number[];
  text: string;
  chars: CharAnchor[];
  /** Offset in the source where ` attr="value"` is inserted into the start tag. */
  attributeOffset: number;
  contentStart: number;
  contentEnd: number;
  hasIdAttribute: boolean;
};

export type SentenceRange = {
  start: number;
  end: number;
};

export type SentenceSpan = SentenceRange & {
  index: number;
  text: string;
  anchorStart: number;
  anchorEnd: number;
};

export type AlignParams = {
  maxAlign: number;
  topK: number;
  win: number;
  skip: number;
  margin: boolean;
  lenPenalty: boolean;
};

export type Correspondence = {
  source: number[];
  target: number[];
  score: number;
};

export type ParticipantRef = {
  unit: number;
  span: SentenceSpan | null;
};

export type RetainedCorrespondence = {
  granularity: Granularity;
  score: number;
  source: ParticipantRef[];
  target: ParticipantRef[];
};

export type FallbackReason = "single_sentence" | "split_failed" | "below_threshold";

export type GranularityDecision =
  | { kind: "promoted"; correspondence: number; sentenceLinks: number; bestScore: number }
  | { kind: "unit"; correspondence: number; reason: FallbackReason };

export type Participant = ParticipantRef & {
  side: Side;
  id: string;
};

export type AlignmentGroup = {
  groupId: string;
  granularity: Granularity;
  score: number;
  source: Participant[];
  target: Participant[];
  /** Source participant ids followed by target participant ids. */
  targets: string[];
};

export type UnitState = "none" | "whole" | "segmented";

export type UnitAnnotation =
  | { kind: "whole"; id: string }
  | { kind: "segmented"; segments: Array<{ span: SentenceSpan; id: string }> };

export type AnnotationNames = {
  idAttribute: string;
  wrapperElement: string;
};

export type UnitOptions = {
  unitElements: string[];
  scopeElements: string[];
  opaqueElements: string[];
  breakElements: string[];
  idAttribute: string;
};

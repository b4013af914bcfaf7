import crypto from "node:crypto";
import { InvariantError } from "./errors";
import type { AlignmentGroup, Participant, ParticipantRef, RetainedCorrespondence, Side } from "./types";

export type MintId = () => string;

export const randomId: MintId = () => crypto.randomUUID();

/** Wraps a minting function so that a repeated identifier within one request is fatal. */
export function uniqueIdMinter(mint: MintId): MintId {
  const seen = new Set<string>();
  return () => {
    const id = mint();
    if (seen.has(id)) throw new InvariantError(`identifier collision: ${id}`);
    seen.add(id);
    return id;
  };
}

/**
 * One group per retained correspondence, in order. The group id is minted first, then one id for every
 * source participant and one for every target participant; no two participants ever share an id.
 */
export function buildAlignmentGroups(correspondences: RetainedCorrespondence[], mint: MintId = randomId): AlignmentGroup[] {
  const next = uniqueIdMinter(mint);
  const identify = (side: Side) => (ref: ParticipantRef): Participant => ({ ...ref, side, id: next() });

  return correspondences.map((c) => {
    const groupId = next();
    const source = c.source.map(identify("source"));
    const target = c.target.map(identify("target"));
    return {
      groupId,
      granularity: c.granularity,
      score: c.score,
      source,
      target,
      targets: [...source, ...target].map((p) => p.id)
    };
  });
}

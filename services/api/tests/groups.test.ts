import { describe, expect, it } from "vitest";
import { InvariantError } from "../src/lib/errors";
import { buildAlignmentGroups, randomId, uniqueIdMinter } from "../src/lib/groups";
import type { RetainedCorrespondence } from "../src/lib/types";
import { counterMint } from "./helpers";

const correspondences: RetainedCorrespondence[] = [
  {
    granularity: "unit",
    score: 0.8,
    source: [
      { unit: 0, span: null },
      { unit: 1, span: null }
    ],
    target: [{ unit: 0, span: null }]
  },
  { granularity: "unit", score: 0.6, source: [{ unit: 2, span: null }], target: [{ unit: 1, span: null }] }
];

describe("groups", () => {
  it("mints the group id, then source ids, then target ids", () => {
    const groups = buildAlignmentGroups(correspondences, counterMint());
    expect(groups.map((g) => [g.groupId, g.targets])).toEqual([
      ["id1", ["id2", "id3", "id4"]],
      ["id5", ["id6", "id7"]]
    ]);
    expect(groups[0].source.map((p) => [p.side, p.unit, p.id])).toEqual([
      ["source", 0, "id2"],
      ["source", 1, "id3"]
    ]);
    expect(groups[0].target).toEqual([{ unit: 0, span: null, side: "target", id: "id4" }]);
    expect(groups[1].score).toBe(0.6);
  });

  it("fails on an identifier collision", () => {
    expect(() => buildAlignmentGroups(correspondences, () => "same")).toThrow(InvariantError);
  });

  it("uniqueIdMinter passes fresh ids through", () => {
    const mint = uniqueIdMinter(randomId);
    const ids = new Set([mint(), mint(), mint()]);
    expect(ids.size).toBe(3);
  });
});

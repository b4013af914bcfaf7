import { AlignmentError } from "../errors";
import type { AlignParams, Correspondence } from "../types";
import type { Embedder } from "./embeddings";

/**
 * Boundary to the text aligner. Implementations must return correspondences that, read in order, cover every
 * source and every target index exactly once and in increasing order.
 */
export type Aligner = {
  align(source: string[], target: string[], params: AlignParams): Promise<Correspondence[]>;
};

export const DEFAULT_ALIGN_PARAMS: AlignParams = {
  maxAlign: 5,
  topK: 3,
  win: 5,
  skip: -0.1,
  margin: true,
  lenPenalty: true
};

const LENGTH_WEIGHT = 0.1;

function normalize(v: number[]): number[] {
  let norm = 0;
  for (const x of v) norm += x * x;
  norm = Math.sqrt(norm);
  return norm === 0 ? v.slice() : v.map((x) => x / norm);
}

function dot(a: number[], b: number[]): number {
  let s = 0;
  for (let i = 0; i < a.length; i++) s += a[i] * b[i];
  return s;
}

function prefixSums(vectors: number[][], dim: number): number[][] {
  const out: number[][] = [new Array<number>(dim).fill(0)];
  for (const v of vectors) {
    const prev = out[out.length - 1];
    out.push(prev.map((x, k) => x + v[k]));
  }
  return out;
}

function blockVector(prefix: number[][], from: number, to: number): number[] {
  return normalize(prefix[to].map((x, k) => x - prefix[from][k]));
}

function meanTop(values: number[], k: number): number {
  const top = [...values].sort((a, b) => b - a).slice(0, k);
  return top.reduce((s, x) => s + x, 0) / Math.max(1, top.length);
}

function meanOf(values: number[], from: number, to: number): number {
  let s = 0;
  for (let i = from; i < to; i++) s += values[i];
  return s / Math.max(1, to - from);
}

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from }, (_, i) => from + i);
}

/** Block shapes in preference order: 1-1 first, then skips, then larger blocks by total size. */
export function alignmentMoves(maxAlign: number): Array<[number, number]> {
  const limit = Math.max(2, Math.floor(maxAlign));
  const moves: Array<[number, number]> = [
    [1, 1],
    [1, 0],
    [0, 1]
  ];
  for (let total = 3; total <= limit; total++) {
    for (let a = 1; a < total; a++) moves.push([a, total - a]);
  }
  return moves;
}

type Step = { a: number; b: number; cosine: number };

/**
 * Monotonic alignment of two embedded sequences by dynamic programming over block moves. A block scores its
 * cosine similarity, minus the mean top-k neighbour similarity of its members when `margin` is set, minus a
 * log length-ratio term when `lenPenalty` is set; skipping one item costs `skip`. The search is restricted to
 * a band of half width `win` (widened by the length ratio) around the diagonal.
 */
export function alignVectors(input: {
  source: number[][];
  target: number[][];
  sourceLengths: number[];
  targetLengths: number[];
  params: AlignParams;
}): Correspondence[] {
  const { params } = input;
  const n = input.source.length;
  const m = input.target.length;
  if (n === 0 || m === 0) throw new AlignmentError("cannot align an empty sequence");
  const dim = input.source[0].length;
  if ([...input.source, ...input.target].some((v) => v.length !== dim || v.length === 0)) {
    throw new AlignmentError("embeddings have inconsistent dimensions");
  }

  const src = input.source.map(normalize);
  const tgt = input.target.map(normalize);
  const sim = src.map((u) => tgt.map((v) => dot(u, v)));
  const k = Math.max(1, Math.floor(params.topK));
  const srcMargin = sim.map((row) => meanTop(row, k));
  const tgtMargin = tgt.map((_, j) => meanTop(sim.map((row) => row[j]), k));
  const srcPrefix = prefixSums(src, dim);
  const tgtPrefix = prefixSums(tgt, dim);
  const srcLen = [0];
  for (const l of input.sourceLengths) srcLen.push(srcLen[srcLen.length - 1] + l);
  const tgtLen = [0];
  for (const l of input.targetLengths) tgtLen.push(tgtLen[tgtLen.length - 1] + l);

  const half = Math.max(0, params.win) + Math.ceil(Math.max(m / n, n / m));
  const inBand = (i: number, j: number) => Math.abs(j - (i * m) / n) <= half;

  const blockScore = (i: number, a: number, j: number, b: number): { dp: number; cosine: number } => {
    const cosine = a === 1 && b === 1 ? sim[i][j] : dot(blockVector(srcPrefix, i, i + a), blockVector(tgtPrefix, j, j + b));
    let dp = cosine;
    if (params.margin) dp -= (meanOf(srcMargin, i, i + a) + meanOf(tgtMargin, j, j + b)) / 2;
    if (params.lenPenalty) {
      const ls = srcLen[i + a] - srcLen[i];
      const lt = tgtLen[j + b] - tgtLen[j];
      dp -= LENGTH_WEIGHT * Math.abs(Math.log((ls + 1) / (lt + 1)));
    }
    return { dp, cosine };
  };

  const moves = alignmentMoves(params.maxAlign);
  const score = Array.from({ length: n + 1 }, () => new Array<number>(m + 1).fill(-Infinity));
  const back: Array<Array<Step | null>> = Array.from({ length: n + 1 }, () => new Array<Step | null>(m + 1).fill(null));
  score[0][0] = 0;

  for (let i = 0; i <= n; i++) {
    for (let j = 0; j <= m; j++) {
      if ((i === 0 && j === 0) || !inBand(i, j)) continue;
      for (const [a, b] of moves) {
        const pi = i - a;
        const pj = j - b;
        if (pi < 0 || pj < 0) continue;
        const prev = score[pi][pj];
        if (prev === -Infinity) continue;
        const s = a === 0 || b === 0 ? { dp: params.skip, cosine: 0 } : blockScore(pi, a, pj, b);
        if (prev + s.dp > score[i][j]) {
          score[i][j] = prev + s.dp;
          back[i][j] = { a, b, cosine: s.cosine };
        }
      }
    }
  }

  const out: Correspondence[] = [];
  let i = n;
  let j = m;
  while (i > 0 || j > 0) {
    const step = back[i][j];
    if (!step) throw new AlignmentError(`no alignment path reaches (${i}, ${j})`);
    out.push({ source: range(i - step.a, i), target: range(j - step.b, j), score: step.cosine });
    i -= step.a;
    j -= step.b;
  }
  return out.reverse();
}

/** Aligner over sentence embeddings; `getEmbedder` is resolved on first use so the client can be created lazily. */
export function createEmbeddingAligner(getEmbedder: () => Embedder): Aligner {
  return {
    async align(source, target, params) {
      if (source.length === 0 || target.length === 0) throw new AlignmentError("cannot align against an empty side");
      const embedder = getEmbedder();
      const srcVectors = await embedder.embed(source);
      const tgtVectors = await embedder.embed(target);
      if (srcVectors.length !== source.length || tgtVectors.length !== target.length) {
        throw new AlignmentError("embedder returned a different number of vectors than texts");
      }
      return alignVectors({
        source: srcVectors,
        target: tgtVectors,
        sourceLengths: source.map((t) => t.length),
        targetLengths: target.map((t) => t.length),
        params
      });
    }
  };
}

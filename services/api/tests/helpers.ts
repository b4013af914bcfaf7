import type { Aligner } from "../src/lib/ai/aligner";
import type { MintId } from "../src/lib/groups";
import type { AlignParams, Correspondence } from "../src/lib/types";

export const TEI_NS = "http://www.tei-c.org/ns/1.0";

export type AlignCall = { source: string[]; target: string[]; params: AlignParams };

/** Answers each `align` call with the next scripted result, recording what it was asked. */
export function scriptedAligner(responses: Correspondence[][]): Aligner & { calls: AlignCall[] } {
  const calls: AlignCall[] = [];
  return {
    calls,
    async align(source, target, params) {
      calls.push({ source, target, params });
      const next = responses.shift();
      if (!next) throw new Error(`no scripted response for call ${calls.length}`);
      return next;
    }
  };
}

/** Pairs item i with item i at a fixed score; leftovers on the longer side are skips. */
export function diagonalAligner(score = 0.9): Aligner {
  return {
    async align(source, target) {
      const out: Correspondence[] = [];
      const n = Math.max(source.length, target.length);
      for (let i = 0; i < n; i++) {
        const s = i < source.length ? [i] : [];
        const t = i < target.length ? [i] : [];
        out.push({ source: s, target: t, score: s.length && t.length ? score : 0 });
      }
      return out;
    }
  };
}

export function counterMint(prefix = "id"): MintId & { reset(): void } {
  let n = 0;
  const mint = () => `${prefix}${++n}`;
  return Object.assign(mint, {
    reset() {
      n = 0;
    }
  });
}

export function teiDocument(body: string, language?: string): string {
  const header = language
    ? `<teiHeader><profileDesc><langUsage><language ident="${language}">Text</language></langUsage></profileDesc></teiHeader>`
    : "";
  return `<TEI xmlns="${TEI_NS}">${header}<text><body>${body}</body></text></TEI>`;
}

export function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

import { once } from "node:events";
import type { Server } from "node:http";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it, vi } from "vitest";
import type { Aligner } from "../src/lib/ai/aligner";
import type { ServiceConfig } from "../src/lib/config";
import { AlignmentError } from "../src/lib/errors";
import { ConcurrencyGate } from "../src/lib/gate";
import { createApp } from "../src/server";
import { counterMint, deferred, diagonalAligner, teiDocument } from "./helpers";

const config: ServiceConfig = {
  port: 0,
  bodyLimitMb: 1,
  uploadLimitMb: 1,
  maxConcurrent: 1,
  maxQueued: 0,
  promotionThreshold: 0.5,
  verifyRoundTrip: true,
  debug: false
};

const sourceTei = teiDocument("<p>The cat sleeps. The dog barks.</p><p>Goodbye.</p>", "en");
const targetTei = teiDocument("<p>Die Katze schläft. Der Hund bellt.</p><p>Tschüss.</p>");

describe("server", () => {
  const mint = counterMint();
  const gate = new ConcurrencyGate(config.maxConcurrent, config.maxQueued);
  let failWith: Error | null = null;
  const working = diagonalAligner();
  const aligner: Aligner = {
    align: (source, target, params) => (failWith ? Promise.reject(failWith) : working.align(source, target, params))
  };
  let server: Server;
  let base = "";

  beforeAll(async () => {
    server = createApp({ aligner, gate, config, embeddingConfigured: false, mintId: mint }).listen(0, "127.0.0.1");
    await once(server, "listening");
    const addr = server.address();
    if (!addr || typeof addr === "string") throw new Error("server has no port");
    base = `http://127.0.0.1:${addr.port}`;
  });

  afterAll(async () => {
    server.closeAllConnections();
    server.close();
    await once(server, "close");
  });

  beforeEach(() => {
    mint.reset();
    failWith = null;
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const jsonBody = async (res: Response): Promise<Record<string, unknown>> => {
    const body: unknown = await res.json();
    if (typeof body !== "object" || body === null || Array.isArray(body)) throw new Error("expected a JSON object");
    return Object.fromEntries(Object.entries(body));
  };

  const postJson = (path: string, body: unknown) =>
    fetch(`${base}${path}`, { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) });

  it("GET /health reports version, provider and gate load", async () => {
    const res = await fetch(`${base}/health`);
    expect(res.status).toBe(200);
    expect(await jsonBody(res)).toEqual({ status: "ok", version: "0.3.0", embedding_configured: false, in_flight: 0, queued: 0 });
  });

  it("GET / describes the service", async () => {
    const body = await jsonBody(await fetch(`${base}/`));
    expect(body.name).toBe("tei-align");
    expect(body.supported_languages).toHaveLength(25);
  });

  it("answers CORS preflight", async () => {
    const res = await fetch(`${base}/align/tei`, { method: "OPTIONS" });
    expect(res.status).toBe(204);
    expect(res.headers.get("access-control-allow-origin")).toBe("*");
  });

  it("POST /align/tei returns the aligned corpus", async () => {
    const res = await postJson("/align/tei", { source_tei: sourceTei, target_tei: targetTei, target_language: "de", max_align: "4" });
    expect(res.status).toBe(200);
    const body = await jsonBody(res);
    expect(body.source_language).toBe("en");
    expect(body.target_language).toBe("de");
    expect(body.alignment_count).toBe(3);
    expect(typeof body.processing_time).toBe("number");
    expect(body.aligned_xml).toContain(`<link xml:id="id1" type="Linguistic" target="#id2 #id3"/>`);
  });

  it("rejects unsupported and malformed languages", async () => {
    for (const lang of ["xx", "EN", "eng"]) {
      const res = await postJson("/align/tei", { source_tei: sourceTei, target_tei: targetTei, source_language: lang });
      expect(res.status).toBe(400);
      expect((await jsonBody(res)).error_code).toBe("validation_error");
    }
  });

  it("rejects out-of-range parameters and blank documents", async () => {
    const tooWide = await postJson("/align/tei", { source_tei: sourceTei, target_tei: targetTei, win: 21 });
    expect(tooWide.status).toBe(400);
    const blank = await postJson("/align/tei", { source_tei: "   ", target_tei: targetTei });
    expect(blank.status).toBe(400);
    const missing = await postJson("/align/tei", { source_tei: sourceTei });
    expect(missing.status).toBe(400);
  });

  it("rejects a body that is not JSON", async () => {
    const res = await fetch(`${base}/align/tei`, { method: "POST", headers: { "Content-Type": "application/json" }, body: "{oops" });
    expect(res.status).toBe(400);
    expect((await jsonBody(res)).error_code).toBe("validation_error");
  });

  it("reports malformed XML with its side", async () => {
    const res = await postJson("/align/tei", { source_tei: "<TEI><p>x</TEI>", target_tei: targetTei });
    expect(res.status).toBe(400);
    expect(await jsonBody(res)).toMatchObject({ error_code: "parse_error", side: "source", line: 1 });
  });

  it("maps aligner failures to 500 and provider failures to 502", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    failWith = new Error("boom");
    const internal = await postJson("/align/tei", { source_tei: sourceTei, target_tei: targetTei });
    expect(internal.status).toBe(500);
    expect(await jsonBody(internal)).toEqual({ error: "alignment error", detail: "aligner failed: boom", error_code: "alignment_error" });

    failWith = new AlignmentError("provider down", true);
    const upstream = await postJson("/align/tei", { source_tei: sourceTei, target_tei: targetTei });
    expect(upstream.status).toBe(502);
  });

  it("returns 503 when the alignment queue is full", async () => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    const hold = deferred();
    const busy = gate.run(() => hold.promise);
    const res = await postJson("/align/tei", { source_tei: sourceTei, target_tei: targetTei });
    expect(res.status).toBe(503);
    expect((await jsonBody(res)).error_code).toBe("gate_rejected");
    hold.resolve();
    await busy;
  });

  it("POST /align/tei/upload returns the corpus as a TEI attachment", async () => {
    const form = new FormData();
    form.append("source", new Blob([`\uFEFF${sourceTei}`], { type: "application/xml" }), "source.xml");
    form.append("target", new Blob([targetTei], { type: "application/xml" }), "target.xml");
    form.append("target_language", "de");
    form.append("margin", "false");
    const res = await fetch(`${base}/align/tei/upload`, { method: "POST", body: form });
    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toMatch(/^application\/tei\+xml/);
    expect(res.headers.get("content-disposition")).toBe('attachment; filename="aligned.xml"');
    const xml = await res.text();
    expect(xml).toContain(`<language ident="de">Target language: de</language>`);
    expect(xml).toContain(`<link xml:id="id7" type="Linguistic" target="#id8 #id9"/>`);
  });

  it("POST /align/tei/upload requires both files", async () => {
    const form = new FormData();
    form.append("source", new Blob([sourceTei], { type: "application/xml" }), "source.xml");
    const res = await fetch(`${base}/align/tei/upload`, { method: "POST", body: form });
    expect(res.status).toBe(400);
    expect((await jsonBody(res)).detail).toBe("both source and target files are required");
  });
});

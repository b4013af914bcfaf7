import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createHttpEmbedder, getEmbeddingConfig, type EmbeddingConfig } from "../src/lib/ai/embeddings";
import { AlignmentError } from "../src/lib/errors";

const ENV_KEYS = [
  "EMBEDDING_PROVIDER",
  "OPENAI_API_KEY",
  "OPENAI_BASE_URL",
  "EMBEDDING_MODEL",
  "SILICONFLOW_API_KEY",
  "SILICONFLOW_BASE_URL",
  "SILICONFLOW_EMBEDDING_MODEL",
  "EMBEDDING_BATCH_SIZE",
  "EMBEDDING_HTTP_TIMEOUT_MS"
];

const cfg: EmbeddingConfig = {
  provider: "openai",
  apiKey: "test-secret",
  model: "test-model",
  baseUrl: "https://embeddings.test/v1/",
  batchSize: 2,
  timeoutMs: 5_000
};

describe("embeddings", () => {
  beforeEach(() => {
    for (const k of ENV_KEYS) vi.stubEnv(k, "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
  });

  it("getEmbeddingConfig returns null when nothing is configured", () => {
    expect(getEmbeddingConfig()).toBeNull();
  });

  it("getEmbeddingConfig picks OpenAI defaults from the key", () => {
    vi.stubEnv("OPENAI_API_KEY", "test-secret");
    expect(getEmbeddingConfig()).toEqual({
      provider: "openai",
      apiKey: "test-secret",
      model: "text-embedding-3-small",
      baseUrl: "https://api.openai.com/v1",
      batchSize: 64,
      timeoutMs: 60_000
    });
  });

  it("getEmbeddingConfig strips quotes around a SiliconFlow base url", () => {
    vi.stubEnv("SILICONFLOW_API_KEY", "test-secret");
    vi.stubEnv("SILICONFLOW_BASE_URL", "'https://sf.test/v1'");
    vi.stubEnv("EMBEDDING_BATCH_SIZE", "8");
    expect(getEmbeddingConfig()).toMatchObject({
      provider: "siliconflow",
      model: "BAAI/bge-m3",
      baseUrl: "https://sf.test/v1",
      batchSize: 8
    });
  });

  it("createHttpEmbedder batches requests and orders vectors by index", async () => {
    const fetchMock = vi.fn(async (_url: string, init: RequestInit) => {
      const body: { input: string[] } = JSON.parse(String(init.body));
      const data = body.input.map((t, index) => ({ index, embedding: [t.length, index] })).reverse();
      return new Response(JSON.stringify({ data }), { status: 200 });
    });
    vi.stubGlobal("fetch", fetchMock);

    const out = await createHttpEmbedder(cfg).embed(["a", "bb", "ccc"]);
    expect(out).toEqual([
      [1, 0],
      [2, 1],
      [3, 0]
    ]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const [url, init] = fetchMock.mock.calls[0];
    expect(url).toBe("https://embeddings.test/v1/embeddings");
    expect(init.headers).toEqual({ "Content-Type": "application/json", Authorization: "Bearer test-secret" });
    expect(JSON.parse(String(init.body))).toEqual({ model: "test-model", input: ["a", "bb"] });
  });

  it("createHttpEmbedder reports provider errors as upstream failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("rate limited", { status: 429 }))
    );
    await expect(createHttpEmbedder(cfg).embed(["a"])).rejects.toMatchObject({
      name: "AlignmentError",
      upstream: true,
      message: "embedding provider returned HTTP 429: rate limited"
    });
  });

  it("createHttpEmbedder rejects a payload with the wrong vector count", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response(JSON.stringify({ data: [{ index: 0, embedding: [1] }] }), { status: 200 }))
    );
    await expect(createHttpEmbedder(cfg).embed(["a", "b"])).rejects.toBeInstanceOf(AlignmentError);
  });

  it("createHttpEmbedder reports a body that is not JSON as an upstream failure", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => new Response("<html>gateway</html>", { status: 200 }))
    );
    await expect(createHttpEmbedder(cfg).embed(["a"])).rejects.toMatchObject({ name: "AlignmentError", upstream: true });
  });

  it("createHttpEmbedder times out a response body that never arrives", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async (_url: string, init: RequestInit) => {
        const signal = init.signal;
        return {
          ok: true,
          status: 200,
          json: () =>
            new Promise<unknown>((_resolve, reject) => {
              signal?.addEventListener("abort", () => reject(new Error("aborted")));
            })
        };
      })
    );
    await expect(createHttpEmbedder({ ...cfg, timeoutMs: 20 }).embed(["a"])).rejects.toMatchObject({
      upstream: true,
      message: "embedding response could not be read: aborted"
    });
  });

  it("createHttpEmbedder wraps network failures", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        throw new Error("connection refused");
      })
    );
    await expect(createHttpEmbedder(cfg).embed(["a"])).rejects.toMatchObject({ upstream: true });
  });
});

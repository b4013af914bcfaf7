import { z } from "zod";
import { envNumber, envOptional } from "../env";
import { AlignmentError, errorMessage } from "../errors";

export type EmbeddingProvider = "openai" | "siliconflow";

export type EmbeddingConfig = {
  provider: EmbeddingProvider;
  apiKey: string;
  model: string;
  baseUrl: string;
  batchSize: number;
  timeoutMs: number;
};

export type Embedder = {
  model: string;
  embed(texts: string[]): Promise<number[][]>;
};

export function getEmbeddingConfig(): EmbeddingConfig | null {
  const normalizeEnvText = (s: string | undefined | null): string => {
    const t = String(s ?? "").trim();
    if (!t) return "";
    const m = /^([`'"])([\s\S]*)\1$/.exec(t);
    return (m ? m[2] : t).trim();
  };

  const providerRaw = (envOptional("EMBEDDING_PROVIDER") ?? "").trim().toLowerCase();
  const sfKey = envOptional("SILICONFLOW_API_KEY");
  const oaKey = envOptional("OPENAI_API_KEY");
  const oaBaseUrl = normalizeEnvText(envOptional("OPENAI_BASE_URL"));
  const batchSize = Math.floor(envNumber("EMBEDDING_BATCH_SIZE", 64, { min: 1, max: 2048 }));
  const timeoutMs = Math.floor(envNumber("EMBEDDING_HTTP_TIMEOUT_MS", 60_000, { min: 5_000, max: 300_000 }));

  const provider: EmbeddingProvider | "" = providerRaw === "siliconflow" || providerRaw === "openai" ? providerRaw : "";

  if (provider === "siliconflow" || (!provider && sfKey)) {
    if (!sfKey) return null;
    const model = envOptional("SILICONFLOW_EMBEDDING_MODEL") ?? "BAAI/bge-m3";
    const baseUrl = normalizeEnvText(envOptional("SILICONFLOW_BASE_URL")) || "https://api.siliconflow.cn/v1";
    return { provider: "siliconflow", apiKey: sfKey, model, baseUrl, batchSize, timeoutMs };
  }

  if (provider === "openai" || (!provider && (oaKey || oaBaseUrl))) {
    if (!oaKey && !oaBaseUrl) return null;
    const model = envOptional("EMBEDDING_MODEL") ?? "text-embedding-3-small";
    return { provider: "openai", apiKey: oaKey ?? "", model, baseUrl: oaBaseUrl || "https://api.openai.com/v1", batchSize, timeoutMs };
  }

  return null;
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number())
    })
  )
});

const truncate = (s: string, max: number) => {
  if (s.length <= max) return s;
  return `${s.slice(0, Math.max(0, max - 12))}…(truncated)`;
};

export function createHttpEmbedder(cfg: EmbeddingConfig): Embedder {
  const url = `${cfg.baseUrl.replace(/\/+$/, "")}/embeddings`;

  const post = async (body: string, signal: AbortSignal): Promise<Response> => {
    try {
      const headers: Record<string, string> = { "Content-Type": "application/json" };
      if (cfg.apiKey) headers.Authorization = `Bearer ${cfg.apiKey}`;
      return await fetch(url, { method: "POST", headers, body, signal });
    } catch (e) {
      throw new AlignmentError(`embedding request failed (${url}): ${errorMessage(e)}`, true);
    }
  };

  const readJson = async (res: Response): Promise<unknown> => {
    try {
      return await res.json();
    } catch (e) {
      throw new AlignmentError(`embedding response could not be read: ${errorMessage(e)}`, true);
    }
  };

  const embedBatch = async (batch: string[]): Promise<number[][]> => {
    // the timeout covers the response body as well as the request
    const controller = new AbortController();
    const t = setTimeout(() => controller.abort(), cfg.timeoutMs);
    try {
      const res = await post(JSON.stringify({ model: cfg.model, input: batch }), controller.signal);
      if (!res.ok) {
        const detail = await res.text().catch((e: unknown) => errorMessage(e));
        throw new AlignmentError(`embedding provider returned HTTP ${res.status}: ${truncate(detail, 300)}`, true);
      }
      const parsed = embeddingResponseSchema.safeParse(await readJson(res));
      if (!parsed.success) throw new AlignmentError("embedding provider returned an unexpected payload", true);
      const rows = [...parsed.data.data].sort((a, b) => a.index - b.index);
      if (rows.length !== batch.length) {
        throw new AlignmentError(`embedding provider returned ${rows.length} vectors for ${batch.length} inputs`, true);
      }
      return rows.map((r) => r.embedding);
    } finally {
      clearTimeout(t);
    }
  };

  return {
    model: cfg.model,
    async embed(texts: string[]): Promise<number[][]> {
      const out: number[][] = [];
      for (let i = 0; i < texts.length; i += cfg.batchSize) {
        out.push(...(await embedBatch(texts.slice(i, i + cfg.batchSize))));
      }
      return out;
    }
  };
}

let shared: Embedder | null = null;

/** Process-wide embedding client, created on first use and read-only afterwards. */
export function getSharedEmbedder(): Embedder {
  if (shared) return shared;
  const cfg = getEmbeddingConfig();
  if (!cfg) {
    throw new AlignmentError("no embedding provider configured (set OPENAI_API_KEY, OPENAI_BASE_URL or SILICONFLOW_API_KEY)", true);
  }
  console.log(`[embed] using ${cfg.provider} model ${cfg.model}`);
  shared = createHttpEmbedder(cfg);
  return shared;
}

import { createEmbeddingAligner } from "./lib/ai/aligner";
import { getEmbeddingConfig, getSharedEmbedder } from "./lib/ai/embeddings";
import { loadServiceConfig } from "./lib/config";
import { ConcurrencyGate } from "./lib/gate";
import { createApp, SERVICE_VERSION } from "./server";

const config = loadServiceConfig();
const embedding = getEmbeddingConfig();
if (!embedding) console.warn("[server] no embedding provider configured; alignment requests will fail until one is set");

const app = createApp({
  aligner: createEmbeddingAligner(getSharedEmbedder),
  gate: new ConcurrencyGate(config.maxConcurrent, config.maxQueued),
  config,
  embeddingConfigured: embedding !== null
});

app.listen(config.port, () => {
  console.log(`[server] tei-align ${SERVICE_VERSION} listening on :${config.port}`);
});

import express from "express";
import multer from "multer";
import { z } from "zod";
import type { Aligner } from "./lib/ai/aligner";
import type { ServiceConfig } from "./lib/config";
import { errorCodeOf, errorMessage, httpStatusForError, ParseError } from "./lib/errors";
import type { ConcurrencyGate } from "./lib/gate";
import type { MintId } from "./lib/groups";
import { alignTeiDocuments, type AlignedCorpus } from "./lib/pipeline";
import type { AlignParams } from "./lib/types";

export const SERVICE_NAME = "tei-align";
export const SERVICE_VERSION = "0.3.0";

export const SUPPORTED_LANGUAGES: ReadonlySet<string> = new Set([
  "ca", "zh", "cs", "da", "nl", "en", "fi", "fr", "de", "el", "hu", "is", "it",
  "lt", "lv", "no", "pl", "pt", "ro", "ru", "sk", "sl", "es", "sv", "tr"
]);

const MAX_TEI_CHARS = 1_000_000;

const teiText = z
  .string()
  .max(MAX_TEI_CHARS)
  .refine((s) => s.trim().length > 0, "must not be empty");

const optionalLanguage = z.preprocess(
  (v) => (typeof v === "string" && v.trim() === "" ? undefined : v),
  z
    .string()
    .trim()
    .regex(/^[a-z]{2}$/, "must be a two-letter lowercase language code")
    .refine((v) => SUPPORTED_LANGUAGES.has(v), "unsupported language")
    .optional()
);

// multipart form fields arrive as strings
const flag = z.union([z.boolean(), z.enum(["true", "false"]).transform((v) => v === "true")]);

const paramsShape = {
  source_language: optionalLanguage,
  target_language: optionalLanguage,
  max_align: z.coerce.number().int().min(1).max(10).default(5),
  top_k: z.coerce.number().int().min(1).max(10).default(3),
  win: z.coerce.number().int().min(1).max(20).default(5),
  skip: z.coerce.number().min(-1).max(0).default(-0.1),
  margin: flag.default(true),
  len_penalty: flag.default(true)
};

export const alignRequestSchema = z.object({
  source_tei: teiText,
  target_tei: teiText,
  ...paramsShape
});

export const uploadFieldsSchema = z.object(paramsShape);

type RequestParams = z.infer<typeof uploadFieldsSchema>;

function toAlignParams(p: RequestParams): AlignParams {
  return { maxAlign: p.max_align, topK: p.top_k, win: p.win, skip: p.skip, margin: p.margin, lenPenalty: p.len_penalty };
}

function toResponse(corpus: AlignedCorpus) {
  return {
    aligned_xml: corpus.xml,
    source_language: corpus.sourceLanguage,
    target_language: corpus.targetLanguage,
    alignment_count: corpus.alignmentCount,
    processing_time: corpus.processingTime
  };
}

function zodDetail(e: z.ZodError): string {
  return e.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
}

function sendError(res: express.Response, e: unknown) {
  if (e instanceof z.ZodError) {
    return res.status(400).json({ error: "invalid request", detail: zodDetail(e), error_code: "validation_error" });
  }
  const status = httpStatusForError(e);
  const body: Record<string, unknown> = { error: errorCodeOf(e).replace(/_/g, " "), detail: errorMessage(e), error_code: errorCodeOf(e) };
  if (e instanceof ParseError) {
    body.side = e.side;
    if (e.line !== null) body.line = e.line;
    if (e.column !== null) body.column = e.column;
  }
  if (status >= 500) console.error(`[server] ${errorCodeOf(e)}: ${errorMessage(e)}`);
  return res.status(status).json(body);
}

/** Upload payloads are UTF-8; a leading byte order mark is not part of the document. */
function decodeUpload(file: Express.Multer.File): string {
  return file.buffer.toString("utf8").replace(/^\uFEFF/, "");
}

function uploadedFile(req: express.Request, field: "source" | "target"): Express.Multer.File | undefined {
  const files = req.files;
  if (!files || Array.isArray(files)) return undefined;
  return files[field]?.[0];
}

/** Reads `status` from errors raised by express's body parser. */
function clientStatus(e: unknown): number | null {
  if (typeof e !== "object" || e === null || !("status" in e)) return null;
  const status = e.status;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

export type AppDeps = {
  aligner: Aligner;
  gate: ConcurrencyGate;
  config: ServiceConfig;
  embeddingConfigured: boolean;
  mintId?: MintId;
};

export function createApp(deps: AppDeps): express.Express {
  const { aligner, gate, config } = deps;
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: config.uploadLimitMb * 1024 * 1024, files: 2 }
  });

  const runAlignment = (input: { sourceXml: string; targetXml: string; params: RequestParams }) =>
    gate.run(() =>
      alignTeiDocuments({
        sourceXml: input.sourceXml,
        targetXml: input.targetXml,
        sourceLanguage: input.params.source_language,
        targetLanguage: input.params.target_language,
        params: toAlignParams(input.params),
        aligner,
        options: {
          promotionThreshold: config.promotionThreshold,
          verifyRoundTrip: config.verifyRoundTrip,
          debug: config.debug
        },
        mintId: deps.mintId
      })
    );

  // CORS
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "*");
    res.header("Access-Control-Allow-Methods", "GET,POST,OPTIONS");
    if (req.method === "OPTIONS") {
      return res.sendStatus(204);
    }
    next();
  });

  app.use(express.json({ limit: `${config.bodyLimitMb}mb` }));

  app.get("/", (_req, res) => {
    res.json({
      name: SERVICE_NAME,
      version: SERVICE_VERSION,
      endpoints: ["GET /health", "POST /align/tei", "POST /align/tei/upload"],
      supported_languages: [...SUPPORTED_LANGUAGES]
    });
  });

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      version: SERVICE_VERSION,
      embedding_configured: deps.embeddingConfigured,
      in_flight: gate.inFlight,
      queued: gate.queued
    });
  });

  app.post("/align/tei", async (req, res) => {
    try {
      const body = alignRequestSchema.parse(req.body ?? {});
      const corpus = await runAlignment({ sourceXml: body.source_tei, targetXml: body.target_tei, params: body });
      if (config.debug) console.log(`[server] aligned ${corpus.alignmentCount} groups in ${corpus.processingTime.toFixed(3)}s`);
      res.json(toResponse(corpus));
    } catch (e) {
      sendError(res, e);
    }
  });

  app.post(
    "/align/tei/upload",
    upload.fields([
      { name: "source", maxCount: 1 },
      { name: "target", maxCount: 1 }
    ]),
    async (req, res) => {
      try {
        const source = uploadedFile(req, "source");
        const target = uploadedFile(req, "target");
        if (!source || !target) {
          return res.status(400).json({ error: "invalid request", detail: "both source and target files are required", error_code: "validation_error" });
        }
        const params = uploadFieldsSchema.parse(req.body ?? {});
        const corpus = await runAlignment({ sourceXml: decodeUpload(source), targetXml: decodeUpload(target), params });
        res.setHeader("Content-Type", "application/tei+xml; charset=utf-8");
        res.setHeader("Content-Disposition", 'attachment; filename="aligned.xml"');
        res.send(corpus.xml);
      } catch (e) {
        sendError(res, e);
      }
    }
  );

  app.use((err: unknown, _req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) return next(err);
    if (err instanceof multer.MulterError) {
      return res.status(400).json({ error: "invalid upload", detail: err.message, error_code: "validation_error" });
    }
    const status = clientStatus(err);
    if (status !== null) {
      return res.status(status).json({ error: "invalid request", detail: errorMessage(err), error_code: "validation_error" });
    }
    sendError(res, err);
  });

  return app;
}

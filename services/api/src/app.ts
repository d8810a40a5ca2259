import express, { type Express, type NextFunction, type Request, type Response } from "express"
import { randomUUID } from "crypto"
import type { LLMAdapter } from "../../../core/llm/adapter.js"
import type { JobSearchAdapter } from "../../../core/jobs/adapter.js"
import type { QueryDefaults } from "../../../core/domain/query.js"
import { ExtractionError, SearchError, userMessageFor } from "../../../core/domain/errors.js"
import {
  runMatchPipeline,
  runProfileStage,
  runSearchStage,
  type PipelineDeps,
} from "../../../src/engine/run_match_pipeline.js"
import { errorMessage, logError } from "../../../src/lib/log.js"
import { parseFiltersFromQuery, parseSearchRequest } from "./validation.js"

export interface AppDeps {
  llm: LLMAdapter
  jobs: JobSearchAdapter
  maxInputChars?: number
  maxUploadBytes?: number
  queryDefaults?: QueryDefaults
}

const PDF_TYPES = ["application/pdf", "application/octet-stream"]
const RAW_RESPONSE_LIMIT = 2000

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function requestIdOf(res: Response): string {
  const id: unknown = res.locals.requestId
  return typeof id === "string" ? id : "unknown"
}

function pdfBody(req: Request): Uint8Array | null {
  const body: unknown = req.body
  return Buffer.isBuffer(body) && body.byteLength > 0 ? new Uint8Array(body) : null
}

export function statusFor(err: unknown): { status: number; code: string } {
  if (err instanceof ExtractionError) {
    switch (err.code) {
      case "UNREADABLE":
        return { status: 422, code: "unreadable_pdf" }
      case "NO_TEXT":
        return { status: 422, code: "no_text" }
      case "MALFORMED_MODEL_RESPONSE":
        return { status: 502, code: "malformed_model_response" }
      case "SERVICE_UNAVAILABLE":
        return { status: 503, code: "model_unavailable" }
    }
  }
  if (err instanceof SearchError) return { status: 503, code: "search_unavailable" }
  return { status: 500, code: "internal_error" }
}

function sendError(res: Response, err: unknown): void {
  const requestId = requestIdOf(res)
  const { status, code } = statusFor(err)

  logError("request_error", { requestId, code, status, err: errorMessage(err) })

  const body: Record<string, unknown> = { error: code, message: userMessageFor(err), requestId }
  if (err instanceof ExtractionError && err.rawResponse != null) {
    body.diagnostics = { rawResponse: err.rawResponse.slice(0, RAW_RESPONSE_LIMIT) }
  }
  res.status(status).json(body)
}

function badRequest(res: Response, error: string, issues: string[] = []): void {
  res.status(400).json({ error, issues, requestId: requestIdOf(res) })
}

export function createApp(deps: AppDeps): Express {
  const app = express()
  const rawPdf = express.raw({ type: PDF_TYPES, limit: deps.maxUploadBytes ?? 10 * 1024 * 1024 })

  const pipelineDeps = (res: Response): PipelineDeps => ({
    llm: deps.llm,
    jobs: deps.jobs,
    maxInputChars: deps.maxInputChars,
    queryDefaults: deps.queryDefaults,
    requestId: requestIdOf(res),
  })

  // Request ID
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.header("x-request-id") || randomUUID()
    res.locals.requestId = requestId
    res.setHeader("x-request-id", requestId)
    next()
  })

  app.get("/healthz", (_req: Request, res: Response) => {
    res.status(200).send("ok")
  })

  app.post("/v1/profile", rawPdf, async (req: Request, res: Response) => {
    const pdf = pdfBody(req)
    if (!pdf) return badRequest(res, "pdf_body_required")

    try {
      const out = await runProfileStage(pdf, pipelineDeps(res))
      res.json({
        requestId: requestIdOf(res),
        profile: out.extraction.profile,
        truncated: out.extraction.truncated,
        warnings: out.extraction.warnings,
      })
    } catch (e) {
      sendError(res, e)
    }
  })

  app.post("/v1/search", express.json({ limit: "1mb" }), async (req: Request, res: Response) => {
    const parsed = parseSearchRequest(req.body)
    if (!parsed.ok) return badRequest(res, "invalid_search_request", parsed.issues)

    try {
      const out = await runSearchStage(parsed.value.profile, parsed.value.filters ?? {}, pipelineDeps(res))
      res.json({ requestId: requestIdOf(res), query: out.query, postings: out.postings })
    } catch (e) {
      sendError(res, e)
    }
  })

  app.post("/v1/match", rawPdf, async (req: Request, res: Response) => {
    const filters = parseFiltersFromQuery(req.query)
    if (!filters.ok) return badRequest(res, "invalid_filters", filters.issues)

    const pdf = pdfBody(req)
    if (!pdf) return badRequest(res, "pdf_body_required")

    try {
      const out = await runMatchPipeline(pdf, filters.value, pipelineDeps(res))
      res.json({
        requestId: requestIdOf(res),
        profile: out.extraction.profile,
        truncated: out.extraction.truncated,
        warnings: out.extraction.warnings,
        query: out.query,
        postings: out.postings,
      })
    } catch (e) {
      sendError(res, e)
    }
  })

  // Body-parser failures (oversized upload, malformed JSON) land here.
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) return next(err)

    const type = isRecord(err) ? err.type : undefined
    if (type === "entity.too.large") {
      res.status(413).json({ error: "pdf_too_large", requestId: requestIdOf(res) })
      return
    }
    if (type === "entity.parse.failed") return badRequest(res, "invalid_json")

    sendError(res, err)
  })

  return app
}

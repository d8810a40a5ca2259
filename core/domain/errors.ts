// core/domain/errors.ts

export type ExtractionErrorCode =
  | "UNREADABLE"
  | "NO_TEXT"
  | "MALFORMED_MODEL_RESPONSE"
  | "SERVICE_UNAVAILABLE"

export class ExtractionError extends Error {
  readonly code: ExtractionErrorCode
  /** Last raw model output; only set for MALFORMED_MODEL_RESPONSE. */
  readonly rawResponse: string | null

  constructor(code: ExtractionErrorCode, opts: { detail?: string; rawResponse?: string; cause?: unknown } = {}) {
    super(opts.detail ? `EXTRACT_${code}: ${opts.detail}` : `EXTRACT_${code}`, { cause: opts.cause })
    this.name = "ExtractionError"
    this.code = code
    this.rawResponse = opts.rawResponse ?? null
  }
}

export type SearchErrorCode = "SERVICE_UNAVAILABLE"

export class SearchError extends Error {
  readonly code: SearchErrorCode = "SERVICE_UNAVAILABLE"
  readonly status: number | null

  constructor(detail: string, opts: { status?: number; cause?: unknown } = {}) {
    super(`SEARCH_SERVICE_UNAVAILABLE: ${detail}`, { cause: opts.cause })
    this.name = "SearchError"
    this.status = opts.status ?? null
  }
}

export class ConfigError extends Error {
  readonly missing: string[]

  constructor(message: string, missing: string[] = []) {
    super(message)
    this.name = "ConfigError"
    this.missing = missing
  }
}

export const USER_MESSAGES = {
  unreadablePdf: "We could not read this PDF. Upload a text-based PDF (not a scanned image).",
  extractionFailed: "We could not extract resume details. Please try again.",
  searchUnavailable: "Job search is temporarily unavailable. Please try again later.",
  internal: "Something went wrong. Please try again.",
} as const

export function userMessageFor(err: unknown): string {
  if (err instanceof ExtractionError) {
    if (err.code === "UNREADABLE" || err.code === "NO_TEXT") return USER_MESSAGES.unreadablePdf
    return USER_MESSAGES.extractionFailed
  }
  if (err instanceof SearchError) return USER_MESSAGES.searchUnavailable
  return USER_MESSAGES.internal
}

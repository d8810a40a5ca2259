import { ConfigError } from "../core/domain/errors.js"
import { DEFAULT_QUERY_DEFAULTS, type QueryDefaults } from "../core/domain/query.js"
import { DEFAULT_MAX_INPUT_CHARS } from "../core/llm/extractProfile.js"

export type Env = Record<string, string | undefined>

export interface AppConfig {
  openaiApiKey: string
  openaiModel: string
  openaiBaseUrl: string
  apiJobsApiKey: string
  apiJobsBaseUrl: string
  requestTimeoutMs: number
  maxInputChars: number
  maxUploadBytes: number
  queryDefaults: QueryDefaults
  port: number
}

const REQUIRED = ["OPENAI_API_KEY", "APIJOBS_API_KEY"] as const

function positiveInt(raw: string | undefined, fallback: number): number {
  const n = Number(raw)
  return Number.isInteger(n) && n > 0 ? n : fallback
}

function text(raw: string | undefined, fallback: string): string {
  return raw?.trim() || fallback
}

/**
 * Read once at startup. Missing secrets are a startup error; the message names
 * the variables, never their values.
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const missing = REQUIRED.filter((k) => !env[k]?.trim())
  if (missing.length > 0) {
    throw new ConfigError(`Missing required environment variables: ${missing.join(", ")}`, [...missing])
  }

  return {
    openaiApiKey: text(env.OPENAI_API_KEY, ""),
    openaiModel: text(env.OPENAI_MODEL, "gpt-4o-mini"),
    openaiBaseUrl: text(env.OPENAI_BASE_URL, "https://api.openai.com/v1"),
    apiJobsApiKey: text(env.APIJOBS_API_KEY, ""),
    apiJobsBaseUrl: text(env.APIJOBS_BASE_URL, "https://api.apijobs.dev/v1"),
    requestTimeoutMs: positiveInt(env.REQUEST_TIMEOUT_MS, 30_000),
    maxInputChars: positiveInt(env.MODEL_MAX_INPUT_CHARS, DEFAULT_MAX_INPUT_CHARS),
    maxUploadBytes: positiveInt(env.MAX_UPLOAD_BYTES, 10 * 1024 * 1024),
    queryDefaults: {
      ...DEFAULT_QUERY_DEFAULTS,
      location: text(env.SEARCH_DEFAULT_LOCATION, DEFAULT_QUERY_DEFAULTS.location),
      limit: positiveInt(env.SEARCH_PAGE_SIZE, DEFAULT_QUERY_DEFAULTS.limit),
      radius: positiveInt(env.SEARCH_DEFAULT_RADIUS, DEFAULT_QUERY_DEFAULTS.radius),
    },
    port: positiveInt(env.PORT, 8080),
  }
}

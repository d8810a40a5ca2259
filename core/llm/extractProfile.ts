import type { CandidateProfile } from "../domain/profile.js"
import { ExtractionError } from "../domain/errors.js"
import { LLMServiceError, type LLMAdapter, type LLMModel, type LLMUsage, type StructuredCompletionOutput } from "./adapter.js"
import {
  buildExtractProfileSystemPrompt,
  buildExtractProfileUserPrompt,
  STRICT_RETRY_INSTRUCTION,
} from "./prompts/extractProfile.js"
import {
  candidateProfileJsonSchema,
  modelProfilePayloadSchema,
  type ModelProfilePayload,
} from "./schemas/candidateProfileSchema.js"
import { postProcessProfile } from "./postprocess.js"
import { PROMPT_EXTRACT_VERSION } from "../versioning/versions.js"

export const DEFAULT_MAX_INPUT_CHARS = 48_000

export interface ExtractProfileOptions {
  maxInputChars?: number
  promptVersion?: string
}

export interface ProfileExtraction {
  profile: CandidateProfile
  truncated: boolean
  /** Characters of resume text actually sent to the model. */
  inputChars: number
  warnings: string[]
  attempts: 1 | 2
  modelUsed: LLMModel
  usage?: LLMUsage
  latencyMs: number
}

/**
 * Resume text -> CandidateProfile through the model.
 *
 * A response that does not parse or validate gets exactly one retry with a
 * stricter instruction. Transport failures are never retried.
 */
export async function extractProfile(
  resumeText: string,
  llm: LLMAdapter,
  opts: ExtractProfileOptions = {}
): Promise<ProfileExtraction> {
  const started = Date.now()
  const maxInputChars = opts.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS
  const promptVersion = opts.promptVersion ?? PROMPT_EXTRACT_VERSION

  if (!resumeText.trim()) throw new ExtractionError("NO_TEXT", { detail: "resume text is empty" })

  const warnings: string[] = []
  const text = truncateText(resumeText, maxInputChars)
  const truncated = text.length < resumeText.length
  if (truncated) warnings.push(`Resume text was truncated to the first ${maxInputChars} characters.`)

  const system = buildExtractProfileSystemPrompt()
  const user = buildExtractProfileUserPrompt(text, promptVersion)

  const first = await callModel(llm, system, user)
  let payload = parseModelPayload(first)
  let last = first
  let attempts: 1 | 2 = 1

  if (!payload) {
    last = await callModel(llm, system, `${user}\n\n${STRICT_RETRY_INSTRUCTION}`)
    attempts = 2
    payload = parseModelPayload(last)

    if (!payload) {
      throw new ExtractionError("MALFORMED_MODEL_RESPONSE", {
        detail: "model output did not match schema after retry",
        rawResponse: last.rawText,
      })
    }
  }

  return {
    profile: postProcessProfile(payload),
    truncated,
    inputChars: text.length,
    warnings,
    attempts,
    modelUsed: last.modelUsed,
    usage: last.usage,
    latencyMs: Date.now() - started,
  }
}

/** Cuts to at most `maxChars` UTF-16 units without splitting a surrogate pair. */
export function truncateText(text: string, maxChars: number): string {
  if (text.length <= maxChars) return text
  let end = maxChars
  const last = text.charCodeAt(end - 1)
  if (last >= 0xd800 && last <= 0xdbff) end -= 1
  return text.slice(0, end)
}

async function callModel(llm: LLMAdapter, system: string, user: string): Promise<StructuredCompletionOutput> {
  try {
    return await llm.completeStructured({ system, user, schema: candidateProfileJsonSchema })
  } catch (e) {
    if (e instanceof LLMServiceError) {
      throw new ExtractionError("SERVICE_UNAVAILABLE", { detail: e.message, cause: e })
    }
    throw e
  }
}

/** Prefers the service's own parsed JSON, then the raw text. */
export function parseModelPayload(out: Pick<StructuredCompletionOutput, "rawText" | "parsed">): ModelProfilePayload | null {
  const candidates = [out.parsed, parseJsonObject(out.rawText)]
  for (const c of candidates) {
    if (c == null) continue
    const result = modelProfilePayloadSchema.safeParse(c)
    if (result.success) return result.data
  }
  return null
}

/**
 * Models like to wrap JSON in prose or code fences; fall back to the
 * outermost {...} span when the whole text is not JSON.
 */
export function parseJsonObject(text: string): unknown {
  const trimmed = text.trim()
  if (!trimmed) return null

  const direct = tryParse(trimmed)
  if (direct !== undefined) return direct

  const m = trimmed.match(/\{[\s\S]*\}/)
  if (!m) return null
  return tryParse(m[0]) ?? null
}

function tryParse(s: string): unknown {
  try {
    return JSON.parse(s)
  } catch {
    return undefined
  }
}

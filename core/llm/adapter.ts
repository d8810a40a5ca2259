import type { JsonSchemaHint } from "./schemas/candidateProfileSchema.js"

export type LLMModel = "gpt-4o-mini" | "gpt-4o" | "gpt-4.1" | (string & {})

export interface LLMUsage {
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
}

export interface StructuredCompletionInput {
  system: string
  user: string
  schema: JsonSchemaHint
}

export interface StructuredCompletionOutput {
  /** Text the model produced, verbatim. Empty when it produced none. */
  rawText: string
  /** Already-parsed JSON when the service hands one back, else null. */
  parsed: unknown
  modelUsed: LLMModel
  usage?: LLMUsage
  latencyMs?: number
}

/** Transport-level failure: network, timeout, auth, rate limit, 5xx. */
export class LLMServiceError extends Error {
  readonly status: number | null

  constructor(message: string, opts: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: opts.cause })
    this.name = "LLMServiceError"
    this.status = opts.status ?? null
  }
}

export interface LLMAdapter {
  completeStructured(input: StructuredCompletionInput): Promise<StructuredCompletionOutput>
}

import {
  LLMServiceError,
  type LLMAdapter,
  type LLMModel,
  type LLMUsage,
  type StructuredCompletionInput,
  type StructuredCompletionOutput,
} from "../core/llm/adapter.js"

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>

export interface OpenAIAdapterOptions {
  apiKey: string
  baseUrl?: string
  model?: LLMModel
  timeoutMs?: number
  fetch?: FetchLike
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function num(v: unknown): number | undefined {
  return typeof v === "number" ? v : undefined
}

function parseOpenAIErrorMessage(bodyText: string): string | null {
  try {
    const j: unknown = JSON.parse(bodyText)
    if (isRecord(j) && isRecord(j.error) && typeof j.error.message === "string") return j.error.message
    return null
  } catch {
    return null
  }
}

export class OpenAIAdapter implements LLMAdapter {
  private apiKey: string
  private baseUrl: string
  private model: LLMModel
  private timeoutMs: number
  private fetchImpl: FetchLike

  constructor(opts: OpenAIAdapterOptions) {
    this.apiKey = opts.apiKey
    this.baseUrl = (opts.baseUrl ?? "https://api.openai.com/v1").replace(/\/+$/, "")
    this.model = opts.model ?? "gpt-4o-mini"
    this.timeoutMs = opts.timeoutMs ?? 30_000
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init))
  }

  async completeStructured(input: StructuredCompletionInput): Promise<StructuredCompletionOutput> {
    const started = Date.now()

    const payload = {
      model: this.model,
      temperature: 0,
      input: [
        { role: "system", content: input.system },
        { role: "user", content: input.user },
      ],
      text: {
        format: {
          type: "json_schema",
          name: input.schema.name,
          strict: true,
          schema: input.schema.schema,
        },
      },
    }

    const resp = await this.callResponses(payload)

    return {
      rawText: this.extractOutputText(resp),
      parsed: isRecord(resp) && resp.output_parsed != null ? resp.output_parsed : null,
      modelUsed: this.model,
      usage: this.mapUsage(isRecord(resp) ? resp.usage : undefined),
      latencyMs: Date.now() - started,
    }
  }

  // One attempt, bounded by timeoutMs. Anything that is not a 2xx JSON envelope
  // is a transport failure for the caller.
  private async callResponses(body: unknown): Promise<unknown> {
    const controller = new AbortController()
    const t = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const res = await this.fetchImpl(`${this.baseUrl}/responses`, {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      })

      const text = await res.text()

      if (!res.ok) {
        const msg = parseOpenAIErrorMessage(text)
        throw new LLMServiceError(`OPENAI_ERROR_${res.status}: ${(msg ?? text).slice(0, 400)}`, { status: res.status })
      }

      try {
        return JSON.parse(text)
      } catch (e) {
        throw new LLMServiceError("OPENAI_NON_JSON_RESPONSE", { status: res.status, cause: e })
      }
    } catch (e) {
      if (e instanceof LLMServiceError) throw e
      if (controller.signal.aborted) throw new LLMServiceError("OPENAI_TIMEOUT", { cause: e })
      throw new LLMServiceError(`OPENAI_NETWORK_ERROR: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
    } finally {
      clearTimeout(t)
    }
  }

  /** Concatenates every output_text part of the Responses API result. */
  private extractOutputText(resp: unknown): string {
    if (!isRecord(resp)) return ""
    if (typeof resp.output_text === "string") return resp.output_text

    const items = resp.output
    if (!Array.isArray(items)) return ""

    const parts: string[] = []
    for (const item of items) {
      if (!isRecord(item) || !Array.isArray(item.content)) continue
      for (const c of item.content) {
        if (isRecord(c) && typeof c.text === "string") parts.push(c.text)
      }
    }
    return parts.join("")
  }

  private mapUsage(u: unknown): LLMUsage | undefined {
    if (!isRecord(u)) return undefined
    return {
      inputTokens: num(u.input_tokens),
      outputTokens: num(u.output_tokens),
      totalTokens: num(u.total_tokens),
    }
  }
}

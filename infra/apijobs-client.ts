import type { JobSearchAdapter } from "../core/jobs/adapter.js"
import type { JobQuery } from "../core/domain/profile.js"
import { SearchError } from "../core/domain/errors.js"
import type { FetchLike } from "./openai-adapter.js"

export interface ApiJobsClientOptions {
  apiKey: string
  baseUrl?: string
  timeoutMs?: number
  /** Location value that means "anywhere"; it is not sent as a location filter. */
  remoteLocation?: string
  fetch?: FetchLike
}

export type ApiJobsSearchBody = {
  q: string
  location?: string
  workplace_type?: "remote"
  experience_level?: string
  industry?: string
  distance?: number
  size: number
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

export function toSearchBody(query: JobQuery, remoteLocation = "remote"): ApiJobsSearchBody {
  const q = [query.keyword, ...query.skills]
    .map((s) => s.trim())
    .filter(Boolean)
    .join(",")

  const body: ApiJobsSearchBody = { q, size: query.limit }
  const isRemoteDefault = query.location.trim().toLowerCase() === remoteLocation.toLowerCase()

  if (!isRemoteDefault) {
    body.location = query.location
    body.distance = query.radius
  }
  if (query.remoteOnly || isRemoteDefault) body.workplace_type = "remote"
  if (query.experienceLevel !== "unknown") body.experience_level = query.experienceLevel
  if (query.industry) body.industry = query.industry

  return body
}

export class ApiJobsClient implements JobSearchAdapter {
  private apiKey: string
  private baseUrl: string
  private timeoutMs: number
  private remoteLocation: string
  private fetchImpl: FetchLike

  constructor(opts: ApiJobsClientOptions) {
    this.apiKey = opts.apiKey
    this.baseUrl = (opts.baseUrl ?? "https://api.apijobs.dev/v1").replace(/\/+$/, "")
    this.timeoutMs = opts.timeoutMs ?? 30_000
    this.remoteLocation = opts.remoteLocation ?? "remote"
    this.fetchImpl = opts.fetch ?? ((input, init) => fetch(input, init))
  }

  async search(query: JobQuery): Promise<unknown[]> {
    const controller = new AbortController()
    const t = setTimeout(() => controller.abort(), this.timeoutMs)

    let res: Response
    let text: string
    try {
      res = await this.fetchImpl(`${this.baseUrl}/job/search`, {
        method: "POST",
        headers: {
          apikey: this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(toSearchBody(query, this.remoteLocation)),
        signal: controller.signal,
      })
      text = await res.text()
    } catch (e) {
      if (controller.signal.aborted) throw new SearchError("APIJOBS_TIMEOUT", { cause: e })
      throw new SearchError(`APIJOBS_NETWORK_ERROR: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
    } finally {
      clearTimeout(t)
    }

    if (!res.ok) {
      throw new SearchError(`APIJOBS_ERROR_${res.status}: ${text.slice(0, 200)}`, { status: res.status })
    }

    let data: unknown
    try {
      data = JSON.parse(text)
    } catch (e) {
      throw new SearchError("APIJOBS_NON_JSON_RESPONSE", { status: res.status, cause: e })
    }

    if (!isRecord(data) || !Array.isArray(data.hits)) {
      throw new SearchError("APIJOBS_UNEXPECTED_FORMAT: missing hits", { status: res.status })
    }
    return data.hits
  }
}

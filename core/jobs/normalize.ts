import type { JobPosting } from "../domain/profile.js"

export const SNIPPET_MAX_CHARS = 280

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null
}

function str(v: unknown): string | null {
  if (typeof v === "number" && Number.isFinite(v)) return String(v)
  if (typeof v !== "string") return null
  return v.trim() || null
}

/** Absolute http(s) URL or null. */
export function usableUrl(v: unknown): string | null {
  const s = str(v)
  if (!s) return null
  try {
    const u = new URL(s)
    return u.protocol === "http:" || u.protocol === "https:" ? u.toString() : null
  } catch {
    return null
  }
}

export function toSnippet(description: string | null, max = SNIPPET_MAX_CHARS): string {
  const flat = (description ?? "").replace(/\s+/g, " ").trim()
  if (flat.length <= max) return flat

  const cut = flat.slice(0, max)
  const lastSpace = cut.lastIndexOf(" ")
  const head = lastSpace > 0 ? cut.slice(0, lastSpace) : cut
  return `${head.replace(/[\s.,;:]+$/, "")}…`
}

/**
 * Normalize one raw job-search hit. Returns null when the hit has no usable
 * application URL; such postings never reach the caller.
 */
export function normalizeJobHit(hit: unknown): JobPosting | null {
  if (!isRecord(hit)) return null

  const applyUrl = usableUrl(hit.url)
  if (!applyUrl) return null

  return {
    id: str(hit.id) ?? applyUrl,
    title: str(hit.title) ?? "Untitled role",
    company: str(hit.websiteName) ?? "N/A",
    location: str(hit.locationName) ?? "N/A",
    snippet: toSnippet(str(hit.description)),
    applyUrl,
    postedAt: str(hit.created_at),
  }
}

/** Keeps the service's ordering; drops hits without a URL. */
export function normalizeJobHits(hits: readonly unknown[]): JobPosting[] {
  const out: JobPosting[] = []
  for (const hit of hits) {
    const posting = normalizeJobHit(hit)
    if (posting) out.push(posting)
  }
  return out
}

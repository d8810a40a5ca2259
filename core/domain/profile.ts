/*
Nullable scalars = the model may not find industry/location; absent stays null

Lists are ordered and case-insensitively unique (dedupeCaseInsensitive)

A profile lives for one request only; nothing here is persisted
*/
export const EXPERIENCE_LEVELS = ["junior", "mid-level", "senior", "unknown"] as const
export type ExperienceLevel = (typeof EXPERIENCE_LEVELS)[number]

export interface CandidateProfile {
  skills: string[]
  experienceLevel: ExperienceLevel
  jobTitles: string[]
  industry: string | null
  location: string | null
}

export interface SearchFilters {
  location?: string
  remoteOnly?: boolean
  keyword?: string
  industry?: string
  radius?: number
  limit?: number
  skills?: string[]
  experienceLevel?: ExperienceLevel
}

export interface JobQuery {
  keyword: string
  location: string
  experienceLevel: ExperienceLevel
  industry: string | null
  skills: string[]
  remoteOnly: boolean
  radius: number
  limit: number
}

export interface JobPosting {
  id: string
  title: string
  company: string
  location: string
  snippet: string
  applyUrl: string
  postedAt: string | null
}

export function isExperienceLevel(v: unknown): v is ExperienceLevel {
  return typeof v === "string" && (EXPERIENCE_LEVELS as readonly string[]).includes(v)
}

/** Trims, drops empties, keeps the first spelling seen. */
export function dedupeCaseInsensitive(items: readonly string[]): string[] {
  const seen = new Set<string>()
  const out: string[] = []
  for (const item of items) {
    const t = item.trim()
    if (!t) continue
    const key = t.toLowerCase()
    if (seen.has(key)) continue
    seen.add(key)
    out.push(t)
  }
  return out
}

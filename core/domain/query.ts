// core/domain/query.ts
import { dedupeCaseInsensitive, type CandidateProfile, type JobQuery, type SearchFilters } from "./profile.js"

export type QueryDefaults = {
  location: string
  radius: number
  limit: number
  maxLimit: number
  /** How many profile skills go into the query when the filters name none. */
  skillCount: number
}

export const DEFAULT_QUERY_DEFAULTS: QueryDefaults = {
  location: "remote",
  radius: 25,
  limit: 20,
  maxLimit: 100,
  skillCount: 3,
}

function nonEmpty(s: string | null | undefined): string | null {
  if (s == null) return null
  const t = s.trim()
  return t ? t : null
}

function positiveInt(n: number | undefined): number | null {
  if (n === undefined || !Number.isFinite(n)) return null
  const r = Math.round(n)
  return r > 0 ? r : null
}

/**
 * Resolve the job-search parameters for one run.
 * Filters win over the profile, the profile wins over the defaults.
 */
export function buildQuery(
  profile: CandidateProfile,
  filters: SearchFilters = {},
  defaults: QueryDefaults = DEFAULT_QUERY_DEFAULTS
): JobQuery {
  const filterSkills = dedupeCaseInsensitive(filters.skills ?? [])
  const limit = positiveInt(filters.limit)

  return {
    keyword: nonEmpty(filters.keyword) ?? nonEmpty(profile.jobTitles[0]) ?? "",
    location: nonEmpty(filters.location) ?? nonEmpty(profile.location) ?? defaults.location,
    experienceLevel: filters.experienceLevel ?? profile.experienceLevel,
    industry: nonEmpty(filters.industry) ?? nonEmpty(profile.industry),
    skills: filterSkills.length > 0 ? filterSkills : profile.skills.slice(0, defaults.skillCount),
    remoteOnly: filters.remoteOnly ?? false,
    radius: positiveInt(filters.radius) ?? defaults.radius,
    limit: limit == null ? defaults.limit : Math.min(limit, defaults.maxLimit),
  }
}

import { z } from "zod"
import { EXPERIENCE_LEVELS, type CandidateProfile, type SearchFilters } from "../../../core/domain/profile.js"

const experienceLevelSchema = z.enum(EXPERIENCE_LEVELS)

export const searchFiltersSchema = z
  .object({
    location: z.string().max(200).optional(),
    remoteOnly: z.boolean().optional(),
    keyword: z.string().max(200).optional(),
    industry: z.string().max(200).optional(),
    radius: z.number().positive().optional(),
    limit: z.number().int().positive().optional(),
    skills: z.array(z.string().max(100)).max(50).optional(),
    experienceLevel: experienceLevelSchema.optional(),
  })
  .strict()

export const candidateProfileSchema = z.object({
  skills: z.array(z.string()),
  experienceLevel: experienceLevelSchema,
  jobTitles: z.array(z.string()),
  industry: z.string().nullable(),
  location: z.string().nullable(),
})

export const searchRequestSchema = z.object({
  profile: candidateProfileSchema,
  filters: searchFiltersSchema.optional(),
})

export type SearchRequest = { profile: CandidateProfile; filters?: SearchFilters }

export type ParseResult<T> = { ok: true; value: T } | { ok: false; issues: string[] }

function issuesOf(err: z.ZodError): string[] {
  return err.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
}

export function parseSearchRequest(body: unknown): ParseResult<SearchRequest> {
  const r = searchRequestSchema.safeParse(body)
  return r.success ? { ok: true, value: r.data } : { ok: false, issues: issuesOf(r.error) }
}

function first(v: unknown): string | undefined {
  if (typeof v === "string") return v
  if (Array.isArray(v) && typeof v[0] === "string") return v[0]
  return undefined
}

function toBool(v: string | undefined): boolean | string | undefined {
  if (v === undefined || v === "") return undefined
  const s = v.toLowerCase()
  if (s === "true" || s === "1") return true
  if (s === "false" || s === "0") return false
  return v // left for the schema to reject
}

function toNum(v: string | undefined): number | string | undefined {
  if (v === undefined || v === "") return undefined
  const n = Number(v)
  return Number.isFinite(n) ? n : v
}

/** Filters arrive as query-string values next to a PDF body. */
export function parseFiltersFromQuery(query: Record<string, unknown>): ParseResult<SearchFilters> {
  const skills = first(query.skills)
  const candidate = {
    location: first(query.location),
    remoteOnly: toBool(first(query.remoteOnly)),
    keyword: first(query.keyword),
    industry: first(query.industry),
    radius: toNum(first(query.radius)),
    limit: toNum(first(query.limit)),
    skills: skills === undefined ? undefined : skills.split(",").map((s) => s.trim()).filter(Boolean),
    experienceLevel: first(query.experienceLevel) || undefined,
  }

  const r = searchFiltersSchema.safeParse(candidate)
  return r.success ? { ok: true, value: r.data } : { ok: false, issues: issuesOf(r.error) }
}

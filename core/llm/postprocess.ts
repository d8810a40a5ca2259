import { dedupeCaseInsensitive, isExperienceLevel, type CandidateProfile, type ExperienceLevel } from "../domain/profile.js"
import type { ModelProfilePayload } from "./schemas/candidateProfileSchema.js"

export function postProcessProfile(p: ModelProfilePayload): CandidateProfile {
  return {
    skills: dedupeCaseInsensitive(p.skills.filter(isString)),
    experienceLevel: coerceExperienceLevel(p.experience_level),
    jobTitles: dedupeCaseInsensitive(p.job_titles.filter(isString)),
    industry: trimOrNull(p.industry),
    location: trimOrNull(p.location),
  }
}

export function coerceExperienceLevel(raw: unknown): ExperienceLevel {
  if (!isString(raw)) return "unknown"
  const v = raw.trim().toLowerCase()
  return isExperienceLevel(v) ? v : "unknown"
}

function isString(v: unknown): v is string {
  return typeof v === "string"
}

function trimOrNull(s: unknown): string | null {
  if (!isString(s)) return null
  return s.trim() || null
}

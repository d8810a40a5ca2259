import { extractText } from "../../core/pdf/extract.js"
import { extractProfile, type ProfileExtraction } from "../../core/llm/extractProfile.js"
import { buildQuery, DEFAULT_QUERY_DEFAULTS, type QueryDefaults } from "../../core/domain/query.js"
import { searchJobs } from "../../core/jobs/search.js"
import type { LLMAdapter } from "../../core/llm/adapter.js"
import type { JobSearchAdapter } from "../../core/jobs/adapter.js"
import type { CandidateProfile, JobPosting, JobQuery, SearchFilters } from "../../core/domain/profile.js"
import { ENGINE_VERSION } from "../../core/versioning/versions.js"
import { logEvent } from "../lib/log.js"

/** Everything one run needs. Built per request; nothing is shared between runs. */
export interface PipelineDeps {
  llm: LLMAdapter
  jobs: JobSearchAdapter
  maxInputChars?: number
  queryDefaults?: QueryDefaults
  requestId?: string
}

export interface ProfileStageResult {
  engineVersion: string
  textChars: number
  extraction: ProfileExtraction
}

export interface SearchStageResult {
  query: JobQuery
  postings: JobPosting[]
}

export type MatchPipelineResult = ProfileStageResult & SearchStageResult

// 1️⃣ PDF -> text -> profile
export async function runProfileStage(pdfBytes: Uint8Array, deps: PipelineDeps): Promise<ProfileStageResult> {
  const { requestId } = deps
  logEvent("profile_start", { requestId, pdfBytes: pdfBytes.byteLength })

  const text = await extractText(pdfBytes)
  const extraction = await extractProfile(text, deps.llm, { maxInputChars: deps.maxInputChars })

  if (extraction.truncated) {
    logEvent("extract_truncated", { requestId, chars: text.length, kept: extraction.inputChars })
  }
  if (extraction.attempts === 2) logEvent("extract_retry", { requestId })

  logEvent("profile_done", {
    requestId,
    textChars: text.length,
    truncated: extraction.truncated,
    attempts: extraction.attempts,
    skills: extraction.profile.skills.length,
    experienceLevel: extraction.profile.experienceLevel,
    modelUsed: extraction.modelUsed,
    llmLatencyMs: extraction.latencyMs,
    tokensTotal: extraction.usage?.totalTokens,
  })

  return { engineVersion: ENGINE_VERSION, textChars: text.length, extraction }
}

// 2️⃣ profile + filters -> query -> postings
export async function runSearchStage(
  profile: CandidateProfile,
  filters: SearchFilters,
  deps: PipelineDeps
): Promise<SearchStageResult> {
  const query = buildQuery(profile, filters, deps.queryDefaults ?? DEFAULT_QUERY_DEFAULTS)
  const postings = await searchJobs(query, deps.jobs)

  logEvent("search_done", {
    requestId: deps.requestId,
    limit: query.limit,
    remoteOnly: query.remoteOnly,
    postings: postings.length,
  })

  return { query, postings }
}

/**
 * Full run, strictly in order. A failed profile stage halts the run before
 * any search is made.
 */
export async function runMatchPipeline(
  pdfBytes: Uint8Array,
  filters: SearchFilters,
  deps: PipelineDeps
): Promise<MatchPipelineResult> {
  const profileStage = await runProfileStage(pdfBytes, deps)
  const searchStage = await runSearchStage(profileStage.extraction.profile, filters, deps)
  return { ...profileStage, ...searchStage }
}

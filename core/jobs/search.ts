import type { JobPosting, JobQuery } from "../domain/profile.js"
import type { JobSearchAdapter } from "./adapter.js"
import { normalizeJobHits } from "./normalize.js"

// An empty list is a valid answer ("no matches"), not an error.
export async function searchJobs(query: JobQuery, adapter: JobSearchAdapter): Promise<JobPosting[]> {
  const hits = await adapter.search(query)
  return normalizeJobHits(hits)
}

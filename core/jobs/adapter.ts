import type { JobQuery } from "../domain/profile.js"

/**
 * Narrow seam over the external job-search API.
 * Returns the raw hits in the order the service ranked them; throws SearchError.
 */
export interface JobSearchAdapter {
  search(query: JobQuery): Promise<unknown[]>
}

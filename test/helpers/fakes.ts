import type { LLMAdapter, StructuredCompletionInput, StructuredCompletionOutput } from "../../core/llm/adapter.js"
import type { JobSearchAdapter } from "../../core/jobs/adapter.js"
import type { JobQuery } from "../../core/domain/profile.js"

type Reply = string | Error

/** Replays canned model outputs in order and records every request. */
export class FakeLLM implements LLMAdapter {
  readonly calls: StructuredCompletionInput[] = []
  private replies: Reply[]

  constructor(...replies: Reply[]) {
    this.replies = replies
  }

  async completeStructured(input: StructuredCompletionInput): Promise<StructuredCompletionOutput> {
    this.calls.push(input)
    const reply = this.replies[Math.min(this.calls.length - 1, this.replies.length - 1)]
    if (reply === undefined) throw new Error("FakeLLM has no replies")
    if (reply instanceof Error) throw reply
    return { rawText: reply, parsed: null, modelUsed: "gpt-4o-mini", latencyMs: 1 }
  }
}

export class FakeJobSearch implements JobSearchAdapter {
  readonly queries: JobQuery[] = []

  constructor(private hits: unknown[] | Error = []) {}

  async search(query: JobQuery): Promise<unknown[]> {
    this.queries.push(query)
    if (this.hits instanceof Error) throw this.hits
    return this.hits
  }
}

export const SCENARIO_MODEL_REPLY = JSON.stringify({
  skills: ["python"],
  experience_level: "senior",
  job_titles: ["Software Engineer"],
  industry: null,
  location: "Austin",
})

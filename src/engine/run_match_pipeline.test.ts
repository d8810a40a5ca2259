import { afterEach, describe, it, expect, vi } from "vitest"
import { runMatchPipeline, runProfileStage, runSearchStage } from "./run_match_pipeline.js"
import { ExtractionError, SearchError } from "../../core/domain/errors.js"
import { FakeJobSearch, FakeLLM, SCENARIO_MODEL_REPLY } from "../../test/helpers/fakes.js"
import { makeImageOnlyPdf, makeTextPdf } from "../../test/helpers/pdf.js"

const RESUME_LINE = "Skilled Python developer, 5 years experience, Senior Software Engineer, based in Austin"

const HITS = [
  { id: "j1", title: "Software Engineer", websiteName: "Acme", locationName: "Austin", url: "https://jobs.test/j1" },
  { id: "j2", title: "No link here" },
  { id: "j3", title: "Senior Engineer", websiteName: "Globex", locationName: "Austin", url: "https://jobs.test/j3" },
]

describe("runMatchPipeline", () => {
  it("goes from PDF to query and postings", async () => {
    const pdf = await makeTextPdf([[RESUME_LINE]])
    const llm = new FakeLLM(SCENARIO_MODEL_REPLY)
    const jobs = new FakeJobSearch(HITS)

    const out = await runMatchPipeline(pdf, {}, { llm, jobs })

    expect(llm.calls[0]?.user).toContain(RESUME_LINE)
    expect(out.query).toEqual({
      keyword: "Software Engineer",
      location: "Austin",
      experienceLevel: "senior",
      industry: null,
      skills: ["python"],
      remoteOnly: false,
      radius: 25,
      limit: 20,
    })
    expect(jobs.queries).toEqual([out.query])
    expect(out.postings.map((p) => p.id)).toEqual(["j1", "j3"])
    expect(out.textChars).toBe(RESUME_LINE.length)
  })

  it("applies filter overrides over the extracted profile", async () => {
    const pdf = await makeTextPdf([[RESUME_LINE]])
    const out = await runMatchPipeline(
      pdf,
      { location: "Denver", remoteOnly: true, limit: 5 },
      { llm: new FakeLLM(SCENARIO_MODEL_REPLY), jobs: new FakeJobSearch([]) }
    )
    expect(out.query).toMatchObject({ location: "Denver", remoteOnly: true, limit: 5 })
    expect(out.postings).toEqual([])
  })

  it("never searches when the model keeps returning garbage", async () => {
    const pdf = await makeTextPdf([[RESUME_LINE]])
    const llm = new FakeLLM("I am not JSON", "Still not JSON")
    const jobs = new FakeJobSearch(HITS)

    const err = await runMatchPipeline(pdf, {}, { llm, jobs }).catch((e: unknown) => e)

    expect(err).toBeInstanceOf(ExtractionError)
    expect(err).toMatchObject({ code: "MALFORMED_MODEL_RESPONSE" })
    expect(llm.calls).toHaveLength(2)
    expect(jobs.queries).toHaveLength(0)
  })

  it("stops before the model for an image-only PDF", async () => {
    const llm = new FakeLLM(SCENARIO_MODEL_REPLY)
    const jobs = new FakeJobSearch(HITS)
    await expect(runMatchPipeline(await makeImageOnlyPdf(), {}, { llm, jobs })).rejects.toMatchObject({
      code: "NO_TEXT",
    })
    expect(llm.calls).toHaveLength(0)
    expect(jobs.queries).toHaveLength(0)
  })

  it("surfaces a search outage as SearchError", async () => {
    const pdf = await makeTextPdf([[RESUME_LINE]])
    const jobs = new FakeJobSearch(new SearchError("APIJOBS_ERROR_503"))
    await expect(runMatchPipeline(pdf, {}, { llm: new FakeLLM(SCENARIO_MODEL_REPLY), jobs })).rejects.toBeInstanceOf(
      SearchError
    )
  })

  it("gives the same profile and query for the same bytes and filters", async () => {
    const pdf = await makeTextPdf([[RESUME_LINE], ["Python, SQL"]])
    const filters = { keyword: "Platform Engineer" }
    const deps = { llm: new FakeLLM(SCENARIO_MODEL_REPLY), jobs: new FakeJobSearch(HITS) }

    const a = await runMatchPipeline(pdf, filters, deps)
    const b = await runMatchPipeline(pdf, filters, deps)

    expect(b.extraction.profile).toEqual(a.extraction.profile)
    expect(b.query).toEqual(a.query)
  })
})

describe("stages", () => {
  afterEach(() => {
    vi.restoreAllMocks()
  })

  it("runs the profile stage alone", async () => {
    const out = await runProfileStage(await makeTextPdf([[RESUME_LINE]]), { llm: new FakeLLM(SCENARIO_MODEL_REPLY), jobs: new FakeJobSearch() })
    expect(out.extraction.profile.location).toBe("Austin")
    expect(out.engineVersion).toBe("match-engine-v1")
  })

  it("runs the search stage with custom defaults", async () => {
    const profile = { skills: [], experienceLevel: "unknown" as const, jobTitles: [], industry: null, location: null }
    const out = await runSearchStage(profile, {}, {
      llm: new FakeLLM(),
      jobs: new FakeJobSearch(),
      queryDefaults: { location: "anywhere", radius: 10, limit: 5, maxLimit: 50, skillCount: 2 },
    })
    expect(out.query).toEqual({
      keyword: "",
      location: "anywhere",
      experienceLevel: "unknown",
      industry: null,
      skills: [],
      remoteOnly: false,
      radius: 10,
      limit: 5,
    })
  })

  it("logs truncation and the parse retry with the request id", async () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {})
    const llm = new FakeLLM("not json", SCENARIO_MODEL_REPLY)

    await runProfileStage(await makeTextPdf([[RESUME_LINE]]), {
      llm,
      jobs: new FakeJobSearch(),
      maxInputChars: 10,
      requestId: "req-1",
    })

    const lines: unknown[] = log.mock.calls
      .map(([line]) => String(line))
      .filter((line) => line.startsWith("{"))
      .map((line) => JSON.parse(line))
    expect(lines).toContainEqual(
      expect.objectContaining({ msg: "extract_truncated", requestId: "req-1", chars: RESUME_LINE.length, kept: 10 })
    )
    expect(lines).toContainEqual(expect.objectContaining({ msg: "extract_retry", requestId: "req-1" }))
    expect(lines).toContainEqual(expect.objectContaining({ msg: "profile_done", truncated: true, attempts: 2 }))
  })
})

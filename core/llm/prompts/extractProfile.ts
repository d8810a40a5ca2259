import { PROFILE_SCHEMA_VERSION } from "../../versioning/versions.js"

export function buildExtractProfileSystemPrompt(): string {
  return [
    "You are a resume analysis engine for a job search assistant.",
    "Read the resume text and return a JSON object with exactly these fields:",
    "- skills: list of technical and soft skills named in the resume.",
    "- experience_level: one of \"junior\", \"mid-level\", \"senior\", \"unknown\".",
    "- job_titles: current and past job titles, most recent first.",
    "- industry: the candidate's main industry, or null if unclear.",
    "- location: the preferred or current job location, or null if not mentioned.",
    "",
    "Rules:",
    "- Do NOT invent skills, titles or places that are not in the text.",
    "- Use an empty list or null when a field is not found.",
    "- Output MUST be valid JSON. No extra keys, no commentary.",
  ].join("\n")
}

export function buildExtractProfileUserPrompt(resumeText: string, promptVersion: string): string {
  return [
    `Schema version: ${PROFILE_SCHEMA_VERSION}`,
    `Prompt version: ${promptVersion}`,
    "",
    "Resume text (verbatim):",
    "-----",
    resumeText,
    "-----",
    "",
    "Return only the JSON object.",
  ].join("\n")
}

export const STRICT_RETRY_INSTRUCTION =
  "IMPORTANT: Your last output was invalid or did not match the schema. Return ONLY valid JSON matching the schema."

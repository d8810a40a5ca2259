import { z } from "zod"
import { EXPERIENCE_LEVELS } from "../../domain/profile.js"

// Sent to the model as the structured-output hint.
export const candidateProfileJsonSchema = {
  name: "CandidateProfile",
  schema: {
    type: "object",
    additionalProperties: false,
    properties: {
      skills: { type: "array", items: { type: "string" } },
      experience_level: { type: "string", enum: [...EXPERIENCE_LEVELS] },
      job_titles: { type: "array", items: { type: "string" } },
      industry: { type: ["string", "null"] },
      location: { type: ["string", "null"] },
    },
    required: ["skills", "experience_level", "job_titles", "industry", "location"],
  },
} as const

export type JsonSchemaHint = {
  name: string
  schema: Readonly<Record<string, unknown>>
}

/**
 * What we accept back. Only the shape is checked: stray entries and
 * out-of-enum or non-string scalars are coerced in postprocess.
 */
export const modelProfilePayloadSchema = z.object({
  skills: z.array(z.unknown()),
  experience_level: z.unknown(),
  job_titles: z.array(z.unknown()),
  industry: z.unknown(),
  location: z.unknown(),
})

export type ModelProfilePayload = z.infer<typeof modelProfilePayloadSchema>

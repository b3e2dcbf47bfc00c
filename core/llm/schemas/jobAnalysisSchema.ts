import { z } from "zod"
import { EXPERIENCE_LEVELS } from "../../domain/job_analysis"

const stringArray = { type: "array", items: { type: "string" } } as const

/** JSON schema sent with the structured-output request. */
export const jobAnalysisJsonSchema = {
  name: "JobAnalysis",
  schema: {
    type: "object",
    additionalProperties: false,
    properties: {
      required_skills: stringArray,
      preferred_skills: stringArray,
      hard_requirements: stringArray,
      soft_requirements: stringArray,
      responsibilities: stringArray,
      keywords: stringArray,
      experience_level: { type: "string", enum: [...EXPERIENCE_LEVELS] },
      education_requirements: stringArray,
      industry: { type: "string" }
    },
    required: [
      "required_skills",
      "preferred_skills",
      "hard_requirements",
      "soft_requirements",
      "responsibilities",
      "keywords",
      "experience_level",
      "education_requirements",
      "industry"
    ]
  }
} as const

/**
 * What we accept back. Missing lists default to empty; anything that is not the
 * expected shape is rejected and the caller falls back.
 */
export const collaboratorJobAnalysisSchema = z.object({
  required_skills: z.array(z.string()).default([]),
  preferred_skills: z.array(z.string()).default([]),
  hard_requirements: z.array(z.string()).default([]),
  soft_requirements: z.array(z.string()).default([]),
  responsibilities: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
  experience_level: z.string().default("unknown"),
  education_requirements: z.array(z.string()).default([]),
  industry: z.string().default("general")
})

export type RawCollaboratorJobAnalysis = z.infer<typeof collaboratorJobAnalysisSchema>

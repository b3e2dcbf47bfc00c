import { z } from "zod"

export const recommendationsJsonSchema = {
  name: "Recommendations",
  schema: {
    type: "object",
    additionalProperties: false,
    properties: {
      recommendations: { type: "array", items: { type: "string" } }
    },
    required: ["recommendations"]
  }
} as const

export const recommendationsSchema = z.object({
  recommendations: z.array(z.string()).min(1)
})

import { z } from "zod";
import { resumeRecordSchema } from "../../../core/domain/resume";

const description = z.string().max(50_000);

export const matchRequestSchema = z.object({
  resume: resumeRecordSchema,
  job_description: description,
});

export const analyzeJobRequestSchema = z.object({
  job_description: description,
});

export const suggestionsRequestSchema = z.object({
  job_role: z.string().trim().min(1).max(200),
  content_type: z.enum(["skills", "keywords"]).default("skills"),
});

export const insightsRequestSchema = (maxJobs: number) =>
  z.object({
    resume: resumeRecordSchema,
    jobs: z
      .array(
        z.object({
          id: z.string().min(1).optional(),
          title: z.string().optional(),
          description,
        })
      )
      .min(1)
      .max(maxJobs),
  });

export function formatIssues(err: z.ZodError): Array<{ path: string; message: string }> {
  return err.issues.map((i) => ({ path: i.path.join("."), message: i.message }));
}

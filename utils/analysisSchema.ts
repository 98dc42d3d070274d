// utils/analysisSchema.ts
import { z } from "zod";
import type { AnalysisResult, ErrorBody } from "@/types";

const score = (max: number) => z.number().min(0).max(max);

/** Shape every successful analysis must have. Unknown keys are dropped. */
export const AnalysisSchema: z.ZodType<AnalysisResult> = z.object({
  atsScore: z.number().int().min(0).max(100),
  summary: z.string(),
  categoryScores: z.object({
    hardSkills: score(5),
    softSkills: score(5),
    experience: score(5),
    qualifications: score(5),
  }),
  strengths: z.array(z.string()),
  weaknesses: z.array(z.string()),
  recommendations: z.array(z.string()),
});

export const ErrorBodySchema: z.ZodType<ErrorBody> = z.object({ detail: z.string() });

import { z } from "zod";

export const VerdictSchema = z.enum([
  "Very Weak",
  "Weak",
  "Moderate",
  "Strong",
  "Very Strong",
]);

export type Verdict = z.infer<typeof VerdictSchema>;

export const PasswordFeaturesSchema = z.object({
  length: z.number().int().nonnegative(),
  has_lowercase: z.boolean(),
  has_uppercase: z.boolean(),
  has_digit: z.boolean(),
  has_special: z.boolean(),
  is_common: z.boolean(),
  has_repetition: z.boolean(),
  has_sequence: z.boolean(),
  entropy_bits: z.number().nonnegative(),
});

export type PasswordFeatures = z.infer<typeof PasswordFeaturesSchema>;

export const PasswordEvaluationSchema = PasswordFeaturesSchema.extend({
  score: z.number().int().min(0).max(100),
  verdict: VerdictSchema,
  recommendations: z.array(z.string()),
});

export type PasswordEvaluation = z.infer<typeof PasswordEvaluationSchema>;

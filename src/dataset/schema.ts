import { z } from "zod";

export const TurnSchema = z
  .object({
    speaker: z.string().optional(),
    role: z.string().optional(),
    content: z.string().default(""),
  })
  .passthrough();

export type Turn = z.infer<typeof TurnSchema>;

export const BenchmarkItemSchema = z
  .object({
    question_id: z.union([z.string().min(1), z.number()]).transform(String),
    question: z.string(),
    question_type: z.string().min(1),
    choices: z.array(z.string()).min(2).max(10),
    correct_choice_index: z.number().int().nonnegative(),
    haystack_sessions: z.array(z.array(TurnSchema)).default([]),
    haystack_session_summaries: z.array(z.string().nullable()).default([]),
    haystack_session_datetimes: z.array(z.string().nullable()).nullish(),
  })
  .passthrough()
  .superRefine((item, ctx) => {
    if (item.correct_choice_index >= item.choices.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["correct_choice_index"],
        message: `must be less than the number of choices (${item.choices.length})`,
      });
    }
  });

export type BenchmarkItem = z.infer<typeof BenchmarkItemSchema>;

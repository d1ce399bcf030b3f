import { z } from "zod";

const intString = z
  .string()
  .regex(/^\s*-?\d+\s*$/, "expected an integer")
  .transform((s) => Number.parseInt(s, 10));

/** An integer, or a string holding one (form posts send numbers as text). */
export const IntLike = z.union([z.number().int(), intString]);

// ids are int4 serial columns
export const MAX_ID = 2_147_483_647;

export const IdParamSchema = z.object({
  id: z
    .string()
    .regex(/^\d+$/)
    .transform((s) => Number.parseInt(s, 10))
    .pipe(z.number().int().max(MAX_ID)),
});

export const SearchSchema = z.object({
  searchTerm: z.union([z.string(), z.number()]).nullish(),
});

export const CreateQuestionSchema = z.object({
  question: z.string().min(1, "question is required"),
  answer: z.string().min(1, "answer is required"),
  category: IntLike,
  difficulty: IntLike,
});

export const QuizSchema = z.object({
  previous_questions: z.array(IntLike).default([]),
  quiz_category: z
    .object({
      id: IntLike,
      type: z.string().optional(),
    })
    .nullish(),
});

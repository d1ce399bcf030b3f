import type { RequestHandler } from "express";
import { QuizSchema } from "../schemas/triviaSchemas";
import type { AppContext } from "../types/AppContext";
import { unprocessableFromStoreError } from "../utils/httpErrors";
import { pickRandom } from "../utils/random";
import { rejectBody } from "./shared";

// quiz_category.id 0 is the front end's "ALL"
const ALL_CATEGORIES = 0;

export function quizController({ store, random }: AppContext) {
  /**
   * POST /quizzes
   * Body: { previous_questions: number[], quiz_category?: { id, type } }
   * Returns one random unseen question, or `question: null` when none are left.
   */
  const nextQuizQuestion: RequestHandler = async (req, res, next) => {
    try {
      const input = QuizSchema.safeParse(req.body ?? {});
      if (!input.success) return next(rejectBody("POST /quizzes", input.error));

      const { previous_questions, quiz_category } = input.data;
      const categoryId =
        quiz_category && quiz_category.id !== ALL_CATEGORIES ? quiz_category.id : undefined;

      const candidates = await store.listQuestions({
        excludeIds: previous_questions,
        categoryId,
      });
      if (!candidates.ok) return next(unprocessableFromStoreError(candidates.error));

      return res.json({
        success: true,
        question: pickRandom(candidates.value, random) ?? null,
      });
    } catch (err) {
      next(err);
    }
  };

  return { nextQuizQuestion };
}

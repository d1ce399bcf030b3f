import type { RequestHandler } from "express";
import {
  CreateQuestionSchema,
  IdParamSchema,
  SearchSchema,
} from "../schemas/triviaSchemas";
import type { AppContext } from "../types/AppContext";
import {
  fromStoreError,
  notFound,
  unprocessable,
  unprocessableFromStoreError,
} from "../utils/httpErrors";
import { paginate, parsePage } from "../utils/paginate";
import { rejectBody, toCategoryMap } from "./shared";

// Listing shows this category as selected no matter what the page holds.
const DEFAULT_CURRENT_CATEGORY = 1;

export function questionControllers({ store }: AppContext) {
  /** GET /questions?page=N */
  const listQuestions: RequestHandler = async (req, res, next) => {
    try {
      const page = parsePage(req.query.page);
      const [selection, categories] = await Promise.all([
        store.listQuestions(),
        store.listCategories(),
      ]);
      if (!selection.ok) return next(fromStoreError(selection.error));
      if (!categories.ok) return next(fromStoreError(categories.error));

      // an empty table and a page past the end are both 404
      const current = paginate(selection.value, page);
      if (current.length === 0) return next(notFound(`page ${page} is empty`));

      return res.json({
        success: true,
        questions: current,
        total_questions: selection.value.length,
        categories: toCategoryMap(categories.value),
        current_category: DEFAULT_CURRENT_CATEGORY,
      });
    } catch (err) {
      next(err);
    }
  };

  /**
   * DELETE /questions/:id?page=N
   * A missing question is reported as 422, like every other failure here.
   */
  const deleteQuestion: RequestHandler = async (req, res, next) => {
    try {
      // the route only matches digits; an id past int4 cannot exist, so it is
      // reported like any other missing question
      const params = IdParamSchema.safeParse(req.params);
      if (!params.success) return next(unprocessable(`question id ${req.params.id} out of range`));
      const id = params.data.id;

      const found = await store.findQuestion(id);
      if (!found.ok) return next(unprocessableFromStoreError(found.error));

      const removed = await store.deleteQuestion(id);
      if (!removed.ok) return next(unprocessableFromStoreError(removed.error));

      const remaining = await store.listQuestions();
      if (!remaining.ok) return next(unprocessableFromStoreError(remaining.error));

      return res.json({
        success: true,
        deleted: id,
        questions: paginate(remaining.value, parsePage(req.query.page)),
        total_questions: remaining.value.length,
      });
    } catch (err) {
      next(err);
    }
  };

  /**
   * POST /questions?page=N
   * Body `{ searchTerm }` searches question text; otherwise the body is a new
   * question `{ question, answer, category, difficulty }`.
   */
  const createOrSearchQuestions: RequestHandler = async (req, res, next) => {
    try {
      const body: unknown = req.body ?? {};
      const page = parsePage(req.query.page);

      const search = SearchSchema.safeParse(body);
      if (!search.success) return next(rejectBody("POST /questions", search.error));

      const term = search.data.searchTerm;
      if (term) {
        const selection = await store.listQuestions({ searchTerm: String(term) });
        if (!selection.ok) return next(unprocessableFromStoreError(selection.error));

        return res.json({
          success: true,
          questions: paginate(selection.value, page),
          total_questions: selection.value.length,
        });
      }

      const input = CreateQuestionSchema.safeParse(body);
      if (!input.success) return next(rejectBody("POST /questions", input.error));

      const created = await store.insertQuestion(input.data);
      if (!created.ok) return next(unprocessableFromStoreError(created.error));

      const selection = await store.listQuestions();
      if (!selection.ok) return next(unprocessableFromStoreError(selection.error));

      return res.json({
        success: true,
        created: created.value.id,
        questions: paginate(selection.value, page),
        total_questions: selection.value.length,
      });
    } catch (err) {
      next(err);
    }
  };

  return { listQuestions, deleteQuestion, createOrSearchQuestions };
}

import type { RequestHandler } from "express";
import { IdParamSchema } from "../schemas/triviaSchemas";
import type { AppContext } from "../types/AppContext";
import { fromStoreError, notFound } from "../utils/httpErrors";
import { paginate, parsePage } from "../utils/paginate";
import { toCategoryMap } from "./shared";

export function categoriesController({ store }: AppContext) {
  /** GET /categories -> { categories: { id: type }, total_categories } */
  const listCategories: RequestHandler = async (_req, res, next) => {
    try {
      const r = await store.listCategories();
      if (!r.ok) return next(fromStoreError(r.error));

      return res.json({
        success: true,
        categories: toCategoryMap(r.value),
        total_categories: r.value.length,
      });
    } catch (err) {
      next(err);
    }
  };

  /** GET /categories/:id/questions?page=N */
  const listQuestionsByCategory: RequestHandler = async (req, res, next) => {
    try {
      const params = IdParamSchema.safeParse(req.params);
      if (!params.success) return next(notFound(`category id ${req.params.id} out of range`));
      const categoryId = params.data.id;

      const category = await store.findCategory(categoryId);
      if (!category.ok) return next(fromStoreError(category.error));

      const selection = await store.listQuestions({ categoryId });
      if (!selection.ok) return next(fromStoreError(selection.error));

      return res.json({
        success: true,
        questions: paginate(selection.value, parsePage(req.query.page)),
        total_questions: selection.value.length,
        current_category: categoryId,
      });
    } catch (err) {
      next(err);
    }
  };

  return { listCategories, listQuestionsByCategory };
}

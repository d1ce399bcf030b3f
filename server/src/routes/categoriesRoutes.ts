import { Router } from "express";
import { categoriesController } from "../controllers/categoriesController";
import { rejectMethod } from "../middleware/errorHandler";
import type { AppContext } from "../types/AppContext";

export default function categoriesRoutes(ctx: AppContext): Router {
  const router = Router();
  const { listCategories, listQuestionsByCategory } = categoriesController(ctx);

  router.route("/").get(listCategories).all(rejectMethod);
  router.route("/:id(\\d+)/questions").get(listQuestionsByCategory).all(rejectMethod);

  return router;
}

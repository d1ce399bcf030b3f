import { Router } from "express";
import { questionControllers } from "../controllers/questionControllers";
import { rejectMethod } from "../middleware/errorHandler";
import type { AppContext } from "../types/AppContext";

export default function questionsRoutes(ctx: AppContext): Router {
  const router = Router();
  const { listQuestions, createOrSearchQuestions, deleteQuestion } = questionControllers(ctx);

  router.route("/").get(listQuestions).post(createOrSearchQuestions).all(rejectMethod);

  // integer ids only; anything else falls through to the 404 handler
  router.route("/:id(\\d+)").delete(deleteQuestion).all(rejectMethod);

  return router;
}

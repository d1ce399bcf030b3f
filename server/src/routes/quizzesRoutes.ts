import { Router } from "express";
import { quizController } from "../controllers/quizController";
import { rejectMethod } from "../middleware/errorHandler";
import type { AppContext } from "../types/AppContext";

export default function quizzesRoutes(ctx: AppContext): Router {
  const router = Router();
  const { nextQuizQuestion } = quizController(ctx);

  router.route("/").post(nextQuizQuestion).all(rejectMethod);

  return router;
}

// server/src/app.ts
import express from "express";
import helmet from "helmet";
import morgan from "morgan";

import categoriesRoutes from "./routes/categoriesRoutes";
import healthRoutes from "./routes/healthRoutes";
import questionsRoutes from "./routes/questionsRoutes";
import quizzesRoutes from "./routes/quizzesRoutes";
import { corsMiddleware } from "./middleware/cors";
import { errorHandler, unknownRoute } from "./middleware/errorHandler";
import type { AppContext } from "./types/AppContext";

export type AppOptions = {
  /** morgan format; null turns the request log off */
  logFormat?: string | null;
};

export function createApp(ctx: AppContext, options: AppOptions = {}): express.Express {
  const app = express();
  const logFormat = options.logFormat === undefined ? "dev" : options.logFormat;

  app.use(corsMiddleware());
  app.use(helmet({ crossOriginResourcePolicy: { policy: "cross-origin" } }));
  app.use(express.json({ limit: "100kb" }));
  if (logFormat) app.use(morgan(logFormat));

  // --- health checks ---
  app.use("/health", healthRoutes(ctx));

  app.use("/categories", categoriesRoutes(ctx));
  app.use("/questions", questionsRoutes(ctx));
  app.use("/quizzes", quizzesRoutes(ctx));

  app.use(unknownRoute);
  app.use(errorHandler);

  return app;
}

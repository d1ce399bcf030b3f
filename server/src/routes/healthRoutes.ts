import { Router } from "express";
import { healthController } from "../controllers/healthController";
import type { AppContext } from "../types/AppContext";

export default function healthRoutes(ctx: AppContext): Router {
  const router = Router();
  const { health, dbHealth } = healthController(ctx);

  router.get("/", health);
  router.get("/db", dbHealth);

  return router;
}
